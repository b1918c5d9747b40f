import { select, isCancel } from "@clack/prompts";
import { READ_ONLY_TOOLS, type ToolCall } from "../types/tool-call.js";
import type { AgentConfig } from "../config/config.js";

export type ApprovalDecision = "approve" | "skip" | "quit";

export interface Approver {
  confirm(call: ToolCall): Promise<ApprovalDecision>;
}

export function needsApproval(
  toolName: string,
  config: Pick<AgentConfig, "autoApproveAll" | "autoApproveReads">
): boolean {
  if (config.autoApproveAll) return false;
  if (toolName === "task_complete") return false;
  if (config.autoApproveReads && READ_ONLY_TOOLS.has(toolName)) return false;
  return true;
}

/**
 * Asks on the terminal. Cancelling the prompt (Ctrl-C) means quit.
 */
export class InteractiveApprover implements Approver {
  async confirm(call: ToolCall): Promise<ApprovalDecision> {
    const answer = await select({
      message: `Approve ${call.name}?`,
      options: [
        { value: "approve", label: "Yes", hint: "run it" },
        { value: "skip", label: "No", hint: "tell the model it was skipped" },
        { value: "quit", label: "Quit", hint: "exit the agent" },
      ],
      initialValue: "approve",
    });

    if (isCancel(answer)) {
      return "quit";
    }
    return answer === "skip" || answer === "quit" ? answer : "approve";
  }
}

/** Approves everything; for --yes and non-interactive runs. */
export class AutoApprover implements Approver {
  async confirm(): Promise<ApprovalDecision> {
    return "approve";
  }
}
