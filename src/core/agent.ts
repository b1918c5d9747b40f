import { LogConfig, log, logError, silentLogConfig } from "../utils/logging.js";
import { withSpan } from "../utils/observability.js";
import { boundTranscript, type ChatModel } from "../ai/api-calls.js";
import { TOOL_SKIPPED_MESSAGE, toolResultMessage } from "../ai/prompts.js";
import { executeTool } from "../tools/index.js";
import { clipForModel, type AgentUI } from "../utils/ui.js";
import { needsApproval, type Approver } from "./approval.js";
import { parseToolCall, stripToolBlocks } from "./tool-call-parser.js";
import type { Session } from "./session.js";
import type { AgentConfig } from "../config/config.js";
import type { ToolCall } from "../types/tool-call.js";

export type AgentOutcome = "complete" | "answered" | "quit" | "max_iterations";

export interface AgentTaskResult {
  outcome: AgentOutcome;
  iterations: number;
  /** task_complete summary, or the plain reply for "answered" */
  message?: string;
}

export type AgentLoopConfig = Pick<
  AgentConfig,
  | "maxIterations"
  | "autoApproveAll"
  | "autoApproveReads"
  | "commandTimeoutMs"
  | "maxMessages"
  | "maxToolResultChars"
  | "resultPreviewLines"
  | "stream"
>;

export interface AgentDeps {
  model: ChatModel;
  approver: Approver;
  ui: AgentUI;
  config: AgentLoopConfig;
  logConfig?: LogConfig;
  signal?: AbortSignal;
}

async function runTool(
  call: ToolCall,
  session: Session,
  deps: AgentDeps,
  logConfig: LogConfig
) {
  return withSpan(`agent.tool.${call.name}`, async (span) => {
    if (span) {
      span.setAttribute("tool.name", call.name);
      span.setAttribute("tool.args", JSON.stringify(call.args).substring(0, 500));
      span.setAttribute("tool.cwd", session.cwd);
    }

    log(logConfig, "tool-call", `Executing ${call.name}`, { args: call.args });
    const outcome = await executeTool(call, {
      cwd: session.cwd,
      commandTimeoutMs: deps.config.commandTimeoutMs,
    });
    log(logConfig, "tool-result", `${call.name} finished`, {
      resultLength: outcome.result.length,
      isComplete: outcome.isComplete,
    });

    if (span) {
      span.setAttribute("tool.result_length", outcome.result.length);
      span.setAttribute("tool.is_complete", outcome.isComplete);
    }
    return outcome;
  });
}

/**
 * Work on one user request until the model calls task_complete, replies
 * without a tool call, the user quits, or the iteration budget runs out.
 * Messages are appended to the session as the loop goes.
 */
export async function runAgentTask(
  userInput: string,
  session: Session,
  deps: AgentDeps
): Promise<AgentTaskResult> {
  const { model, approver, ui, config } = deps;
  const logConfig = deps.logConfig ?? silentLogConfig;

  return withSpan("agent.task", async (taskSpan) => {
    if (taskSpan) {
      taskSpan.setAttribute("agent.request", userInput.substring(0, 500));
      taskSpan.setAttribute("agent.max_iterations", config.maxIterations);
      taskSpan.setAttribute("agent.model", model.modelName);
    }

    session.startTask(userInput);
    log(logConfig, "step", `Starting task: ${userInput}`, {
      cwd: session.cwd,
      model: model.modelName,
    });

    for (let iteration = 1; iteration <= config.maxIterations; iteration++) {
      log(logConfig, "step", `=== Iteration ${iteration}/${config.maxIterations} ===`, {
        historyLength: session.historyLength,
      });
      ui.thinking(iteration, config.maxIterations);

      let streamed = false;
      let reply: string;
      try {
        const window = boundTranscript(
          session.messages,
          config.maxMessages,
          session.pinnedIndex
        );
        const result = await withSpan("ai.call", (span) =>
          model.chat(window, {
            onToken: config.stream
              ? (delta) => {
                  streamed = true;
                  ui.token(delta);
                }
              : undefined,
            signal: deps.signal,
            span,
          })
        );
        reply = result.text;
      } catch (error) {
        await logError(logConfig, "Model call failed", error, { iteration });
        throw error;
      } finally {
        ui.endStream();
      }

      const call = parseToolCall(reply);
      if (!call) {
        session.append({ role: "assistant", content: reply });
        if (!streamed) {
          ui.answer(reply.trim());
        }
        log(logConfig, "step", "Model replied without a tool call");
        return { outcome: "answered", iterations: iteration, message: reply.trim() };
      }

      const explanation = stripToolBlocks(reply);
      if (explanation && !streamed) {
        ui.explanation(explanation);
      }
      ui.toolCall(call.name, call.args);

      if (needsApproval(call.name, config)) {
        const decision = await approver.confirm(call);
        log(logConfig, "approval", `${call.name}: ${decision}`);

        if (decision === "quit") {
          return { outcome: "quit", iterations: iteration };
        }
        if (decision === "skip") {
          ui.skipped();
          session.append({ role: "assistant", content: reply });
          session.append({ role: "user", content: TOOL_SKIPPED_MESSAGE });
          continue;
        }
      }

      const outcome = await runTool(call, session, deps, logConfig);
      session.append({ role: "assistant", content: reply });

      if (outcome.isComplete) {
        ui.toolResult(outcome.result, config.resultPreviewLines);
        ui.taskComplete(outcome.result);
        return { outcome: "complete", iterations: iteration, message: outcome.result };
      }

      ui.toolResult(outcome.result, config.resultPreviewLines);
      session.append({
        role: "user",
        content: toolResultMessage(clipForModel(outcome.result, config.maxToolResultChars)),
      });
    }

    ui.warning(
      `Reached maximum iterations (${config.maxIterations}). Task may be incomplete.`
    );
    log(logConfig, "step", "Iteration budget exhausted");
    return { outcome: "max_iterations", iterations: config.maxIterations };
  });
}
