import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runAgentTask, type AgentDeps, type AgentLoopConfig } from "../core/agent.js";
import { Session } from "../core/session.js";
import { ModelRequestError } from "../utils/errors.js";
import { TOOL_SKIPPED_MESSAGE } from "../ai/prompts.js";
import type { ApprovalDecision, Approver } from "../core/approval.js";
import type { ChatMessage, ChatModel, ChatOptions, ChatResult } from "../ai/api-calls.js";
import type { AgentUI } from "../utils/ui.js";
import type { ToolCall } from "../types/tool-call.js";

function toolReply(tool: string, args: Record<string, unknown>, text = ""): string {
  return `${text}\n\`\`\`tool\n${JSON.stringify({ tool, args })}\n\`\`\``;
}

class ScriptedModel implements ChatModel {
  readonly provider = "ollama";
  readonly modelName = "scripted";
  readonly requests: ChatMessage[][] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResult> {
    this.requests.push([...messages]);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("no scripted reply left");
    if (reply instanceof Error) throw reply;
    options.onToken?.(reply);
    return { text: reply };
  }
}

class ScriptedApprover implements Approver {
  readonly asked: ToolCall[] = [];

  constructor(private readonly decisions: ApprovalDecision[]) {}

  async confirm(call: ToolCall): Promise<ApprovalDecision> {
    this.asked.push(call);
    return this.decisions.shift() ?? "approve";
  }
}

class RecordingUI implements AgentUI {
  readonly events: string[] = [];
  thinking(iteration: number, max: number) {
    this.events.push(`thinking ${iteration}/${max}`);
  }
  token() {}
  endStream() {}
  explanation(text: string) {
    this.events.push(`explanation ${text}`);
  }
  toolCall(name: string) {
    this.events.push(`call ${name}`);
  }
  toolResult(result: string) {
    this.events.push(`result ${result}`);
  }
  skipped() {
    this.events.push("skipped");
  }
  taskComplete(summary: string) {
    this.events.push(`complete ${summary}`);
  }
  answer(text: string) {
    this.events.push(`answer ${text}`);
  }
  warning(message: string) {
    this.events.push(`warning ${message}`);
  }
  error(message: string) {
    this.events.push(`error ${message}`);
  }
}

const baseConfig: AgentLoopConfig = {
  maxIterations: 5,
  autoApproveAll: false,
  autoApproveReads: true,
  commandTimeoutMs: 10_000,
  maxMessages: 40,
  maxToolResultChars: 20_000,
  resultPreviewLines: 20,
  stream: false,
};

describe("runAgentTask", () => {
  let cwd: string;
  let session: Session;
  let ui: RecordingUI;

  function deps(
    model: ChatModel,
    approver: Approver = new ScriptedApprover([]),
    config: Partial<AgentLoopConfig> = {}
  ): AgentDeps {
    return { model, approver, ui, config: { ...baseConfig, ...config } };
  }

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "agent-loop-"));
    session = new Session(cwd, "ollama", "scripted");
    ui = new RecordingUI();
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  it("should run tools until the model completes the task", async () => {
    await fs.writeFile(path.join(cwd, "greeting.txt"), "hello");
    const model = new ScriptedModel([
      toolReply("read_file", { path: "greeting.txt" }, "Reading the file."),
      toolReply("task_complete", { summary: "The file says hello." }),
    ]);

    const result = await runAgentTask("What does greeting.txt say?", session, deps(model));

    expect(result).toEqual({
      outcome: "complete",
      iterations: 2,
      message: "The file says hello.",
    });
    expect(ui.events).toEqual([
      "thinking 1/5",
      "explanation Reading the file.",
      "call read_file",
      "result hello",
      "thinking 2/5",
      "call task_complete",
      "result The file says hello.",
      "complete The file says hello.",
    ]);
    expect(session.messages.map((m) => m.role)).toEqual([
      "system",
      "user",
      "assistant",
      "user",
      "assistant",
    ]);
    expect(session.messages[3].content).toBe(
      "Tool result:\nhello\n\nContinue with the task or call task_complete if done."
    );
  });

  it("should send the growing conversation on every turn", async () => {
    const model = new ScriptedModel([
      toolReply("list_directory", { path: "." }),
      "Nothing here yet.",
    ]);

    await runAgentTask("What is in this folder?", session, deps(model));

    expect(model.requests).toHaveLength(2);
    expect(model.requests[0].map((m) => m.role)).toEqual(["system", "user"]);
    expect(model.requests[1].map((m) => m.role)).toEqual([
      "system",
      "user",
      "assistant",
      "user",
    ]);
  });

  it("should end with the reply when the model answers without a tool", async () => {
    const model = new ScriptedModel(["  TypeScript adds static types.  "]);

    const result = await runAgentTask("What is TypeScript?", session, deps(model));

    expect(result).toEqual({
      outcome: "answered",
      iterations: 1,
      message: "TypeScript adds static types.",
    });
    expect(ui.events).toEqual(["thinking 1/5", "answer TypeScript adds static types."]);
    expect(session.messages.at(-1)).toEqual({
      role: "assistant",
      content: "  TypeScript adds static types.  ",
    });
  });

  it("should ask before writing and tell the model when the user skips", async () => {
    const approver = new ScriptedApprover(["skip"]);
    const model = new ScriptedModel([
      toolReply("write_file", { path: "out.txt", content: "data" }),
      toolReply("task_complete", { summary: "Left the file alone." }),
    ]);

    const result = await runAgentTask("Write out.txt", session, deps(model, approver));

    expect(result.outcome).toBe("complete");
    expect(approver.asked.map((call) => call.name)).toEqual(["write_file"]);
    expect(ui.events).toContain("skipped");
    expect(session.messages[3]).toEqual({ role: "user", content: TOOL_SKIPPED_MESSAGE });
    await expect(fs.access(path.join(cwd, "out.txt"))).rejects.toThrow();
  });

  it("should write the file once approved", async () => {
    const approver = new ScriptedApprover(["approve"]);
    const model = new ScriptedModel([
      toolReply("write_file", { path: "out.txt", content: "data" }),
      toolReply("task_complete", { summary: "Wrote it." }),
    ]);

    await runAgentTask("Write out.txt", session, deps(model, approver));

    expect(await fs.readFile(path.join(cwd, "out.txt"), "utf-8")).toBe("data");
    expect(ui.events).toContain("result Successfully wrote 4 characters to out.txt");
  });

  it("should stop when the user quits", async () => {
    const approver = new ScriptedApprover(["quit"]);
    const model = new ScriptedModel([
      toolReply("run_command", { command: "echo should-not-run > ran.txt" }),
    ]);

    const result = await runAgentTask("Run it", session, deps(model, approver));

    expect(result).toEqual({ outcome: "quit", iterations: 1 });
    await expect(fs.access(path.join(cwd, "ran.txt"))).rejects.toThrow();
  });

  it("should not ask at all when everything is auto-approved", async () => {
    const approver = new ScriptedApprover(["quit"]);
    const model = new ScriptedModel([
      toolReply("run_command", { command: "echo hi" }),
      toolReply("task_complete", { summary: "Ran it." }),
    ]);

    const result = await runAgentTask(
      "Run it",
      session,
      deps(model, approver, { autoApproveAll: true })
    );

    expect(result.outcome).toBe("complete");
    expect(approver.asked).toEqual([]);
    expect(ui.events).toContain("result hi");
  });

  it("should stop after the iteration budget", async () => {
    const model = new ScriptedModel([
      toolReply("list_directory", { path: "." }),
      toolReply("list_directory", { path: "." }),
    ]);

    const result = await runAgentTask(
      "Keep looking",
      session,
      deps(model, undefined, { maxIterations: 2 })
    );

    expect(result).toEqual({ outcome: "max_iterations", iterations: 2 });
    expect(ui.events.at(-1)).toBe(
      "warning Reached maximum iterations (2). Task may be incomplete."
    );
  });

  it("should report unknown tools back to the model", async () => {
    const approver = new ScriptedApprover(["approve"]);
    const model = new ScriptedModel([
      toolReply("delete_repo", {}),
      toolReply("task_complete", {}),
    ]);

    const result = await runAgentTask("Clean up", session, deps(model, approver));

    expect(result.message).toBe("Task completed.");
    expect(session.messages[3].content).toBe(
      "Tool result:\nUnknown tool: delete_repo\n\nContinue with the task or call task_complete if done."
    );
  });

  it("should clip long tool results before sending them back", async () => {
    await fs.writeFile(path.join(cwd, "big.txt"), "y".repeat(50));
    const model = new ScriptedModel([
      toolReply("read_file", { path: "big.txt" }),
      "Done reading.",
    ]);

    await runAgentTask(
      "Read big.txt",
      session,
      deps(model, undefined, { maxToolResultChars: 10 })
    );

    expect(session.messages[3].content).toBe(
      `Tool result:\n${"y".repeat(10)}\n... (truncated 40 characters)\n\nContinue with the task or call task_complete if done.`
    );
  });

  it("should not repeat a streamed reply", async () => {
    const model = new ScriptedModel(["Streamed answer."]);

    await runAgentTask("Hi", session, deps(model, undefined, { stream: true }));

    expect(ui.events).toEqual(["thinking 1/5"]);
  });

  it("should let model failures propagate", async () => {
    const model = new ScriptedModel([
      new ModelRequestError("OLLAMA request failed", {
        provider: "ollama",
        model: "scripted",
      }),
    ]);

    await expect(runAgentTask("Hi", session, deps(model))).rejects.toBeInstanceOf(
      ModelRequestError
    );
  });

  it("should keep the request in view when the history outgrows the window", async () => {
    const model = new ScriptedModel([
      toolReply("list_directory", { path: "." }),
      toolReply("list_directory", { path: "." }),
      toolReply("list_directory", { path: "." }),
      toolReply("task_complete", { summary: "Looked." }),
    ]);

    await runAgentTask(
      "The original request",
      session,
      deps(model, undefined, { maxMessages: 4 })
    );

    const lastRequest = model.requests[3];
    expect(lastRequest).toHaveLength(4);
    expect(lastRequest[0].role).toBe("system");
    expect(lastRequest[1]).toEqual({ role: "user", content: "The original request" });
  });
});
