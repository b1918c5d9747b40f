import { buildSystemPrompt } from "../ai/prompts.js";
import type { ChatMessage } from "../ai/api-calls.js";

/**
 * State that lives across requests in one REPL: the working directory, the
 * model and the conversation history. The first message is always the
 * system prompt built for the current directory.
 */
export class Session {
  messages: ChatMessage[] = [];
  /** Index of the user message that opened the task in progress */
  pinnedIndex: number | undefined;

  constructor(
    public cwd: string,
    public provider: string,
    public modelName: string
  ) {
    this.reset();
  }

  reset() {
    this.messages = [{ role: "system", content: buildSystemPrompt(this.cwd) }];
    this.pinnedIndex = undefined;
  }

  /** Number of messages after the system prompt. */
  get historyLength(): number {
    return this.messages.length - 1;
  }

  append(message: ChatMessage) {
    this.messages.push(message);
  }

  startTask(request: string) {
    this.messages.push({ role: "user", content: request });
    this.pinnedIndex = this.messages.length - 1;
  }
}
