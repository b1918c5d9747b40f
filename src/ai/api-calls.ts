import { streamText, type ModelMessage } from "ai";
import type { Span } from "@opentelemetry/api";
import { LogConfig, log } from "../utils/logging.js";
import { ModelRequestError } from "../utils/errors.js";
import { AIClient } from "./ai-client.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ChatResult {
  text: string;
  usage?: TokenUsage;
}

export interface ChatOptions {
  /** Called with every text fragment as it arrives */
  onToken?: (delta: string) => void;
  signal?: AbortSignal;
  span?: Span;
}

/**
 * Anything that can answer a conversation. The agent loop only talks to
 * the model through this.
 */
export interface ChatModel {
  readonly provider: string;
  readonly modelName: string;
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResult>;
}

// Global token tracking
let totalInputTokens = 0;
let totalOutputTokens = 0;
let totalCalls = 0;

export function getTokenStats() {
  return {
    totalInputTokens,
    totalOutputTokens,
    totalTokens: totalInputTokens + totalOutputTokens,
    totalCalls,
  };
}

export function resetTokenStats() {
  totalInputTokens = 0;
  totalOutputTokens = 0;
  totalCalls = 0;
}

export function recordTokenUsage(usage: TokenUsage | undefined) {
  totalCalls += 1;
  if (usage) {
    totalInputTokens += usage.inputTokens;
    totalOutputTokens += usage.outputTokens;
  }
}

export function formatTokenSummary(
  tokenStats: ReturnType<typeof getTokenStats>
): string[] {
  const average =
    tokenStats.totalCalls > 0
      ? Math.round(tokenStats.totalTokens / tokenStats.totalCalls)
      : 0;
  return [
    "📊 TOKEN USAGE SUMMARY:",
    `   Total API Calls: ${tokenStats.totalCalls}`,
    `   Input Tokens: ${tokenStats.totalInputTokens.toLocaleString("en-US")}`,
    `   Output Tokens: ${tokenStats.totalOutputTokens.toLocaleString("en-US")}`,
    `   Total Tokens: ${tokenStats.totalTokens.toLocaleString("en-US")}`,
    `   Average per Call: ${average} tokens`,
  ];
}

export function displayTokenSummary(
  tokenStats: ReturnType<typeof getTokenStats>
) {
  console.log("\n" + formatTokenSummary(tokenStats).join("\n") + "\n");
}

/**
 * The slice of history sent to the model. When the history is longer
 * than `maxMessages` it keeps the system prompt, the pinned message (the
 * request that opened the current task) and the newest messages.
 */
export function boundTranscript(
  messages: ChatMessage[],
  maxMessages: number,
  pinnedIndex?: number
): ChatMessage[] {
  if (messages.length <= maxMessages) {
    return messages;
  }

  const head: ChatMessage[] = [];
  if (messages[0]?.role === "system") {
    head.push(messages[0]);
  }
  let tailStart = messages.length - Math.max(1, maxMessages - head.length);

  // The pinned message only needs a slot of its own when it fell out of the window
  if (
    pinnedIndex !== undefined &&
    pinnedIndex >= head.length &&
    pinnedIndex < tailStart
  ) {
    head.push(messages[pinnedIndex]);
    tailStart = Math.min(messages.length - 1, tailStart + 1);
  }

  const tail = messages.slice(tailStart);
  return [...head, ...tail];
}

function toModelMessages(messages: ChatMessage[]): {
  system: string | undefined;
  messages: ModelMessage[];
} {
  const system = messages
    .filter((m) => m.role === "system")
    .map((m) => m.content)
    .join("\n\n");
  const rest: ModelMessage[] = messages
    .filter((m) => m.role !== "system")
    .map((m): ModelMessage =>
      m.role === "user"
        ? { role: "user", content: m.content }
        : { role: "assistant", content: m.content }
    );
  return { system: system || undefined, messages: rest };
}

export interface AIChatModelOptions {
  timeoutMs?: number;
  maxRetries?: number;
  maxOutputTokens?: number;
  logConfig?: LogConfig;
}

/**
 * ChatModel backed by the AI SDK. Streams the reply, retries with
 * exponential backoff as long as nothing has been streamed yet, and
 * counts tokens.
 */
export class AIChatModel implements ChatModel {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly maxOutputTokens: number;
  private readonly logConfig: LogConfig;

  constructor(private readonly client: AIClient, options: AIChatModelOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.maxOutputTokens = options.maxOutputTokens ?? 4000;
    this.logConfig = options.logConfig ?? { enabled: false };
  }

  get provider(): string {
    return this.client.getProvider();
  }

  get modelName(): string {
    return this.client.getModelName();
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResult> {
    const { system, messages: modelMessages } = toModelMessages(messages);
    const label = this.provider.toUpperCase();
    const attempts = this.maxRetries + 1;
    let lastError: unknown;

    if (options.span) {
      options.span.setAttribute("ai.call.provider", this.provider);
      options.span.setAttribute("ai.call.model_name", this.modelName);
      options.span.setAttribute("ai.call.message_count", modelMessages.length);
      options.span.setAttribute("ai.call.system_prompt_length", system?.length ?? 0);
    }

    for (let attempt = 1; attempt <= attempts; attempt++) {
      let emitted = false;
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeoutMs);
      const onOuterAbort = () => controller.abort();
      options.signal?.addEventListener("abort", onOuterAbort, { once: true });

      try {
        log(
          this.logConfig,
          "model",
          `Making ${label} API call (attempt ${attempt}/${attempts})...`,
          { model: this.modelName, messageCount: modelMessages.length }
        );

        const result = streamText({
          model: this.client.getModel(),
          system,
          messages: modelMessages,
          temperature: this.client.getTemperature(),
          maxOutputTokens: this.maxOutputTokens,
          maxRetries: 0,
          abortSignal: controller.signal,
        });

        let text = "";
        for await (const part of result.fullStream) {
          if (part.type === "text-delta") {
            text += part.text;
            emitted = true;
            options.onToken?.(part.text);
          } else if (part.type === "error") {
            throw part.error;
          }
        }

        const usage = await result.totalUsage;
        const tokens: TokenUsage = {
          inputTokens: usage.inputTokens ?? 0,
          outputTokens: usage.outputTokens ?? 0,
          totalTokens:
            usage.totalTokens ?? (usage.inputTokens ?? 0) + (usage.outputTokens ?? 0),
        };
        recordTokenUsage(tokens);

        if (options.span) {
          options.span.setAttribute("ai.call.tokens.input", tokens.inputTokens);
          options.span.setAttribute("ai.call.tokens.output", tokens.outputTokens);
          options.span.setAttribute("ai.call.response.length", text.length);
          options.span.setAttribute("ai.call.attempt", attempt);
        }

        log(this.logConfig, "model", `${label} API call completed successfully`, {
          tokens,
          cumulative: getTokenStats(),
        });

        return { text, usage: tokens };
      } catch (error) {
        lastError = controller.signal.aborted && !options.signal?.aborted
          ? new Error(`${label} API call timed out after ${this.timeoutMs / 1000} seconds`, { cause: error })
          : error;

        log(this.logConfig, "model", `${label} API call attempt ${attempt} failed`, {
          error: lastError,
        });

        // A partial reply has already been shown; retrying would duplicate it
        if (emitted || options.signal?.aborted || attempt === attempts) {
          break;
        }

        const waitTime = Math.min(1000 * Math.pow(2, attempt - 1), 10000);
        log(this.logConfig, "model", `Retrying in ${waitTime}ms...`);
        await new Promise((resolve) => setTimeout(resolve, waitTime));
      } finally {
        clearTimeout(timer);
        options.signal?.removeEventListener("abort", onOuterAbort);
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new ModelRequestError(
      `${label} request for "${this.modelName}" failed: ${reason}`,
      { provider: this.provider, model: this.modelName, cause: lastError }
    );
  }
}
