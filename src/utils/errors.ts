/**
 * Error types and user-facing descriptions for failures that end a run.
 * Tool failures are not errors here: tools report them to the model as text.
 */

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class ModelRequestError extends Error {
  readonly provider: string;
  readonly model: string;

  constructor(
    message: string,
    details: { provider: string; model: string; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = "ModelRequestError";
    this.provider = details.provider;
    this.model = details.model;
  }
}

function collectMessages(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  // Follow the cause chain; fetch failures hide the errno two levels down
  for (let depth = 0; current !== undefined && current !== null && depth < 5; depth++) {
    if (current instanceof Error) {
      parts.push(current.message);
      if ("code" in current && typeof current.code === "string") {
        parts.push(current.code);
      }
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }
  return parts.join(" | ").toLowerCase();
}

export function isConnectionError(error: unknown): boolean {
  const text = collectMessages(error);
  return ["econnrefused", "enotfound", "ehostunreach", "fetch failed", "cannot connect"].some(
    (pattern) => text.includes(pattern)
  );
}

export function isTimeoutError(error: unknown): boolean {
  const text = collectMessages(error);
  return text.includes("timed out") || text.includes("timeout") || text.includes("aborted");
}

export function isModelNotFoundError(error: unknown): boolean {
  const text = collectMessages(error);
  return text.includes("not found") && text.includes("model");
}

/**
 * One line telling the user what went wrong with the model server and what to try.
 */
export function describeModelError(
  error: unknown,
  fallback: { provider: string; model: string; baseUrl: string }
): string {
  // The failing request knows which model it was sent to
  const target =
    error instanceof ModelRequestError
      ? { ...fallback, provider: error.provider, model: error.model }
      : fallback;
  if (target.provider === "ollama" && isConnectionError(error)) {
    return `Cannot reach Ollama at ${target.baseUrl}. Is "ollama serve" running?`;
  }
  if (isModelNotFoundError(error)) {
    return target.provider === "ollama"
      ? `Model "${target.model}" is not available. Try: ollama pull ${target.model}`
      : `Model "${target.model}" is not available from ${target.provider}.`;
  }
  if (isTimeoutError(error)) {
    return `The ${target.provider} request for "${target.model}" timed out.`;
  }
  if (isConnectionError(error)) {
    return `Cannot reach the ${target.provider} API.`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `Model request failed: ${message}`;
}
