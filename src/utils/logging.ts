import * as fs from "node:fs";
import { recordErrorSpan } from "./observability.js";

export type LogCategory =
  | "step"
  | "model"
  | "tool-call"
  | "tool-result"
  | "approval"
  | "error";

export interface LogConfig {
  enabled: boolean;
  logSteps?: boolean;
  logModel?: boolean;
  logToolCalls?: boolean;
  logToolResults?: boolean;
  logApprovals?: boolean;
  logErrors?: boolean;
  fileLogging?: {
    enabled: boolean;
    filePath: string;
  };
}

export const silentLogConfig: LogConfig = { enabled: false };

function serializeError(error: Error): Record<string, unknown> {
  const errorObj: Record<string, unknown> = {
    errorType: "Error",
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause !== undefined) {
    errorObj.cause =
      error.cause instanceof Error ? serializeError(error.cause) : error.cause;
  }
  return errorObj;
}

// Helper function to serialize data including errors
export function serializeLogData(data: unknown): string | null {
  if (data === undefined || data === null) return null;

  try {
    if (data instanceof Error) {
      return JSON.stringify(serializeError(data), null, 2);
    }

    return JSON.stringify(
      data,
      (_key, value: unknown) =>
        value instanceof Error ? serializeError(value) : value,
      2
    );
  } catch (serializationError) {
    return `[Serialization Error: ${serializationError}] Original data: ${String(
      data
    )}`;
  }
}

function shouldLogCategory(category: LogCategory, config: LogConfig): boolean {
  switch (category) {
    case "step":
      return config.logSteps ?? true;
    case "model":
      return config.logModel ?? true;
    case "tool-call":
      return config.logToolCalls ?? true;
    case "tool-result":
      return config.logToolResults ?? true;
    case "approval":
      return config.logApprovals ?? true;
    case "error":
      return config.logErrors ?? true;
  }
}

function resolveFilePath(config: LogConfig): string | undefined {
  if (config.fileLogging?.enabled && config.fileLogging.filePath) {
    return config.fileLogging.filePath;
  }
  if (process.env.AGENT_FILE_LOGGING === "true") {
    return process.env.AGENT_LOG_FILE || "agent-log.txt";
  }
  return undefined;
}

export function log(
  config: LogConfig,
  category: LogCategory,
  message: string,
  data?: unknown
) {
  const consoleLoggingEnabled =
    process.env.AGENT_CONSOLE_LOGGING !== "false" && config.enabled;
  const filePath = resolveFilePath(config);

  if (!consoleLoggingEnabled && !filePath) return;
  if (!shouldLogCategory(category, config)) return;

  const dataLine = serializeLogData(data);

  if (consoleLoggingEnabled) {
    const line = `[${category.toUpperCase()}] ${message}`;
    if (category === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
    if (dataLine) {
      console.log(dataLine);
    }
  }

  if (filePath) {
    const timestamp = new Date().toISOString();
    const logContent =
      `[${timestamp}] [${category.toUpperCase()}] ${message}` +
      (dataLine ? "\n" + dataLine : "") +
      "\n";
    try {
      fs.appendFileSync(filePath, logContent, "utf8");
    } catch (err) {
      console.error("Failed to write to log file:", err);
    }
  }
}

// Convenience function for logging errors
export async function logError(
  config: LogConfig,
  message: string,
  error: unknown,
  additionalData?: Record<string, unknown>
) {
  const errorObj =
    error instanceof Error
      ? serializeError(error)
      : { value: error, type: typeof error };

  log(config, "error", message, { error: errorObj, ...additionalData });

  await recordErrorSpan(error, message.replace(/\s+/g, "_").toLowerCase(), {
    "error.log_message": message,
    ...additionalData,
  });
}
