import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import { expandHome } from "../tools/file-operations.js";
import { COMMAND_HELP } from "../utils/ui.js";
import { getTokenStats } from "../ai/api-calls.js";
import type { Session } from "../core/session.js";

export type CommandLevel = "info" | "success" | "error";

export interface SlashCommandResult {
  /** Leave the REPL */
  exit: boolean;
  output?: string;
  level?: CommandLevel;
  /** New model name the caller should switch the chat model to */
  switchModel?: string;
}

export function isSlashCommand(input: string): boolean {
  return input.trim().startsWith("/");
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function changeDirectory(
  target: string,
  session: Session
): Promise<SlashCommandResult> {
  if (!target) {
    return { exit: false, level: "info", output: `Current directory: ${session.cwd}` };
  }

  const next = resolve(session.cwd, expandHome(target));
  if (!(await isDirectory(next))) {
    return { exit: false, level: "error", output: `Not a directory: ${next}` };
  }

  session.cwd = next;
  session.reset();
  return {
    exit: false,
    level: "success",
    output: `Changed directory to: ${next} (conversation cleared)`,
  };
}

function changeModel(name: string, session: Session): SlashCommandResult {
  if (!name) {
    return {
      exit: false,
      level: "info",
      output: `Current model: ${session.modelName} (${session.provider})\nUsage: /model <name>`,
    };
  }
  session.modelName = name;
  return {
    exit: false,
    level: "success",
    output: `Switched to model: ${name}`,
    switchModel: name,
  };
}

function helpText(): string {
  return [
    "Commands:",
    ...COMMAND_HELP.map(([command, description]) => `  ${command.padEnd(8)} - ${description}`),
  ].join("\n");
}

/**
 * Handle one REPL line starting with "/". Command names are matched
 * case-insensitively; the argument is the rest of the line.
 */
export async function executeSlashCommand(
  input: string,
  session: Session
): Promise<SlashCommandResult> {
  const trimmed = input.trim();
  const space = trimmed.search(/\s/);
  const command = (space === -1 ? trimmed : trimmed.slice(0, space)).toLowerCase();
  const argument = space === -1 ? "" : trimmed.slice(space).trim();

  switch (command) {
    case "/exit":
    case "/quit":
      return { exit: true };

    case "/clear":
      session.reset();
      return { exit: false, level: "success", output: "Conversation cleared" };

    case "/model":
      return changeModel(argument, session);

    case "/cd":
      return changeDirectory(argument, session);

    case "/help":
      return { exit: false, level: "info", output: helpText() };

    case "/tokens": {
      const stats = getTokenStats();
      return {
        exit: false,
        level: "info",
        output: `${stats.totalCalls} calls, ${stats.totalInputTokens} input / ${stats.totalOutputTokens} output tokens, ${session.historyLength} messages in history`,
      };
    }

    default:
      return { exit: false, level: "error", output: `Unknown command: ${command}` };
  }
}
