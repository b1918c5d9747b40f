import { execa, ExecaError } from "execa";
import type { ToolContext } from "./file-operations.js";

const MAX_STDOUT_CHARS = 100_000;
const MAX_STDERR_CHARS = 50_000;

export interface CommandResult {
  ok: boolean;
  code: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  signal?: string;
  /** Why the process failed, when it did */
  error?: string;
}

export async function run_cmd(
  command: string,
  opts: { cwd: string; timeoutMs?: number }
): Promise<CommandResult> {
  const res = await execa(command, {
    shell: true,
    cwd: opts.cwd,
    timeout: opts.timeoutMs ?? 60_000,
    reject: false,
    stdin: "ignore",
  });
  return {
    ok: !res.failed,
    code: res.exitCode,
    stdout: res.stdout.slice(0, MAX_STDOUT_CHARS),
    stderr: res.stderr.slice(0, MAX_STDERR_CHARS),
    timedOut: res.timedOut,
    signal: res.signal,
    error: res instanceof ExecaError ? res.shortMessage : undefined,
  };
}

/**
 * Combine a command's streams into the single block the model sees.
 */
export function formatCommandOutput(result: CommandResult): string {
  let output = result.stdout;
  if (result.stderr) {
    output += output ? `\n[stderr]: ${result.stderr}` : `[stderr]: ${result.stderr}`;
  }
  if (result.code !== undefined && result.code !== 0) {
    output += `\n[exit code: ${result.code}]`;
  } else if (result.signal) {
    output += `\n[terminated by ${result.signal}]`;
  }
  const trimmed = output.trim();
  return trimmed ? trimmed : "(no output)";
}

export async function run_command(
  command: string,
  ctx: ToolContext & { timeoutMs: number }
): Promise<string> {
  try {
    const result = await run_cmd(command, {
      cwd: ctx.cwd,
      timeoutMs: ctx.timeoutMs,
    });
    if (result.timedOut) {
      return `Error: Command timed out after ${ctx.timeoutMs / 1000} seconds`;
    }
    if (!result.ok && result.code === undefined && !result.signal) {
      return `Error running command: ${result.error ?? "the shell did not start"}`;
    }
    return formatCommandOutput(result);
  } catch (err) {
    return `Error running command: ${err instanceof Error ? err.message : String(err)}`;
  }
}
