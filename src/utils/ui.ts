import chalk from "chalk";
import { spinner, log as clackLog } from "@clack/prompts";

const ARG_PREVIEW_CHARS = 100;

/**
 * What the agent loop shows the user. The terminal implementation is
 * `ui`; tests pass a recorder.
 */
export interface AgentUI {
  thinking(iteration: number, maxIterations: number): void;
  token(delta: string): void;
  endStream(): void;
  explanation(text: string): void;
  toolCall(name: string, args: Record<string, unknown>): void;
  toolResult(result: string, maxLines: number): void;
  skipped(): void;
  taskComplete(summary: string): void;
  answer(text: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export function formatToolCall(
  name: string,
  args: Record<string, unknown>
): string[] {
  const lines = [`🔧 Tool: ${name}`];
  for (const [key, value] of Object.entries(args)) {
    const text = typeof value === "string" ? value : JSON.stringify(value);
    const display =
      text.length < ARG_PREVIEW_CHARS
        ? text
        : text.slice(0, ARG_PREVIEW_CHARS) + "...";
    lines.push(`   ${key}: ${display}`);
  }
  return lines;
}

export function formatToolResult(result: string, maxLines = 20): string {
  const lines = result.split("\n");
  if (lines.length > maxLines) {
    return (
      lines.slice(0, maxLines).join("\n") +
      `\n... (${lines.length - maxLines} more lines)`
    );
  }
  return result;
}

/**
 * Cut a tool result down to what is worth putting back into the context.
 */
export function clipForModel(result: string, maxChars: number): string {
  if (result.length <= maxChars) return result;
  return (
    result.slice(0, maxChars) +
    `\n... (truncated ${result.length - maxChars} characters)`
  );
}

export interface BannerInfo {
  cwd: string;
  provider: string;
  model: string;
  baseUrl?: string;
}

export const COMMAND_HELP: Array<[string, string]> = [
  ["/clear", "Clear conversation history"],
  ["/model", "Change model"],
  ["/cd", "Change working directory"],
  ["/tokens", "Show token usage"],
  ["/help", "Show commands"],
  ["/exit", "Exit the agent"],
];

class UIManager implements AgentUI {
  private streaming = false;
  private currentSpinner: ReturnType<typeof spinner> | null = null;

  banner(info: BannerInfo) {
    console.log(chalk.cyan.bold("\n🤖 Local Code Agent\n"));
    console.log(chalk.cyan("Commands:"));
    for (const [command, description] of COMMAND_HELP) {
      console.log(chalk.cyan(`  ${command.padEnd(8)} - ${description}`));
    }
    console.log("");
    console.log(chalk.green(`📂 Working directory: ${info.cwd}`));
    console.log(chalk.green(`🧠 Model: ${info.model} (${info.provider})`));
    if (info.provider === "ollama" && info.baseUrl) {
      console.log(chalk.green(`🔗 Ollama URL: ${info.baseUrl}`));
    }
    console.log("");
  }

  separator() {
    console.log(chalk.blue("═".repeat(60)));
  }

  thinking(iteration: number, maxIterations: number) {
    console.log(chalk.blue(`\n${"─".repeat(50)}`));
    this.currentSpinner = spinner();
    this.currentSpinner.start(
      chalk.magenta(`Thinking... (iteration ${iteration}/${maxIterations})`)
    );
  }

  private stopSpinner() {
    if (this.currentSpinner) {
      this.currentSpinner.stop(chalk.magenta("🤖 Response:"));
      this.currentSpinner = null;
    }
  }

  token(delta: string) {
    this.stopSpinner();
    this.streaming = true;
    process.stdout.write(delta);
  }

  endStream() {
    this.stopSpinner();
    if (this.streaming) {
      process.stdout.write("\n");
      this.streaming = false;
    }
  }

  explanation(text: string) {
    console.log(`\n💭 ${text}`);
  }

  toolCall(name: string, args: Record<string, unknown>) {
    const [header, ...rest] = formatToolCall(name, args);
    console.log(chalk.cyan.bold(`\n${header}`));
    for (const line of rest) {
      console.log(chalk.cyan(line));
    }
  }

  toolResult(result: string, maxLines: number) {
    console.log(chalk.green(`📤 Result:\n${formatToolResult(result, maxLines)}`));
  }

  skipped() {
    console.log(chalk.yellow("⏭️  Skipped"));
  }

  taskComplete(summary: string) {
    console.log(chalk.green.bold(`\n✅ Task Complete: ${summary}`));
  }

  answer(text: string) {
    console.log(`\n💬 ${text}`);
  }

  info(message: string) {
    clackLog.info(message);
  }

  success(message: string) {
    clackLog.success(message);
  }

  warning(message: string) {
    this.stopSpinner();
    clackLog.warn(message);
  }

  error(message: string) {
    this.stopSpinner();
    clackLog.error(message);
  }
}

// Singleton instance
export const ui = new UIManager();
