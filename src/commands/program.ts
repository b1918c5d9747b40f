import { Command } from "commander";
import type { CliConfigOptions } from "../config/config.js";
import type { LogConfig } from "../utils/logging.js";

export interface CliOptions extends CliConfigOptions {
  prompt?: string;
  verbose?: boolean;
  logFile?: string;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("local-agent")
    .description(
      "Coding agent for locally hosted models: reads, edits and runs things in your project, asking before it changes anything"
    )
    .version("1.0.0");

  program
    .option("-p, --prompt <task>", "Run one task and exit (skips interactive mode)")
    .option("--provider <provider>", "Model provider (ollama, openai, anthropic, google)")
    .option("-m, --model <model>", "Model to use")
    .option("--base-url <url>", "Ollama server URL")
    .option("--context-tokens <number>", "Context window size passed to Ollama (num_ctx)")
    .option("--max-iterations <number>", "Maximum model turns per task")
    .option("--no-auto-approve-reads", "Ask before read-only tools too")
    .option("-y, --yes", "Run every tool without asking")
    .option("--command-timeout <seconds>", "Timeout for run_command")
    .option("--request-timeout <seconds>", "Timeout for one model request")
    .option("--no-stream", "Do not echo the reply while it is generated")
    .option("--verbose", "Log steps, model calls and tool calls to the console")
    .option("--log-file <path>", "Append the log to a file");

  return program;
}

export function buildLogConfig(options: Pick<CliOptions, "verbose" | "logFile">): LogConfig {
  return {
    enabled: options.verbose === true,
    fileLogging: options.logFile
      ? { enabled: true, filePath: options.logFile }
      : undefined,
  };
}
