#!/usr/bin/env node

import { text, isCancel, log as clackLog } from "@clack/prompts";
import { createProgram, buildLogConfig, type CliOptions } from "./commands/program.js";
import {
  executeSlashCommand,
  isSlashCommand,
  type SlashCommandResult,
} from "./commands/slash-commands.js";
import { resolveConfig, type AgentConfig } from "./config/config.js";
import { AIClient, missingApiKey } from "./ai/ai-client.js";
import { AIChatModel, getTokenStats, displayTokenSummary } from "./ai/api-calls.js";
import { runAgentTask, type AgentDeps, type AgentOutcome } from "./core/agent.js";
import { AutoApprover, InteractiveApprover } from "./core/approval.js";
import { Session } from "./core/session.js";
import { ConfigError, describeModelError } from "./utils/errors.js";
import { LogConfig, logError } from "./utils/logging.js";
import {
  initObservability,
  recordErrorSpan,
  shutdownObservability,
  withSpan,
} from "./utils/observability.js";
import { ui } from "./utils/ui.js";

async function exit(code: number): Promise<never> {
  if (getTokenStats().totalCalls > 0) {
    displayTokenSummary(getTokenStats());
  }
  await shutdownObservability();
  process.exit(code);
}

function createChatModel(client: AIClient, config: AgentConfig, logConfig: LogConfig) {
  return new AIChatModel(client, {
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    logConfig,
  });
}

function showCommandResult(result: SlashCommandResult) {
  if (!result.output) return;
  switch (result.level) {
    case "error":
      ui.error(result.output);
      break;
    case "success":
      ui.success(result.output);
      break;
    default:
      ui.info(result.output);
  }
}

function exitCodeFor(outcome: AgentOutcome): number {
  return outcome === "max_iterations" ? 1 : 0;
}

async function repl(
  session: Session,
  deps: AgentDeps,
  initialClient: AIClient,
  config: AgentConfig,
  logConfig: LogConfig
) {
  let client = initialClient;

  for (;;) {
    const input = await text({
      message: "You",
      placeholder: "Describe a task, or /help",
    });

    if (isCancel(input)) {
      break;
    }

    const request = input.trim();
    if (!request) continue;

    if (isSlashCommand(request)) {
      const result = await executeSlashCommand(request, session);
      showCommandResult(result);
      if (result.exit) break;
      if (result.switchModel) {
        client = client.withModel(result.switchModel);
        deps.model = createChatModel(client, config, logConfig);
      }
      continue;
    }

    const result = await runAgentTask(request, session, deps);
    if (result.outcome === "quit") break;
    ui.separator();
  }

  clackLog.info("Goodbye!");
}

async function main() {
  const program = createProgram().parse();
  const options = program.opts<CliOptions>();

  await initObservability({ serviceName: "local-code-agent" });

  let config: AgentConfig;
  try {
    config = resolveConfig(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      clackLog.error(error.message);
      return exit(1);
    }
    throw error;
  }

  const missing = missingApiKey(config.provider);
  if (missing) {
    await recordErrorSpan(new Error(`${missing} environment variable is not set`), "missing_api_key", {
      provider: config.provider,
      required_env_var: missing,
    });
    clackLog.error(`${missing} not set`);
    clackLog.info(`Set: export ${missing}="your-key"`);
    return exit(1);
  }

  const logConfig = buildLogConfig(options);
  const client = new AIClient({
    provider: config.provider,
    model: config.model,
    baseUrl: config.baseUrl,
    temperature: config.temperature,
    contextTokens: config.contextTokens,
  });

  const session = new Session(process.cwd(), config.provider, config.model);
  const deps: AgentDeps = {
    model: createChatModel(client, config, logConfig),
    approver: config.autoApproveAll ? new AutoApprover() : new InteractiveApprover(),
    ui,
    config,
    logConfig,
  };

  const { prompt } = options;

  try {
    if (prompt) {
      const result = await withSpan("agent.cli.run", async (span) => {
        if (span) {
          span.setAttribute("agent.cli.prompt_length", prompt.length);
          span.setAttribute("agent.cli.provider", config.provider);
          span.setAttribute("agent.cli.model", config.model);
        }
        return runAgentTask(prompt, session, deps);
      });
      return exit(exitCodeFor(result.outcome));
    }

    ui.banner({
      cwd: session.cwd,
      provider: config.provider,
      model: config.model,
      baseUrl: config.baseUrl,
    });
    await repl(session, deps, client, config, logConfig);
    return exit(0);
  } catch (error) {
    const current = {
      provider: deps.model.provider,
      model: deps.model.modelName,
      baseUrl: config.baseUrl,
    };
    ui.error(describeModelError(error, current));
    await logError(logConfig, "Agent run failed", error, { model: current.model });
    return exit(1);
  }
}

process.on("unhandledRejection", async (reason) => {
  clackLog.error("Unhandled rejection");
  await recordErrorSpan(
    reason instanceof Error ? reason : new Error(String(reason)),
    "unhandled_rejection",
    { reason_type: typeof reason }
  );
  await shutdownObservability();
  process.exit(1);
});

main().catch(async (error) => {
  clackLog.error(`CLI execution failed: ${error instanceof Error ? error.message : String(error)}`);
  await recordErrorSpan(error, "cli_execution_failed");
  await shutdownObservability();
  process.exit(1);
});
