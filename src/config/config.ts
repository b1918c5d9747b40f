import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

export const AIProviderSchema = z.enum(["ollama", "openai", "anthropic", "google"]);

export type AIProvider = z.infer<typeof AIProviderSchema>;

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";

// Default models for each provider
export const DEFAULT_MODELS: Record<AIProvider, string> = {
  ollama: "qwen2.5-coder:7b",
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
  google: "gemini-2.0-flash",
};

export const AgentConfigSchema = z.object({
  provider: AIProviderSchema,
  model: z.string().min(1, "model name must not be empty"),
  baseUrl: z.string().url(),
  contextTokens: z.number().int().positive(),
  maxIterations: z.number().int().positive(),
  autoApproveReads: z.boolean(),
  autoApproveAll: z.boolean(),
  commandTimeoutMs: z.number().int().positive(),
  requestTimeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().min(0),
  temperature: z.number().min(0).max(2),
  maxMessages: z.number().int().min(3),
  maxToolResultChars: z.number().int().positive(),
  resultPreviewLines: z.number().int().positive(),
  stream: z.boolean(),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

/** Values given on the command line; anything left undefined falls through to env and defaults. */
export interface CliConfigOptions {
  provider?: string;
  model?: string;
  baseUrl?: string;
  contextTokens?: string;
  maxIterations?: string;
  autoApproveReads?: boolean;
  yes?: boolean;
  commandTimeout?: string;
  requestTimeout?: string;
  stream?: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULTS: Omit<AgentConfig, "model"> = {
  provider: "ollama",
  baseUrl: DEFAULT_OLLAMA_URL,
  contextTokens: 8192,
  maxIterations: 20,
  autoApproveReads: true,
  autoApproveAll: false,
  commandTimeoutMs: 60_000,
  requestTimeoutMs: 120_000,
  maxRetries: 2,
  temperature: 0.2,
  maxMessages: 40,
  maxToolResultChars: 20_000,
  resultPreviewLines: 20,
  stream: true,
};

/**
 * OLLAMA_HOST is commonly written as "host:port" without a scheme.
 */
export function normalizeBaseUrl(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, "");
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `http://${trimmed}`;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function parseSeconds(value: string | undefined): number | undefined {
  const seconds = parseNumber(value);
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

function firstDefined<T>(...values: Array<T | undefined>): T | undefined {
  return values.find((value) => value !== undefined);
}

/**
 * Merge defaults, environment variables and command line options (in
 * that order of precedence) and validate the result.
 */
export function resolveConfig(
  cli: CliConfigOptions = {},
  env: Env = process.env
): AgentConfig {
  const provider =
    firstDefined(cli.provider, env.AGENT_PROVIDER) ?? DEFAULTS.provider;
  const rawBaseUrl = firstDefined(
    cli.baseUrl,
    env.OLLAMA_BASE_URL,
    env.OLLAMA_HOST
  );

  const knownProvider = AIProviderSchema.safeParse(provider);

  const candidate = {
    provider,
    model:
      firstDefined(cli.model, env.AGENT_MODEL) ??
      DEFAULT_MODELS[knownProvider.success ? knownProvider.data : "ollama"],
    baseUrl: rawBaseUrl ? normalizeBaseUrl(rawBaseUrl) : DEFAULTS.baseUrl,
    contextTokens:
      firstDefined(
        parseNumber(cli.contextTokens),
        parseNumber(env.AGENT_CONTEXT_TOKENS)
      ) ?? DEFAULTS.contextTokens,
    maxIterations:
      firstDefined(
        parseNumber(cli.maxIterations),
        parseNumber(env.AGENT_MAX_ITERATIONS)
      ) ?? DEFAULTS.maxIterations,
    autoApproveReads:
      firstDefined(
        cli.autoApproveReads === false ? false : undefined,
        parseBoolean(env.AGENT_AUTO_APPROVE_READS)
      ) ?? DEFAULTS.autoApproveReads,
    autoApproveAll: cli.yes ?? DEFAULTS.autoApproveAll,
    commandTimeoutMs:
      parseSeconds(cli.commandTimeout) ?? DEFAULTS.commandTimeoutMs,
    requestTimeoutMs:
      parseSeconds(cli.requestTimeout) ?? DEFAULTS.requestTimeoutMs,
    maxRetries: DEFAULTS.maxRetries,
    temperature: DEFAULTS.temperature,
    maxMessages: DEFAULTS.maxMessages,
    maxToolResultChars: DEFAULTS.maxToolResultChars,
    resultPreviewLines: DEFAULTS.resultPreviewLines,
    stream: cli.stream ?? DEFAULTS.stream,
  };

  const parsed = AgentConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}
