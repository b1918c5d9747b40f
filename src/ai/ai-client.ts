import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { createOllama } from "ai-sdk-ollama";
import type { LanguageModel } from "ai";
import {
  DEFAULT_MODELS,
  DEFAULT_OLLAMA_URL,
  type AIProvider,
} from "../config/config.js";

export type { AIProvider };

export interface AIClientConfig {
  provider: AIProvider;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  contextTokens?: number;
}

// API keys come from the environment (OPENAI_API_KEY, ANTHROPIC_API_KEY,
// GOOGLE_GENERATIVE_AI_API_KEY); Ollama needs none.
export const REQUIRED_ENV_VARS: Record<AIProvider, string | null> = {
  ollama: null,
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
};

const providerConfigs: Record<
  AIProvider,
  {
    createModel: (model: string, baseUrl?: string, contextTokens?: number) => LanguageModel;
  }
> = {
  ollama: {
    // num_ctx must be a model setting; per-call providerOptions never reach Ollama
    createModel: (model, baseUrl, contextTokens) =>
      createOllama({ baseURL: baseUrl ?? DEFAULT_OLLAMA_URL })(
        model,
        contextTokens ? { options: { num_ctx: contextTokens } } : undefined
      ),
  },
  openai: {
    createModel: (model) => openai(model),
  },
  anthropic: {
    createModel: (model) => anthropic(model),
  },
  google: {
    createModel: (model) => google(model),
  },
};

export class AIClient {
  private model: LanguageModel;
  private provider: AIProvider;
  private modelName: string;
  private baseUrl: string;
  private temperature: number;
  private contextTokens: number | undefined;

  constructor(config: AIClientConfig) {
    this.provider = config.provider;
    this.modelName = config.model || DEFAULT_MODELS[config.provider];
    this.baseUrl = config.baseUrl ?? DEFAULT_OLLAMA_URL;
    this.temperature = config.temperature ?? 0.2;
    this.contextTokens = config.contextTokens;

    this.model = providerConfigs[config.provider].createModel(
      this.modelName,
      this.baseUrl,
      this.contextTokens
    );
  }

  getModel(): LanguageModel {
    return this.model;
  }

  getProvider(): AIProvider {
    return this.provider;
  }

  getModelName(): string {
    return this.modelName;
  }

  getTemperature(): number {
    return this.temperature;
  }

  /** A client for another model on the same provider and server. */
  withModel(model: string): AIClient {
    return new AIClient({
      provider: this.provider,
      model,
      baseUrl: this.baseUrl,
      temperature: this.temperature,
      contextTokens: this.contextTokens,
    });
  }
}

/**
 * The environment variable the provider needs that is not set, if any.
 */
export function missingApiKey(
  provider: AIProvider,
  env: Record<string, string | undefined> = process.env
): string | null {
  const required = REQUIRED_ENV_VARS[provider];
  return required && !env[required] ? required : null;
}
