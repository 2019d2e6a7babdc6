// PitchScoop - Completion client
// The scorer talks to the LLM through CompletionClient only. The Azure adapter
// owns the vendor call: deployment name, JSON response mode, timeout and the
// configured retry count. Everything it throws is an ExternalServiceError.

import { AzureOpenAI } from "openai";
import type { AzureOpenAIConfig } from "./config.js";
import { ExternalServiceError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export interface CompletionRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

export interface CompletionClient {
  /** Returns the raw text of the first choice. */
  complete(request: CompletionRequest): Promise<string>;
}

// ─── Chat completions surface (for testability / dependency injection) ─────────

type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

/**
 * The slice of the OpenAI SDK the adapter calls. AzureOpenAI satisfies it, and
 * tests hand in a plain object.
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: ChatMessage[];
        temperature?: number;
        max_tokens?: number;
        response_format?: { type: "json_object" };
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export const COMPLETION_SERVICE = "azure_openai";

export class AzureCompletionClient implements CompletionClient {
  private readonly api: ChatCompletionsApi;
  private readonly deployment: string;
  private readonly logger: Logger;

  constructor(api: ChatCompletionsApi, deployment: string, logger: Logger = silentLogger) {
    this.api = api;
    this.deployment = deployment;
    this.logger = logger;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const startedAt = Date.now();
    let content: string | null | undefined;
    try {
      const response = await this.api.chat.completions.create({
        model: this.deployment,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        response_format: { type: "json_object" },
      });
      content = response.choices[0]?.message?.content;
    } catch (err) {
      this.logger.error("Completion request failed", {
        deployment: this.deployment,
        duration_ms: Date.now() - startedAt,
        error: errorMessage(err),
      });
      throw new ExternalServiceError(
        COMPLETION_SERVICE,
        `Completion request failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    this.logger.debug("Completion received", {
      deployment: this.deployment,
      duration_ms: Date.now() - startedAt,
    });

    if (!content || content.trim() === "") {
      throw new ExternalServiceError(COMPLETION_SERVICE, "Completion returned empty response");
    }
    return content;
  }
}

/** Builds the Azure-backed client from validated configuration. */
export function createAzureCompletionClient(
  config: AzureOpenAIConfig,
  logger: Logger = silentLogger,
): AzureCompletionClient {
  const sdk = new AzureOpenAI({
    endpoint: config.endpoint,
    apiKey: config.apiKey,
    apiVersion: config.apiVersion,
    deployment: config.deployment,
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
  });
  return new AzureCompletionClient(sdk, config.deployment, logger);
}
