/**
 * LLM Service - Unified interface for OpenAI and Anthropic
 *
 * Provides a single completion API over both providers with:
 * - Text and vision (PNG page image) inputs
 * - Explicit keys and models from AIConfig
 * - A bounded request time, no automatic retries
 * - Usage and latency on every response for tracing
 */

import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";
import { v4 as uuidv4 } from "uuid";
import type { AIProvider } from "@shared/schema";
import { apiKeyFor, modelFor, type AIConfig } from "../config";
import { ConfigurationError, ExtractionProviderError, ProviderTimeoutError, errorMessage } from "../errors";
import { createLogger } from "../logger";

const logger = createLogger("LLM");

// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST/RESPONSE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface LLMRequest {
  system: string;
  prompt: string;
  /** PNG bytes, attached in order */
  images?: Uint8Array[];
  responseFormat?: "text" | "json";
  traceContext?: {
    folder?: string;
    operation?: string;
  };
}

export interface LLMResponse {
  content: string;
  provider: AIProvider;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  latencyMs: number;
  traceData: {
    requestId: string;
    timestamp: string;
    operation?: string;
  };
}

export interface LLMService {
  readonly provider: AIProvider;
  readonly model: string;
  complete(request: LLMRequest): Promise<LLMResponse>;
}

type ProviderResponse = Omit<LLMResponse, "latencyMs" | "traceData">;

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @throws ConfigurationError when the provider has no API key
 */
export function createLLMService(ai: AIConfig, provider: AIProvider = ai.provider): LLMService {
  const apiKey = apiKeyFor(ai, provider);
  if (!apiKey) {
    throw new ConfigurationError(`No API key configured for provider '${provider}'`);
  }
  const model = modelFor(ai, provider);

  // Provider calls are never retried
  const execute: (request: LLMRequest) => Promise<ProviderResponse> =
    provider === "openai"
      ? openAIExecutor(new OpenAI({ apiKey, timeout: ai.timeoutMs, maxRetries: 0 }), model, ai)
      : anthropicExecutor(new Anthropic({ apiKey, timeout: ai.timeoutMs, maxRetries: 0 }), model, ai);

  return {
    provider,
    model,
    async complete(request: LLMRequest): Promise<LLMResponse> {
      const startTime = Date.now();
      const requestId = `llm-${uuidv4()}`;

      try {
        const response = await execute(request);
        logger.debug(
          `${provider} ${response.model} ${request.traceContext?.operation ?? "completion"}: ` +
          `${response.usage.totalTokens} tokens in ${Date.now() - startTime}ms`
        );
        return {
          ...response,
          latencyMs: Date.now() - startTime,
          traceData: {
            requestId,
            timestamp: new Date().toISOString(),
            operation: request.traceContext?.operation,
          },
        };
      } catch (error) {
        const mapped = mapProviderError(provider, error, ai.timeoutMs);
        logger.warn(`${provider} request ${requestId} failed: ${mapped.message}`);
        throw mapped;
      }
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER EXECUTORS
// ═══════════════════════════════════════════════════════════════════════════════

function toBase64(image: Uint8Array): string {
  return Buffer.from(image).toString("base64");
}

function openAIExecutor(client: OpenAI, model: string, ai: AIConfig) {
  return async (request: LLMRequest): Promise<ProviderResponse> => {
    const images = request.images ?? [];
    const userContent: OpenAI.ChatCompletionContentPart[] = [
      { type: "text", text: request.prompt },
      ...images.map((image): OpenAI.ChatCompletionContentPartImage => ({
        type: "image_url",
        image_url: { url: `data:image/png;base64,${toBase64(image)}`, detail: "high" },
      })),
    ];

    const response = await client.chat.completions.create({
      model,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: userContent },
      ],
      temperature: ai.temperature,
      max_tokens: ai.maxTokens,
      response_format: request.responseFormat === "json" ? { type: "json_object" } : undefined,
    });

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new ExtractionProviderError("OpenAI returned an empty completion", "openai");
    }

    return {
      content,
      provider: "openai",
      model: response.model,
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  };
}

function anthropicExecutor(client: Anthropic, model: string, ai: AIConfig) {
  return async (request: LLMRequest): Promise<ProviderResponse> => {
    const images = request.images ?? [];
    const userContent: Anthropic.ContentBlockParam[] = [
      ...images.map((image): Anthropic.ImageBlockParam => ({
        type: "image",
        source: { type: "base64", media_type: "image/png", data: toBase64(image) },
      })),
      { type: "text", text: request.prompt },
    ];

    const response = await client.messages.create({
      model,
      max_tokens: ai.maxTokens,
      temperature: ai.temperature,
      system: request.system,
      messages: [{ role: "user", content: userContent }],
    });

    const textContent = response.content.find(
      (block): block is Anthropic.TextBlock => block.type === "text"
    );
    if (!textContent) {
      throw new ExtractionProviderError("Anthropic returned no text content", "anthropic");
    }

    return {
      content: textContent.text,
      provider: "anthropic",
      model: response.model,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

export function mapProviderError(provider: AIProvider, error: unknown, timeoutMs: number): ExtractionProviderError {
  if (error instanceof ExtractionProviderError) return error;

  if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ProviderTimeoutError(provider, timeoutMs, { cause: error });
  }

  if (error instanceof OpenAI.APIError || error instanceof Anthropic.APIError) {
    const status = typeof error.status === "number" ? error.status : undefined;
    const kind =
      status === 401 || status === 403 ? "authentication failed" :
      status === 429 ? "rate limited" :
      status !== undefined ? `HTTP ${status}` :
      "connection failed";
    return new ExtractionProviderError(`${provider} ${kind}: ${error.message}`, provider, status, { cause: error });
  }

  return new ExtractionProviderError(`${provider} request failed: ${errorMessage(error)}`, provider, undefined, { cause: error });
}

// ═══════════════════════════════════════════════════════════════════════════════
// JSON HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parses model output as JSON, tolerating a surrounding markdown code fence.
 * Throws the underlying SyntaxError on invalid JSON.
 */
export function parseJSONContent(content: string): unknown {
  let jsonContent = content.trim();

  const fenced = jsonContent.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    jsonContent = fenced[1].trim();
  }

  return JSON.parse(jsonContent);
}
