import OpenAI, { APIConnectionTimeoutError, APIError, APIUserAbortError } from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ReasoningConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { PolicyStore } from "../policy/store.js";
import {
  isReasoningFailure,
  MalformedResponse,
  ReasoningTimeout,
  ReasoningUnavailable,
  type ReasoningFailure,
} from "../utils/errors.js";
import { buildDetectionPrompt, buildRequestPrompt } from "./prompt.js";
import { parseAssessment } from "./response.js";
import type {
  CallOptions,
  ChatMessage,
  ReasoningAssessment,
  ReasoningClient,
  RequestContext,
} from "./types.js";

const OLLAMA_BASE_URL = "http://localhost:11434/v1";

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

/**
 * Reasoning over any OpenAI-compatible chat endpoint. Ollama is reached
 * through its OpenAI-compatible API.
 */
export class OpenAIReasoningClient implements ReasoningClient {
  private readonly client: OpenAI | null;

  constructor(
    private readonly config: ReasoningConfig,
    private readonly logger: Logger,
  ) {
    const isOllama = config.provider === "ollama";
    const apiKey = config.apiKey ?? (isOllama ? "ollama" : undefined);

    if (!apiKey) {
      this.logger.warn("No reasoning API key configured; every reasoned verdict will fall back");
      this.client = null;
      return;
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl ?? (isOllama ? OLLAMA_BASE_URL : undefined),
      timeout: config.timeoutMs,
      // Retries are the caller's decision; a failed call falls back instead
      maxRetries: 0,
    });
    this.logger.info({ provider: config.provider, model: config.model }, "Reasoning client ready");
  }

  async analyze(
    request: RequestContext,
    policy: PolicyStore,
    opts?: CallOptions,
  ): Promise<ReasoningAssessment> {
    const content = await this.complete(
      [
        { role: "system", content: buildDetectionPrompt(policy) },
        { role: "user", content: buildRequestPrompt(request) },
      ],
      true,
      opts,
    );
    return parseAssessment(content);
  }

  async converse(messages: readonly ChatMessage[], opts?: CallOptions): Promise<string> {
    return this.complete(messages, false, opts);
  }

  private async complete(
    messages: readonly ChatMessage[],
    json: boolean,
    opts?: CallOptions,
  ): Promise<string> {
    if (!this.client) {
      throw new ReasoningUnavailable("reasoning client has no API key");
    }

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: messages.map(toOpenAIMessage),
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          ...(json ? { response_format: { type: "json_object" as const } } : {}),
        },
        { signal: opts?.signal },
      );
      const content = response.choices[0]?.message.content;
      if (!content) {
        throw new MalformedResponse("reasoning service returned an empty completion");
      }
      return content;
    } catch (err) {
      throw this.mapError(err, opts?.signal);
    }
  }

  private mapError(err: unknown, signal?: AbortSignal): ReasoningFailure {
    if (isReasoningFailure(err)) return err;
    if (err instanceof APIConnectionTimeoutError) {
      return new ReasoningTimeout(this.config.timeoutMs, { cause: err });
    }
    if (err instanceof APIUserAbortError) {
      const reason: unknown = signal?.reason;
      return isReasoningFailure(reason) ? reason : new ReasoningTimeout(this.config.timeoutMs, { cause: err });
    }
    if (err instanceof APIError) {
      return new ReasoningUnavailable(`reasoning service error ${err.status ?? "?"}: ${err.message}`, {
        cause: err,
      });
    }
    return new ReasoningUnavailable(err instanceof Error ? err.message : String(err), { cause: err });
  }
}
