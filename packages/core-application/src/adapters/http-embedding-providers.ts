import { z } from "zod";

import type { EmbeddingProvider, EmbeddingVector } from "../ports/embedding-provider";
import type { EmbeddingProviderConfig } from "../application/config";
import { EmbeddingProviderError, TransientNetworkError, describeError } from "../application/errors";
import { withDeadline } from "../infra/deadline";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

type HttpProviderOptions = {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).min(1),
});

const OpenAiEmbeddingsResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().optional() })).min(1),
});

abstract class HttpEmbeddingProvider implements EmbeddingProvider {
  abstract readonly name: string;
  protected readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(protected readonly options: HttpProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  abstract embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector>;

  protected async postJson(endpoint: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

    const deadline = withDeadline(this.options.timeoutMs ?? 30_000, signal);
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: deadline.signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new TransientNetworkError(`${this.name} ${endpoint} unreachable: ${describeError(err)}`, err);
    } finally {
      deadline.dispose();
    }

    if (!response.ok) {
      const payload = await response.text();
      const retryable = response.status === 429 || response.status >= 500;
      throw new EmbeddingProviderError(
        `${this.name} request failed (${response.status}) ${endpoint}: ${payload}`,
        retryable,
        response.status
      );
    }

    return response.json();
  }

  protected parse<T>(schema: z.ZodType<T>, data: unknown, endpoint: string): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new EmbeddingProviderError(`${this.name} ${endpoint} returned an unexpected body`, false);
    }
    return parsed.data;
  }
}

export class OllamaEmbeddingProvider extends HttpEmbeddingProvider {
  readonly name = "ollama";

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
    const data = await this.postJson("/api/embed", { model: this.options.model, input: [text] }, signal);
    const [embedding] = this.parse(OllamaEmbedResponseSchema, data, "/api/embed").embeddings;
    return embedding;
  }
}

export class OpenAiCompatibleEmbeddingProvider extends HttpEmbeddingProvider {
  readonly name = "openai-compatible";

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
    const data = await this.postJson("/embeddings", { model: this.options.model, input: text }, signal);
    const [first] = this.parse(OpenAiEmbeddingsResponseSchema, data, "/embeddings").data;
    return first.embedding;
  }
}

export function createEmbeddingProvider(config: EmbeddingProviderConfig, fetchImpl?: FetchLike): EmbeddingProvider {
  const options: HttpProviderOptions = {
    baseUrl: config.baseUrl,
    model: config.model,
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
    fetch: fetchImpl,
  };
  switch (config.kind) {
    case "ollama":
      return new OllamaEmbeddingProvider(options);
    case "openai-compatible":
      return new OpenAiCompatibleEmbeddingProvider(options);
  }
}
