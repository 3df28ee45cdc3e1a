import { ProviderRequestError, RateLimitError } from "../../domain/errors.js";
import { EmbeddingProvider } from "./types.js";

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  embeddingModel: string;
  dimensions: number;
}

interface EmbeddingResponse {
  data: Array<{
    embedding: number[];
    index: number;
  }>;
}

export class OpenAiClient implements EmbeddingProvider {
  constructor(private readonly options: OpenAiClientOptions) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await fetch(`${trimSlash(this.options.baseUrl)}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
        dimensions: this.options.dimensions,
      }),
    });

    if (response.status === 429) {
      throw new RateLimitError(
        `OpenAI embeddings rate limited: ${await response.text()}`,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }

    if (!response.ok) {
      throw new ProviderRequestError(
        response.status,
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as EmbeddingResponse;
    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds : null;
}
