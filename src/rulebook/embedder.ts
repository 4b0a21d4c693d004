import OpenAI from "openai";
import { z } from "zod";
import { log } from "../logger.js";
import type { LedgerConfig } from "../types.js";
import { ConfigurationError } from "../errors.js";

const EMBEDDING_TIMEOUT_MS = 60_000;

export interface Embedder {
  /** One vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

export class OpenAiEmbedder implements Embedder {
  private readonly client: OpenAI;

  constructor(private readonly config: LedgerConfig) {
    if (!config.openaiApiKey) {
      throw new ConfigurationError("no OpenAI API key configured; cannot compute embeddings");
    }
    this.client = new OpenAI({
      apiKey: config.openaiApiKey,
      ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
    });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const res = await this.client.embeddings.create({
      model: this.config.embeddingModel,
      input: texts,
    });
    // `index` ties each vector back to its input.
    const sorted = [...res.data].sort((a, b) => a.index - b.index);
    if (sorted.length !== texts.length) {
      throw new Error(`embedding response has ${sorted.length} vectors for ${texts.length} inputs`);
    }
    return sorted.map((d) => d.embedding);
  }
}

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

/**
 * Client for any OpenAI-compatible `/embeddings` endpoint, such as a local
 * model server. Sends the bearer token only when one is configured.
 */
export class HttpEmbedder implements Embedder {
  private readonly url: string;

  constructor(
    baseUrl: string,
    private readonly model: string,
    private readonly apiKey?: string,
  ) {
    this.url = `${baseUrl.replace(/\/+$/, "")}/embeddings`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    const abort = new AbortController();
    const timeout = setTimeout(() => abort.abort(), EMBEDDING_TIMEOUT_MS);
    let response: Response;
    try {
      log.debug(`embedding ${texts.length} texts via ${this.url}`);
      response = await fetch(this.url, {
        method: "POST",
        headers,
        body: JSON.stringify({ model: this.model, input: texts }),
        signal: abort.signal,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new Error(`embedding request failed: ${response.status} ${response.statusText}`);
    }
    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`embedding response from ${this.url} is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    const sorted = [...parsed.data.data].sort((a, b) => a.index - b.index);
    if (sorted.length !== texts.length) {
      throw new Error(`embedding response has ${sorted.length} vectors for ${texts.length} inputs`);
    }
    return sorted.map((d) => d.embedding);
  }
}

/**
 * Embedder for the current config: the dedicated embeddings endpoint when
 * one is set, else OpenAI, else null.
 */
export function createEmbedder(config: LedgerConfig): Embedder | null {
  if (config.embeddingBaseUrl) {
    return new HttpEmbedder(config.embeddingBaseUrl, config.embeddingModel, config.embeddingApiKey);
  }
  return config.openaiApiKey ? new OpenAiEmbedder(config) : null;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const n = Math.min(a.length, b.length);
  if (n === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}
