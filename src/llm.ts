import OpenAI from "openai";
import { zodTextFormat } from "openai/helpers/zod";
import type { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LedgerConfig } from "./types.js";

export interface StructuredRequest {
  model: string;
  instructions: string;
  input: string;
  /** Declared output shape, sent to the backend as a JSON schema. */
  schema: z.ZodTypeAny;
  schemaName: string;
  temperature?: number;
}

export interface TextRequest {
  model: string;
  instructions: string;
  input: string;
  temperature?: number;
}

/**
 * Large-language-model seam. `structured` returns the raw JSON text the
 * backend produced; callers validate it against their own schema.
 */
export interface LlmBackend {
  structured(request: StructuredRequest): Promise<string>;
  text(request: TextRequest): Promise<string>;
}

export class OpenAiBackend implements LlmBackend {
  private readonly client: OpenAI;

  constructor(config: LedgerConfig) {
    if (!config.openaiApiKey) {
      throw new ConfigurationError("no OpenAI API key configured; LLM features are disabled");
    }
    this.client = new OpenAI({
      apiKey: config.openaiApiKey,
      ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
    });
  }

  async structured(request: StructuredRequest): Promise<string> {
    const response = await this.client.responses.create({
      model: request.model,
      instructions: request.instructions,
      input: request.input,
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      text: { format: zodTextFormat(request.schema, request.schemaName) },
    });
    return response.output_text;
  }

  async text(request: TextRequest): Promise<string> {
    const response = await this.client.responses.create({
      model: request.model,
      instructions: request.instructions,
      input: request.input,
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    });
    return response.output_text.trim();
  }
}

/** Backend for the current config, or null when no API key is set. */
export function createLlmBackend(config: LedgerConfig): LlmBackend | null {
  return config.openaiApiKey ? new OpenAiBackend(config) : null;
}
