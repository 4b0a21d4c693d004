import { log } from "../logger.js";
import { ConfigurationError } from "../errors.js";
import type { LlmBackend } from "../llm.js";
import type { LedgerConfig, RulebookChunk, RulebookDocument, SearchHit } from "../types.js";
import { chunkDocument } from "./chunker.js";
import type { Embedder } from "./embedder.js";
import type { VectorStore } from "./vector-store.js";

export const NOT_COVERED_ANSWER =
  "The indexed rulebooks do not cover this question.";

const ANSWER_INSTRUCTIONS = `You are a tabletop role-playing game rules assistant. Answer the user's question using only the rules passages provided with it.

Rules:
- Cite every rule you use as (source document, page, chapter), exactly as given in the passage header
- Do not invent rules, numbers or page references
- If the passages do not cover the question, or are unclear about it, say so explicitly`;

export interface RulebookIndexOptions {
  config: Pick<LedgerConfig, "embedBatchSize" | "searchTopK" | "answerModel" | "answerTemperature">;
  store: VectorStore;
  /** Needed by `build`, `search` and `answer`; `pageChunks` works without it. */
  embedder: Embedder | null;
  /** Needed only by `answer`; search works without it. */
  llm?: LlmBackend | null;
}

export function formatPassages(hits: SearchHit[]): string {
  return hits
    .map((h) => `${h.sourceDocument} [p.${h.page} - ${h.chapter}]\n${h.text}`)
    .join("\n\n");
}

export class RulebookIndex {
  private readonly store: VectorStore;
  private readonly embedder: Embedder | null;
  private readonly llm: LlmBackend | null;
  private building: Promise<void> | null = null;

  constructor(private readonly options: RulebookIndexOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.llm = options.llm ?? null;
  }

  size(): number {
    return this.store.count();
  }

  /**
   * Chunk, embed and store every document, unless the index already holds
   * entries. Concurrent callers on the same instance share one build.
   */
  async build(documents: RulebookDocument[]): Promise<void> {
    if (this.building) return this.building;
    this.building = this.runBuild(documents).finally(() => {
      this.building = null;
    });
    return this.building;
  }

  private requireEmbedder(): Embedder {
    if (!this.embedder) {
      throw new ConfigurationError("no embedding backend configured (set embeddingBaseUrl or an OpenAI API key); the rulebook index cannot embed text");
    }
    return this.embedder;
  }

  private async runBuild(documents: RulebookDocument[]): Promise<void> {
    const existing = this.store.count();
    if (existing > 0) {
      log.info(`rulebook index already holds ${existing} chunks; skipping rebuild`);
      return;
    }
    const embedder = this.requireEmbedder();

    const batchSize = Math.max(1, this.options.config.embedBatchSize);
    let batch: RulebookChunk[] = [];
    let total = 0;

    const flush = async (): Promise<void> => {
      if (batch.length === 0) return;
      const vectors = await embedder.embed(batch.map((c) => c.text));
      if (vectors.length !== batch.length) {
        throw new Error(`embedder returned ${vectors.length} vectors for ${batch.length} chunks`);
      }
      this.store.upsert(batch.map((chunk, i) => ({ chunk, embedding: vectors[i] })));
      total += batch.length;
      batch = [];
    };

    try {
      for (const doc of documents) {
        const chunks = chunkDocument(doc);
        log.debug(`${doc.name}: ${chunks.length} chunks from ${doc.pages.length} pages`);
        for (const chunk of chunks) {
          batch.push(chunk);
          if (batch.length === batchSize) await flush();
        }
      }
      await flush();
    } catch (err) {
      // A half-built index would pass the populated check on the next run.
      this.store.clear();
      log.error("rulebook index build failed; index cleared", err);
      throw err;
    }

    log.info(`rulebook index ready: ${total} chunks from ${documents.length} document(s)`);
  }

  async search(query: string, k: number = this.options.config.searchTopK): Promise<SearchHit[]> {
    if (this.store.count() === 0) {
      log.debug("search on empty rulebook index");
      return [];
    }
    const [queryVector] = await this.requireEmbedder().embed([query]);
    if (!queryVector) return [];
    return this.store.query(queryVector, k).map(({ chunk, score }) => ({
      text: chunk.text,
      page: chunk.page,
      chapter: chunk.chapter,
      sourceDocument: chunk.sourceDocument,
      score,
    }));
  }

  /**
   * Answer a rules question from the top-k passages, with citations.
   * Throws ConfigurationError when no LLM backend is configured.
   */
  async answer(
    query: string,
    k: number = this.options.config.searchTopK,
    temperature: number = this.options.config.answerTemperature,
  ): Promise<string> {
    if (!this.llm) {
      throw new ConfigurationError("no LLM backend configured; grounded answers are unavailable (search still works)");
    }
    const hits = await this.search(query, k);
    if (hits.length === 0) return NOT_COVERED_ANSWER;

    return this.llm.text({
      model: this.options.config.answerModel,
      instructions: ANSWER_INSTRUCTIONS,
      input: `${query}\n\nRelevant rules:\n${formatPassages(hits)}`,
      temperature,
    });
  }

  /** Every chunk stored for one page of one document, in stored order. */
  pageChunks(sourceDocument: string, page: number): string[] {
    return this.store.filter({ sourceDocument, page }).map((c) => c.text);
  }
}
