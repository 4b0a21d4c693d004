import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { log } from "./logger.js";
import type { LlmBackend } from "./llm.js";
import { slug } from "./slug.js";
import type { TokenCounter } from "./tokenizer.js";
import { splitByTokens } from "./transcript/chunker.js";
import { DeltaExtractor } from "./transcript/extractor.js";
import type { ChunkExtraction, LedgerConfig } from "./types.js";
import type { WorldLedger } from "./world/ledger.js";

const RECAP_INSTRUCTIONS = "You are a concise narrator for a tabletop role-playing campaign.";

export interface SessionReport {
  transcriptPath: string;
  chunkCount: number;
  /** Chunks that produced neither a summary nor deltas. */
  emptyChunks: number;
  applied: number;
  created: number;
  summaryPath: string;
}

export interface SessionProcessorOptions {
  config: Pick<
    LedgerConfig,
    | "extractionModel"
    | "extractionTemperature"
    | "summaryModel"
    | "summaryTemperature"
    | "transcriptChunkTokens"
    | "extractionConcurrency"
    | "sessionSummaryDir"
  >;
  llm: LlmBackend;
  ledger: WorldLedger;
  counter?: TokenCounter;
  now?: () => Date;
}

/** `{date}_{slug(stem)}.md` inside `dir`; the date is the local calendar day. */
export function summaryFilePath(dir: string, transcriptPath: string, date: Date): string {
  const stem = slug(path.parse(transcriptPath).name) || "session";
  const yyyy = String(date.getFullYear());
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return path.join(dir, `${yyyy}-${mm}-${dd}_${stem}.md`);
}

export function numberedSummaries(summaries: string[]): string {
  return summaries.map((s, i) => `${i + 1}. ${s}`).join("\n\n");
}

/** Map with at most `limit` calls in flight; results keep input order. */
async function mapInOrder<T, R>(items: T[], limit: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  async function worker(): Promise<void> {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i], i);
    }
  }
  const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Transcript → windows → per-window extraction → chronological merge into
 * the world ledger → one recap file per transcript.
 */
export class SessionProcessor {
  private readonly extractor: DeltaExtractor;

  constructor(private readonly options: SessionProcessorOptions) {
    this.extractor = new DeltaExtractor(options.llm, options.config);
  }

  async process(transcriptPath: string): Promise<SessionReport> {
    const { config, ledger } = this.options;
    const text = await readFile(transcriptPath, "utf-8");
    const chunks = splitByTokens(text, config.transcriptChunkTokens, this.options.counter);
    log.info(`${path.basename(transcriptPath)}: ${chunks.length} chunk(s) to analyze`);

    const results = await mapInOrder(chunks, config.extractionConcurrency, async (chunk, i) => {
      const result = await this.extractor.extract(chunk);
      log.debug(`chunk ${i + 1}/${chunks.length}: ${result.deltas.length} deltas`);
      return result;
    });

    // Merges are strictly chronological: later chunks overwrite earlier ones.
    let applied = 0;
    let created = 0;
    for (const result of results) {
      const outcomes = await ledger.apply(result.deltas);
      applied += outcomes.length;
      created += outcomes.filter((o) => o.created).length;
    }

    const summaries = results.map((r) => r.summary).filter((s) => s.length > 0);
    const recap = await this.composeRecap(summaries);
    const now = this.options.now ?? (() => new Date());
    const summaryPath = summaryFilePath(config.sessionSummaryDir, transcriptPath, now());
    await mkdir(path.dirname(summaryPath), { recursive: true });
    await writeFile(summaryPath, recap + "\n", "utf-8");
    log.info(`session processed: ${applied} deltas applied (${created} new); summary saved to ${summaryPath}`);

    return {
      transcriptPath,
      chunkCount: chunks.length,
      emptyChunks: results.filter(isEmpty).length,
      applied,
      created,
      summaryPath,
    };
  }

  /**
   * Combine the ordered chunk summaries into one recap. Falls back to the
   * numbered list when the backend fails or returns nothing.
   */
  async composeRecap(summaries: string[]): Promise<string> {
    if (summaries.length === 0) return "";
    const numbered = numberedSummaries(summaries);
    try {
      const recap = await this.options.llm.text({
        model: this.options.config.summaryModel,
        instructions: RECAP_INSTRUCTIONS,
        input:
          "Combine the following ordered chunk summaries into one coherent " +
          "recap of at most 200 words, preserving chronology.\n\n" +
          numbered,
        temperature: this.options.config.summaryTemperature,
      });
      if (recap.trim().length > 0) return recap.trim();
      log.warn("session recap came back empty; writing chunk summaries instead");
    } catch (err) {
      log.error("session recap failed; writing chunk summaries instead", err);
    }
    return numbered;
  }
}

function isEmpty(result: ChunkExtraction): boolean {
  return result.summary.length === 0 && result.deltas.length === 0;
}
