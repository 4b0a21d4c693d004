import { log } from "../logger.js";
import type { LlmBackend } from "../llm.js";
import { ChunkResultSchema, type ChunkResultParsed } from "../schemas.js";
import type { ChunkExtraction, EntityDelta, LedgerConfig } from "../types.js";

export const EXTRACTION_INSTRUCTIONS = `You are a scribe for a tabletop role-playing game session. You receive one chunk of a session transcript.

1. Write a concise summary of what happened in the chunk, in order.
2. List the locations, NPCs and factions the chunk introduces or tells us something new about.

Rules:
- Only include entries that are NEW or whose details CHANGED in this chunk; do not restate background that the chunk merely mentions
- Use each entity's name exactly as it is spoken; do not invent ids, slugs or codes
- Put references to other entities (parent location, faction, home) as their plain names
- Leave optional fields out when the chunk does not establish them
- Follow the supplied schema exactly`;

const empty = (): ChunkExtraction => ({ summary: "", deltas: [] });

function clean(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Flatten the three entity lists into tagged deltas, dropping nameless entries. */
export function toDeltas(result: ChunkResultParsed): EntityDelta[] {
  const deltas: EntityDelta[] = [];
  for (const loc of result.locations) {
    const name = clean(loc.name);
    if (!name) continue;
    deltas.push({
      kind: "location",
      fields: {
        name,
        description: loc.description.trim(),
        region: clean(loc.region),
        parent: clean(loc.parent),
      },
    });
  }
  for (const npc of result.npcs) {
    const name = clean(npc.name);
    if (!name) continue;
    deltas.push({
      kind: "npc",
      fields: {
        name,
        description: npc.description.trim(),
        role: clean(npc.role),
        faction: clean(npc.faction),
        home: clean(npc.home),
        location: clean(npc.location),
      },
    });
  }
  for (const fac of result.factions) {
    const name = clean(fac.name);
    if (!name) continue;
    deltas.push({
      kind: "faction",
      fields: { name, description: fac.description.trim(), type: clean(fac.type) },
    });
  }
  return deltas;
}

/**
 * Turns one transcript chunk into a summary plus world-state deltas.
 * Never throws: a failed or malformed response degrades to an empty result
 * so one bad chunk does not sink the session.
 */
export class DeltaExtractor {
  constructor(
    private readonly llm: LlmBackend,
    private readonly config: Pick<LedgerConfig, "extractionModel" | "extractionTemperature">,
  ) {}

  async extract(chunk: string): Promise<ChunkExtraction> {
    if (chunk.trim().length === 0) {
      log.debug("extraction skipped: empty chunk");
      return empty();
    }

    let raw: string;
    try {
      raw = await this.llm.structured({
        model: this.config.extractionModel,
        instructions: EXTRACTION_INSTRUCTIONS,
        input: chunk,
        schema: ChunkResultSchema,
        schemaName: "chunk_result",
        temperature: this.config.extractionTemperature,
      });
    } catch (err) {
      log.error("extraction request failed", err);
      return empty();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn("extraction returned invalid JSON:", err);
      return empty();
    }

    const parsed = ChunkResultSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      log.warn(
        `extraction output failed validation${issue ? ` at ${issue.path.join(".") || "<root>"}: ${issue.message}` : ""}`,
      );
      return empty();
    }

    const deltas = toDeltas(parsed.data);
    log.debug(`extracted ${deltas.length} deltas`);
    return { summary: parsed.data.summary.trim(), deltas };
  }
}
