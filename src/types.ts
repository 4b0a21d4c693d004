export interface LedgerConfig {
  openaiApiKey: string | undefined;
  openaiBaseUrl: string | undefined;
  /** OpenAI-compatible embeddings endpoint; when set, search needs no OpenAI key. */
  embeddingBaseUrl: string | undefined;
  /** Bearer token for `embeddingBaseUrl`, if the endpoint wants one. */
  embeddingApiKey: string | undefined;
  dataDir: string;
  worldStatePath: string;
  sessionSummaryDir: string;
  rulebookDir: string;
  vectorDbPath: string;
  embeddingModel: string;
  answerModel: string;
  extractionModel: string;
  summaryModel: string;
  /** Texts per embedding request while building the rulebook index. */
  embedBatchSize: number;
  searchTopK: number;
  answerTemperature: number;
  extractionTemperature: number;
  summaryTemperature: number;
  /** Token budget of one transcript window sent to extraction. */
  transcriptChunkTokens: number;
  /** Extraction calls allowed in flight at once. Merges stay sequential. */
  extractionConcurrency: number;
  debug: boolean;
}

// ---------------------------------------------------------------------------
// Rulebooks
// ---------------------------------------------------------------------------

export interface TocEntry {
  level: number;
  title: string;
  /** 1-based page where the entry starts. */
  page: number;
}

export interface RulebookDocument {
  name: string;
  /** Raw text per page, index 0 is page 1. */
  pages: string[];
  toc: TocEntry[];
}

export interface RulebookChunk {
  id: string;
  text: string;
  page: number;
  chapter: string;
  sourceDocument: string;
}

export interface SearchHit {
  text: string;
  page: number;
  chapter: string;
  sourceDocument: string;
  score: number;
}

// ---------------------------------------------------------------------------
// World state
// ---------------------------------------------------------------------------

export type EntityKind = "location" | "npc" | "faction";

interface EntityBase {
  /** Keys of the stored record this model does not know, written back unchanged. */
  extra?: Record<string, unknown>;
}

export interface Location extends EntityBase {
  id: string;
  name: string;
  description: string;
  /** "Location" or "SubLocation". */
  type: string;
  parentLocation: string;
  cityManager: string;
  securityProvider: string;
  region: string;
  factions: string[];
  events: string[];
}

export interface Npc extends EntityBase {
  id: string;
  name: string;
  description: string;
  role: string;
  /** Faction id. */
  affiliation: string;
  location: string;
  homeLocation: string;
  currentLocation: string;
  notes: string;
  /** NPC id → how they relate. */
  relationships: Record<string, string>;
}

export interface Faction extends EntityBase {
  id: string;
  name: string;
  description: string;
  type: string;
}

export interface LocationDelta {
  name: string;
  description: string;
  region?: string;
  /** Name of the enclosing location. */
  parent?: string;
}

export interface NpcDelta {
  name: string;
  description: string;
  role?: string;
  /** Faction name. */
  faction?: string;
  /** Name of the location the NPC is usually found at. */
  home?: string;
  /** Name of the location the NPC was last seen at. */
  location?: string;
}

export interface FactionDelta {
  name: string;
  description: string;
  type?: string;
}

export type EntityDelta =
  | { kind: "location"; fields: LocationDelta }
  | { kind: "npc"; fields: NpcDelta }
  | { kind: "faction"; fields: FactionDelta };

export interface ChunkExtraction {
  summary: string;
  deltas: EntityDelta[];
}
