import path from "node:path";
import { mkdirSync } from "node:fs";
import Database from "better-sqlite3";
import type { RulebookChunk } from "../types.js";
import { cosineSimilarity } from "./embedder.js";

export interface StoredVector {
  chunk: RulebookChunk;
  embedding: number[];
}

export interface VectorMatch {
  chunk: RulebookChunk;
  score: number;
}

export interface ChunkFilter {
  sourceDocument?: string;
  page?: number;
}

/**
 * Backing store for the rulebook index: chunks with their embeddings and
 * metadata, queried by vector similarity or by metadata equality.
 */
export interface VectorStore {
  count(): number;
  upsert(rows: StoredVector[]): void;
  query(embedding: number[], k: number): VectorMatch[];
  filter(where: ChunkFilter): RulebookChunk[];
  clear(): void;
  close(): void;
}

export const VECTOR_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS chunks (
  id TEXT PRIMARY KEY,
  source_document TEXT NOT NULL,
  page INTEGER NOT NULL,
  chapter TEXT NOT NULL,
  text TEXT NOT NULL,
  embedding TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS chunks_location ON chunks(source_document, page);
`;

interface ChunkRow {
  id: string;
  source_document: string;
  page: number;
  chapter: string;
  text: string;
  embedding: string;
}

function toChunk(row: ChunkRow): RulebookChunk {
  return {
    id: row.id,
    text: row.text,
    page: row.page,
    chapter: row.chapter,
    sourceDocument: row.source_document,
  };
}

function parseEmbedding(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.map((n) => Number(n)).filter((n) => Number.isFinite(n));
}

/**
 * SQLite-backed store. Similarity is brute-force cosine over every row.
 * Pass ":memory:" for an in-process store.
 */
export class SqliteVectorStore implements VectorStore {
  private readonly db: Database.Database;

  constructor(filePath: string) {
    if (filePath !== ":memory:") {
      mkdirSync(path.dirname(filePath), { recursive: true });
    }
    this.db = new Database(filePath);
    this.db.exec("PRAGMA journal_mode=WAL;");
    this.db.exec(VECTOR_SCHEMA_SQL);
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM chunks").get();
    return row?.n ?? 0;
  }

  upsert(rows: StoredVector[]): void {
    const insert = this.db.prepare(
      "INSERT OR REPLACE INTO chunks(id, source_document, page, chapter, text, embedding) VALUES (?,?,?,?,?,?)",
    );
    const tx = this.db.transaction((batch: StoredVector[]) => {
      for (const { chunk, embedding } of batch) {
        insert.run(
          chunk.id,
          chunk.sourceDocument,
          chunk.page,
          chunk.chapter,
          chunk.text,
          JSON.stringify(embedding),
        );
      }
    });
    tx(rows);
  }

  query(embedding: number[], k: number): VectorMatch[] {
    if (k <= 0) return [];
    const rows = this.db.prepare<[], ChunkRow>("SELECT * FROM chunks").all();
    return rows
      .map((row) => ({
        chunk: toChunk(row),
        score: cosineSimilarity(embedding, parseEmbedding(row.embedding)),
      }))
      .filter((m) => Number.isFinite(m.score))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  filter(where: ChunkFilter): RulebookChunk[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (where.sourceDocument !== undefined) {
      clauses.push("source_document = ?");
      params.push(where.sourceDocument);
    }
    if (where.page !== undefined) {
      clauses.push("page = ?");
      params.push(where.page);
    }
    const sql =
      "SELECT * FROM chunks" +
      (clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "") +
      " ORDER BY source_document, page, rowid";
    return this.db.prepare<Array<string | number>, ChunkRow>(sql).all(...params).map(toChunk);
  }

  clear(): void {
    this.db.exec("DELETE FROM chunks");
  }

  close(): void {
    this.db.close();
  }
}
