import path from "node:path";
import { readdir, readFile } from "node:fs/promises";
import { z } from "zod";
import { log } from "../logger.js";
import type { RulebookDocument } from "../types.js";

/**
 * Page dump of one rulebook, as written by whatever PDF tool extracted it:
 * one string per page plus the outline.
 */
export const RulebookDumpSchema = z.object({
  name: z.string().min(1).optional(),
  pages: z.array(z.string()),
  toc: z
    .array(
      z.object({
        level: z.number().int().min(1).default(1),
        title: z.string(),
        page: z.number().int().min(1),
      }),
    )
    .default([]),
});

/**
 * Load every `*.json` page dump under `dir` (recursively). The document name
 * defaults to the file name with a `.pdf` extension, which is what search
 * results cite. Files that are not valid dumps are skipped.
 */
export async function loadRulebooks(dir: string): Promise<RulebookDocument[]> {
  const files = await listJsonFiles(dir);
  const docs: RulebookDocument[] = [];

  for (const file of files) {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(file, "utf-8"));
    } catch (err) {
      log.warn(`skipping unreadable rulebook dump ${file}:`, err);
      continue;
    }
    const parsed = RulebookDumpSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`skipping ${file}: ${parsed.error.issues[0]?.message ?? "invalid page dump"}`);
      continue;
    }
    docs.push({
      name: parsed.data.name ?? `${path.basename(file, ".json")}.pdf`,
      pages: parsed.data.pages,
      toc: parsed.data.toc,
    });
  }

  log.debug(`loaded ${docs.length} rulebook(s) from ${dir}`);
  return docs;
}

async function listJsonFiles(rootDir: string): Promise<string[]> {
  const out: string[] = [];
  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const ent of entries) {
      const fp = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        await walk(fp);
      } else if (ent.isFile() && ent.name.endsWith(".json")) {
        out.push(fp);
      }
    }
  }
  await walk(rootDir);
  return out.sort();
}
