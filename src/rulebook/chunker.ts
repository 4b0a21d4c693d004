import { randomUUID } from "node:crypto";
import type { RulebookChunk, RulebookDocument, TocEntry } from "../types.js";

export const UNKNOWN_CHAPTER = "Unknown";
/** Lines shorter than this are treated like bullet items and merged. */
export const SHORT_LINE_CHARS = 30;
/** Paragraphs shorter than this are headers or layout noise. */
export const MIN_PARAGRAPH_CHARS = 30;

const BULLET_PREFIX = /^[•\-*]/;
const BULLET_STRIP = /^[•\-*]\s*/;
const BULLET_JOIN = " • ";

/**
 * Chapter title for every page (index 0 is page 1). Pages before the first
 * TOC entry fall under "Unknown".
 */
export function buildChapterMap(toc: TocEntry[], pageCount: number): string[] {
  const chapters: string[] = [];
  let current = -1;
  for (let page = 1; page <= pageCount; page++) {
    while (current + 1 < toc.length && toc[current + 1].page <= page) {
      current++;
    }
    chapters.push(current >= 0 ? toc[current].title : UNKNOWN_CHAPTER);
  }
  return chapters;
}

function isShortOrBullet(line: string): boolean {
  return line.length > 0 && (line.length < SHORT_LINE_CHARS || BULLET_PREFIX.test(line));
}

/**
 * Collapse runs of short or bulleted lines into one " • "-joined line so a
 * rulebook list reads as a single passage. Blank lines survive as
 * paragraph breaks.
 */
export function mergeShortLines(pageText: string): string[] {
  const merged: string[] = [];
  let run: string[] = [];

  const flush = (): void => {
    if (run.length === 0) return;
    merged.push(run.join(BULLET_JOIN));
    run = [];
  };

  for (const raw of pageText.split(/\r?\n/)) {
    const line = raw.trim();
    if (isShortOrBullet(line)) {
      run.push(line.replace(BULLET_STRIP, ""));
      continue;
    }
    flush();
    merged.push(line);
  }
  flush();

  return merged;
}

function splitParagraphs(lines: string[]): string[] {
  return lines
    .join("\n")
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length >= MIN_PARAGRAPH_CHARS);
}

export function chunkDocument(doc: RulebookDocument): RulebookChunk[] {
  const chapters = buildChapterMap(doc.toc, doc.pages.length);
  const chunks: RulebookChunk[] = [];

  doc.pages.forEach((pageText, i) => {
    for (const text of splitParagraphs(mergeShortLines(pageText))) {
      chunks.push({
        id: randomUUID(),
        text,
        page: i + 1,
        chapter: chapters[i],
        sourceDocument: doc.name,
      });
    }
  });

  return chunks;
}
