import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { loadRulebooks } from "../src/rulebook/loader.js";
import { captureLogs, makeTempDir } from "./helpers.js";

test("loadRulebooks reads page dumps recursively and skips invalid files", async () => {
  const logs = captureLogs();
  const dir = await makeTempDir("rulebooks");
  try {
    await writeFile(
      path.join(dir, "core.json"),
      JSON.stringify({ pages: ["page one", "page two"], toc: [{ title: "Combat", page: 2 }] }),
    );
    await writeFile(path.join(dir, "broken.json"), "{not json");
    await writeFile(path.join(dir, "wrong-shape.json"), JSON.stringify({ pages: "nope" }));
    await writeFile(path.join(dir, "notes.txt"), "ignored");
    await mkdir(path.join(dir, "extra"));
    await writeFile(
      path.join(dir, "extra", "street.json"),
      JSON.stringify({ name: "Street Stories.pdf", pages: ["only page"] }),
    );

    const docs = await loadRulebooks(dir);

    assert.deepEqual(docs, [
      { name: "core.pdf", pages: ["page one", "page two"], toc: [{ level: 1, title: "Combat", page: 2 }] },
      { name: "Street Stories.pdf", pages: ["only page"], toc: [] },
    ]);
    assert.equal(logs.warn.length, 2);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
