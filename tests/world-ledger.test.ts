import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { rm } from "node:fs/promises";
import { WorldLedger } from "../src/world/ledger.js";
import { WorldStateStore } from "../src/world/store.js";
import { captureLogs, makeTempDir } from "./helpers.js";

captureLogs();

test("apply persists every merge to disk", async () => {
  const dir = await makeTempDir("ledger");
  try {
    const file = path.join(dir, "nested", "world_state.json");
    const ledger = await WorldLedger.open(file);
    const outcomes = await ledger.apply([
      { kind: "location", fields: { name: "Afterlife", description: "Bar" } },
      { kind: "npc", fields: { name: "Rogue", description: "Fixer", home: "Afterlife" } },
    ]);
    assert.deepEqual(outcomes, [
      { kind: "location", id: "afterlife", created: true },
      { kind: "npc", id: "rogue", created: true },
    ]);

    const reloaded = await new WorldStateStore(file).load();
    assert.equal(reloaded.locations.get("afterlife")?.description, "Bar");
    assert.equal(reloaded.npcs.get("rogue")?.homeLocation, "afterlife");
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("remove deletes and persists; unknown ids are reported", async () => {
  const dir = await makeTempDir("ledger");
  try {
    const file = path.join(dir, "world_state.json");
    const ledger = await WorldLedger.open(file);
    await ledger.apply([{ kind: "faction", fields: { name: "Maelstrom", description: "Gang" } }]);

    assert.equal(await ledger.remove("faction", "maelstrom"), true);
    assert.equal(await ledger.remove("faction", "maelstrom"), false);
    assert.equal((await new WorldStateStore(file).load()).factions.size, 0);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
