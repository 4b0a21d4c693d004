import test from "node:test";
import assert from "node:assert/strict";
import type { LlmBackend, StructuredRequest, TextRequest } from "../src/llm.js";
import { ChunkResultSchema } from "../src/schemas.js";
import { DeltaExtractor } from "../src/transcript/extractor.js";
import { captureLogs } from "./helpers.js";

const logs = captureLogs();

class ScriptedLlm implements LlmBackend {
  readonly requests: StructuredRequest[] = [];

  constructor(private readonly reply: (request: StructuredRequest) => Promise<string>) {}

  structured(request: StructuredRequest): Promise<string> {
    this.requests.push(request);
    return this.reply(request);
  }

  async text(_request: TextRequest): Promise<string> {
    return "";
  }
}

const CONFIG = { extractionModel: "test-extract-model", extractionTemperature: 0.2 };

test("extract turns a valid response into tagged deltas", async () => {
  const llm = new ScriptedLlm(async () =>
    JSON.stringify({
      summary: "  The crew met Rogue at the Afterlife.  ",
      locations: [{ name: "The Afterlife", description: "Mercenary bar", region: "Watson", parent: null }],
      npcs: [{ name: "Rogue", description: "Queen of the fixers", role: "Fixer", faction: null, home: "The Afterlife" }],
      factions: [{ name: "Tyger Claws", description: "Street gang", type: "gang" }],
    }),
  );

  const result = await new DeltaExtractor(llm, CONFIG).extract("Rogue waved us over to her booth.");

  assert.equal(result.summary, "The crew met Rogue at the Afterlife.");
  assert.deepEqual(result.deltas, [
    {
      kind: "location",
      fields: { name: "The Afterlife", description: "Mercenary bar", region: "Watson", parent: undefined },
    },
    {
      kind: "npc",
      fields: {
        name: "Rogue",
        description: "Queen of the fixers",
        role: "Fixer",
        faction: undefined,
        home: "The Afterlife",
        location: undefined,
      },
    },
    { kind: "faction", fields: { name: "Tyger Claws", description: "Street gang", type: "gang" } },
  ]);
});

test("extract sends the chunk with the declared schema", async () => {
  const llm = new ScriptedLlm(async () => JSON.stringify({ summary: "", locations: [], npcs: [], factions: [] }));
  await new DeltaExtractor(llm, CONFIG).extract("chunk text");

  assert.equal(llm.requests.length, 1);
  const req = llm.requests[0];
  assert.equal(req.input, "chunk text");
  assert.equal(req.model, "test-extract-model");
  assert.equal(req.temperature, 0.2);
  assert.equal(req.schemaName, "chunk_result");
  assert.equal(req.schema, ChunkResultSchema);
  assert.match(req.instructions, /NEW or whose details CHANGED/);
});

test("extract drops entries whose name is blank", async () => {
  const llm = new ScriptedLlm(async () =>
    JSON.stringify({
      summary: "s",
      locations: [{ name: "   ", description: "nowhere" }],
      npcs: [],
      factions: [{ name: "Maelstrom", description: "Chrome-heavy gang" }],
    }),
  );
  const result = await new DeltaExtractor(llm, CONFIG).extract("chunk");
  assert.deepEqual(
    result.deltas.map((d) => `${d.kind}:${d.fields.name}`),
    ["faction:Maelstrom"],
  );
});

test("extract degrades to an empty result on invalid JSON", async () => {
  const before = logs.warn.length;
  const llm = new ScriptedLlm(async () => "[{ not json");
  const result = await new DeltaExtractor(llm, CONFIG).extract("chunk");
  assert.deepEqual(result, { summary: "", deltas: [] });
  assert.equal(logs.warn.length, before + 1);
});

test("extract rejects output that does not match the schema", async () => {
  const before = logs.warn.length;
  const llm = new ScriptedLlm(async () => JSON.stringify({ summary: "s", locations: [] }));
  const result = await new DeltaExtractor(llm, CONFIG).extract("chunk");
  assert.deepEqual(result, { summary: "", deltas: [] });
  assert.equal(logs.warn[before], "[ledger] extraction output failed validation at npcs: Required");
});

test("extract isolates backend failures", async () => {
  const before = logs.error.length;
  const llm = new ScriptedLlm(async () => {
    throw new Error("timeout");
  });
  const result = await new DeltaExtractor(llm, CONFIG).extract("chunk");
  assert.deepEqual(result, { summary: "", deltas: [] });
  assert.equal(logs.error[before], "[ledger] extraction request failed timeout");
});

test("extract skips blank chunks without calling the backend", async () => {
  const llm = new ScriptedLlm(async () => "{}");
  const result = await new DeltaExtractor(llm, CONFIG).extract("   \n ");
  assert.deepEqual(result, { summary: "", deltas: [] });
  assert.equal(llm.requests.length, 0);
});
