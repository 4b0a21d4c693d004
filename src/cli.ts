import { Command, InvalidArgumentError } from "commander";
import { loadConfigFile } from "./config.js";
import { initLogger, log } from "./logger.js";
import { createLlmBackend } from "./llm.js";
import { createEmbedder } from "./rulebook/embedder.js";
import { RulebookIndex } from "./rulebook/index.js";
import { loadRulebooks } from "./rulebook/loader.js";
import { SqliteVectorStore } from "./rulebook/vector-store.js";
import { SessionProcessor } from "./session.js";
import { ConfigurationError } from "./errors.js";
import type { EntityKind, LedgerConfig } from "./types.js";
import { WorldLedger } from "./world/ledger.js";
import { renderLocationTree, type WorldState } from "./world/state.js";

interface GlobalOptions {
  config?: string;
  debug?: boolean;
}

const KINDS: EntityKind[] = ["location", "npc", "faction"];

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

function parseTemperature(value: string): number {
  const n = Number.parseFloat(value);
  if (!Number.isFinite(n) || n < 0 || n > 2) throw new InvalidArgumentError("expected a number between 0 and 2");
  return n;
}

function parseKind(value: string): EntityKind {
  const kind = KINDS.find((k) => k === value.toLowerCase());
  if (!kind) throw new InvalidArgumentError(`expected one of: ${KINDS.join(", ")}`);
  return kind;
}

async function setup(program: Command): Promise<LedgerConfig> {
  const opts = program.opts<GlobalOptions>();
  const cfg = await loadConfigFile(opts.config);
  const debug = cfg.debug || opts.debug === true;
  initLogger(undefined, debug);
  return { ...cfg, debug };
}

async function withIndex<T>(cfg: LedgerConfig, fn: (index: RulebookIndex) => Promise<T>): Promise<T> {
  const store = new SqliteVectorStore(cfg.vectorDbPath);
  try {
    const index = new RulebookIndex({
      config: cfg,
      store,
      embedder: createEmbedder(cfg),
      llm: createLlmBackend(cfg),
    });
    return await fn(index);
  } finally {
    store.close();
  }
}

function printCollection(state: WorldState, kind: EntityKind): void {
  const entities =
    kind === "location"
      ? [...state.locations.values()]
      : kind === "npc"
        ? [...state.npcs.values()]
        : [...state.factions.values()];
  console.log(`=== ${kind} (${entities.length}) ===`);
  for (const e of entities) {
    console.log(`- ${e.name} [${e.id}]${e.description ? `: ${e.description}` : ""}`);
  }
}

export function buildProgram(): Command {
  const program = new Command("ledger")
    .description("Rulebook lookup and campaign world-state ledger")
    .option("--config <path>", "JSON config file")
    .option("--debug", "Verbose logging");

  const index = program.command("index").description("Rulebook semantic index");

  index
    .command("build")
    .description("Chunk and embed every rulebook page dump (skipped when the index is populated)")
    .action(async () => {
      const cfg = await setup(program);
      const docs = await loadRulebooks(cfg.rulebookDir);
      await withIndex(cfg, async (idx) => {
        await idx.build(docs);
        console.log(`Index holds ${idx.size()} chunks.`);
      });
    });

  index
    .command("search")
    .description("Show the closest rule passages")
    .argument("<query>", "Question or keywords")
    .option("-k, --top <n>", "Number of passages", parsePositiveInt)
    .action(async (query: string, opts: { top?: number }) => {
      const cfg = await setup(program);
      const hits = await withIndex(cfg, (idx) => idx.search(query, opts.top ?? cfg.searchTopK));
      if (hits.length === 0) {
        console.log("No passages found (is the index built?).");
        return;
      }
      hits.forEach((h, i) => {
        console.log(`[${i + 1}] ${h.sourceDocument} p.${h.page} (${h.chapter}) score=${h.score.toFixed(3)}`);
        console.log(`${h.text}\n`);
      });
    });

  index
    .command("ask")
    .description("Answer a rules question with citations")
    .argument("<question>", "Rules question")
    .option("-k, --top <n>", "Number of passages", parsePositiveInt)
    .option("-t, --temperature <t>", "Sampling temperature", parseTemperature)
    .action(async (question: string, opts: { top?: number; temperature?: number }) => {
      const cfg = await setup(program);
      const answer = await withIndex(cfg, (idx) =>
        idx.answer(question, opts.top ?? cfg.searchTopK, opts.temperature ?? cfg.answerTemperature),
      );
      console.log(answer);
    });

  index
    .command("page")
    .description("List the chunks stored for one page of one document")
    .argument("<document>", "Source document name, e.g. core-rules.pdf")
    .argument("<page>", "1-based page number", parsePositiveInt)
    .action(async (document: string, page: number) => {
      const cfg = await setup(program);
      const chunks = await withIndex(cfg, async (idx) => idx.pageChunks(document, page));
      if (chunks.length === 0) {
        console.log(`No chunks for ${document} page ${page}`);
        return;
      }
      chunks.forEach((text, i) => console.log(`[${i + 1}/${chunks.length}] ${text}\n`));
    });

  const session = program.command("session").description("Session transcripts");

  session
    .command("process")
    .description("Extract world-state deltas and write a recap for each transcript, in order")
    .argument("<transcripts...>", "Transcript text files")
    .action(async (transcripts: string[]) => {
      const cfg = await setup(program);
      const llm = createLlmBackend(cfg);
      if (!llm) throw new ConfigurationError("session processing needs an OpenAI API key (openaiApiKey or OPENAI_API_KEY)");
      const ledger = await WorldLedger.open(cfg.worldStatePath);
      const processor = new SessionProcessor({ config: cfg, llm, ledger });
      for (const t of transcripts) {
        const report = await processor.process(t);
        console.log(
          `${t}: ${report.chunkCount} chunks, ${report.applied} deltas (${report.created} new), summary → ${report.summaryPath}`,
        );
      }
    });

  const world = program.command("world").description("Inspect or edit the world state");

  world
    .command("show")
    .description("List entities")
    .argument("[kind]", `One of: ${KINDS.join(", ")}`, parseKind)
    .action(async (kind: EntityKind | undefined) => {
      const cfg = await setup(program);
      const ledger = await WorldLedger.open(cfg.worldStatePath);
      for (const k of kind ? [kind] : KINDS) printCollection(ledger.state, k);
    });

  world
    .command("tree")
    .description("Show locations nested under their parents")
    .action(async () => {
      const cfg = await setup(program);
      const ledger = await WorldLedger.open(cfg.worldStatePath);
      for (const line of renderLocationTree(ledger.state)) console.log(line);
    });

  world
    .command("remove")
    .description("Delete one entity by id")
    .argument("<kind>", `One of: ${KINDS.join(", ")}`, parseKind)
    .argument("<id>", "Entity id (slug)")
    .action(async (kind: EntityKind, id: string) => {
      const cfg = await setup(program);
      const ledger = await WorldLedger.open(cfg.worldStatePath);
      const removed = await ledger.remove(kind, id);
      if (removed) console.log(`Removed ${kind} ${id}.`);
      else log.warn(`no ${kind} with id ${id}`);
    });

  return program;
}
