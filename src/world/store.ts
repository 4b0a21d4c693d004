import path from "node:path";
import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { z } from "zod";
import { log } from "../logger.js";
import type { Faction, Location, Npc } from "../types.js";
import { WorldState } from "./state.js";

// On-disk records use snake_case keys; missing optional fields default and
// unknown keys pass through to the entity's `extra`.
const text = z.string().default("");
const ids = z.array(z.string()).default([]);

const LocationRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: text,
  type: z.string().default("Location"),
  parent_location: text,
  city_manager: text,
  security_provider: text,
  region: text,
  factions: ids,
  events: ids,
}).passthrough();

const NpcRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: text,
  role: z.string().default("NPC"),
  affiliation: text,
  location: text,
  home_location: text,
  current_location: text,
  notes: text,
  relationships: z.record(z.string()).default({}),
}).passthrough();

const FactionRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: text,
  type: z.string().default("gang"),
}).passthrough();

type LocationRecord = z.infer<typeof LocationRecordSchema>;
type NpcRecord = z.infer<typeof NpcRecordSchema>;
type FactionRecord = z.infer<typeof FactionRecordSchema>;

export interface WorldStateFile {
  locations: LocationRecord[];
  factions: FactionRecord[];
  npcs: NpcRecord[];
}

type RecordShape = Record<string, unknown>;

function extraKeys(record: RecordShape, shape: RecordShape): { extra?: RecordShape } {
  const extra = Object.fromEntries(Object.entries(record).filter(([key]) => !(key in shape)));
  return Object.keys(extra).length > 0 ? { extra } : {};
}

function locationToRecord(l: Location): LocationRecord {
  return {
    ...l.extra,
    id: l.id,
    name: l.name,
    description: l.description,
    type: l.type,
    parent_location: l.parentLocation,
    city_manager: l.cityManager,
    security_provider: l.securityProvider,
    region: l.region,
    factions: [...l.factions],
    events: [...l.events],
  };
}

function locationFromRecord(r: LocationRecord): Location {
  return {
    id: r.id,
    name: r.name,
    description: r.description,
    type: r.type,
    parentLocation: r.parent_location,
    cityManager: r.city_manager,
    securityProvider: r.security_provider,
    region: r.region,
    factions: r.factions,
    events: r.events,
    ...extraKeys(r, LocationRecordSchema.shape),
  };
}

function npcToRecord(n: Npc): NpcRecord {
  return {
    ...n.extra,
    id: n.id,
    name: n.name,
    description: n.description,
    role: n.role,
    affiliation: n.affiliation,
    location: n.location,
    home_location: n.homeLocation,
    current_location: n.currentLocation,
    notes: n.notes,
    relationships: { ...n.relationships },
  };
}

function npcFromRecord(r: NpcRecord): Npc {
  return {
    id: r.id,
    name: r.name,
    description: r.description,
    role: r.role,
    affiliation: r.affiliation,
    location: r.location,
    homeLocation: r.home_location,
    currentLocation: r.current_location,
    notes: r.notes,
    relationships: r.relationships,
    ...extraKeys(r, NpcRecordSchema.shape),
  };
}

function factionToRecord(f: Faction): FactionRecord {
  return { ...f.extra, id: f.id, name: f.name, description: f.description, type: f.type };
}

function factionFromRecord(r: FactionRecord): Faction {
  return {
    id: r.id,
    name: r.name,
    description: r.description,
    type: r.type,
    ...extraKeys(r, FactionRecordSchema.shape),
  };
}

export function toFile(state: WorldState): WorldStateFile {
  return {
    locations: [...state.locations.values()].map(locationToRecord),
    factions: [...state.factions.values()].map(factionToRecord),
    npcs: [...state.npcs.values()].map(npcToRecord),
  };
}

function readCollection<T>(
  raw: Record<string, unknown>,
  key: keyof WorldStateFile,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  filePath: string,
): T[] {
  const list = raw[key];
  if (list === undefined) return [];
  if (!Array.isArray(list)) {
    log.warn(`${filePath}: "${key}" is not an array; treating as empty`);
    return [];
  }
  const out: T[] = [];
  list.forEach((item, i) => {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      out.push(parsed.data);
    } else {
      log.warn(`${filePath}: skipping invalid ${key}[${i}]: ${parsed.error.issues[0]?.message ?? "invalid record"}`);
    }
  });
  return out;
}

export function fromFile(raw: Record<string, unknown>, filePath: string): WorldState {
  const state = WorldState.empty();
  for (const r of readCollection(raw, "locations", LocationRecordSchema, filePath)) {
    state.locations.set(r.id, locationFromRecord(r));
  }
  for (const r of readCollection(raw, "factions", FactionRecordSchema, filePath)) {
    state.factions.set(r.id, factionFromRecord(r));
  }
  for (const r of readCollection(raw, "npcs", NpcRecordSchema, filePath)) {
    state.npcs.set(r.id, npcFromRecord(r));
  }
  return state;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * JSON file persistence for the world state. Every save rewrites the whole
 * file through a temp file and a rename, so a reader never sees half of it.
 */
export class WorldStateStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<WorldState> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissing(err)) {
        const state = WorldState.empty();
        await this.save(state);
        log.info(`created empty world state at ${this.filePath}`);
        return state;
      }
      log.warn(`cannot read ${this.filePath}; starting from an empty world state`, err);
      return WorldState.empty();
    }

    if (raw.trim().length === 0) {
      log.warn(`${this.filePath} is empty; starting from an empty world state`);
      return WorldState.empty();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      log.warn(`ignoring malformed JSON in ${this.filePath}:`, err);
      return WorldState.empty();
    }
    if (!isRecord(parsed)) {
      log.warn(`${this.filePath} does not hold a JSON object; starting from an empty world state`);
      return WorldState.empty();
    }

    const state = fromFile(parsed, this.filePath);
    const c = state.counts();
    log.debug(`loaded world state: ${c.location} locations, ${c.faction} factions, ${c.npc} npcs`);
    return state;
  }

  async save(state: WorldState): Promise<void> {
    const dir = path.dirname(this.filePath);
    await mkdir(dir, { recursive: true });
    const tmp = path.join(dir, `.${path.basename(this.filePath)}.${randomUUID()}.tmp`);
    try {
      await writeFile(tmp, JSON.stringify(toFile(state), null, 2) + "\n", "utf-8");
      await rename(tmp, this.filePath);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
