import { slug } from "../slug.js";
import type {
  EntityDelta,
  EntityKind,
  Faction,
  FactionDelta,
  Location,
  LocationDelta,
  Npc,
  NpcDelta,
} from "../types.js";
import { defaultFaction, defaultLocation, defaultNpc, type WorldState } from "./state.js";

export interface MergeOutcome {
  kind: EntityKind;
  id: string;
  created: boolean;
}

/** A delta value counts only when it carries text. */
function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

function ref(name: string | undefined): string | undefined {
  if (!present(name)) return undefined;
  const id = slug(name);
  return id.length > 0 ? id : undefined;
}

export function updateLocation(target: Location, delta: LocationDelta): Location {
  const next = { ...target };
  if (present(delta.name)) next.name = delta.name.trim();
  if (present(delta.description)) next.description = delta.description.trim();
  if (present(delta.region)) next.region = delta.region.trim();
  const parent = ref(delta.parent);
  if (parent !== undefined) {
    next.parentLocation = parent;
    next.type = "SubLocation";
  }
  return next;
}

export function updateNpc(target: Npc, delta: NpcDelta): Npc {
  const next = { ...target };
  if (present(delta.name)) next.name = delta.name.trim();
  if (present(delta.description)) next.description = delta.description.trim();
  if (present(delta.role)) next.role = delta.role.trim();
  const affiliation = ref(delta.faction);
  if (affiliation !== undefined) next.affiliation = affiliation;
  const home = ref(delta.home);
  if (home !== undefined) {
    next.homeLocation = home;
    next.location = home;
  }
  const current = ref(delta.location);
  if (current !== undefined) next.currentLocation = current;
  return next;
}

export function updateFaction(target: Faction, delta: FactionDelta): Faction {
  const next = { ...target };
  if (present(delta.name)) next.name = delta.name.trim();
  if (present(delta.description)) next.description = delta.description.trim();
  if (present(delta.type)) next.type = delta.type.trim();
  return next;
}

/**
 * Upsert one delta into the state by slugged name. Fields the delta carries
 * overwrite the stored ones; everything else is kept. Returns null when the
 * name slugs to nothing.
 */
export function applyDelta(state: WorldState, delta: EntityDelta): MergeOutcome | null {
  const id = slug(delta.fields.name);
  if (id.length === 0) return null;
  const name = delta.fields.name.trim();

  switch (delta.kind) {
    case "location": {
      const existing = state.locations.get(id);
      state.locations.set(id, updateLocation(existing ?? defaultLocation(id, name), delta.fields));
      return { kind: "location", id, created: existing === undefined };
    }
    case "npc": {
      const existing = state.npcs.get(id);
      state.npcs.set(id, updateNpc(existing ?? defaultNpc(id, name), delta.fields));
      return { kind: "npc", id, created: existing === undefined };
    }
    case "faction": {
      const existing = state.factions.get(id);
      state.factions.set(id, updateFaction(existing ?? defaultFaction(id, name), delta.fields));
      return { kind: "faction", id, created: existing === undefined };
    }
  }
}

/** Apply deltas in order; later deltas win on the fields they touch. */
export function applyDeltas(state: WorldState, deltas: EntityDelta[]): MergeOutcome[] {
  const outcomes: MergeOutcome[] = [];
  for (const delta of deltas) {
    const outcome = applyDelta(state, delta);
    if (outcome) outcomes.push(outcome);
  }
  return outcomes;
}
