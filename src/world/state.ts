import type { EntityKind, Faction, Location, Npc } from "../types.js";

export function defaultLocation(id: string, name: string): Location {
  return {
    id,
    name,
    description: "",
    type: "Location",
    parentLocation: "",
    cityManager: "",
    securityProvider: "",
    region: "",
    factions: [],
    events: [],
  };
}

export function defaultNpc(id: string, name: string): Npc {
  return {
    id,
    name,
    description: "",
    role: "NPC",
    affiliation: "",
    location: "",
    homeLocation: "",
    currentLocation: "",
    notes: "",
    relationships: {},
  };
}

export function defaultFaction(id: string, name: string): Faction {
  return { id, name, description: "", type: "gang" };
}

/**
 * In-memory campaign world: three id-keyed collections. References between
 * entities are plain ids and may point at records that do not exist yet.
 */
export class WorldState {
  readonly locations = new Map<string, Location>();
  readonly factions = new Map<string, Faction>();
  readonly npcs = new Map<string, Npc>();

  static empty(): WorldState {
    return new WorldState();
  }

  counts(): Record<EntityKind, number> {
    return {
      location: this.locations.size,
      faction: this.factions.size,
      npc: this.npcs.size,
    };
  }

  /** Delete by id; returns false when nothing was stored under it. */
  remove(kind: EntityKind, id: string): boolean {
    switch (kind) {
      case "location":
        return this.locations.delete(id);
      case "faction":
        return this.factions.delete(id);
      case "npc":
        return this.npcs.delete(id);
    }
  }

  childrenOf(parentId: string): Location[] {
    return [...this.locations.values()].filter((l) => l.parentLocation === parentId);
  }

  /**
   * Parent chain of a location, nearest first, excluding the location
   * itself. Stops at a dangling parent id or at the first id seen twice,
   * so malformed (cyclic) data still terminates.
   */
  ancestry(id: string): Location[] {
    const chain: Location[] = [];
    const seen = new Set<string>([id]);
    let parentId = this.locations.get(id)?.parentLocation ?? "";
    while (parentId && !seen.has(parentId)) {
      const parent = this.locations.get(parentId);
      if (!parent) break;
      chain.push(parent);
      seen.add(parentId);
      parentId = parent.parentLocation;
    }
    return chain;
  }

  /**
   * Locations with no usable parent: none set, or one that does not exist.
   * Locations caught in a parent cycle have no root; callers that want to
   * show them must walk `locations` directly.
   */
  rootLocations(): Location[] {
    return [...this.locations.values()].filter(
      (l) => !l.parentLocation || !this.locations.has(l.parentLocation),
    );
  }
}

/** Indented location tree; locations stuck in a parent cycle are listed last. */
export function renderLocationTree(state: WorldState): string[] {
  const lines: string[] = [];
  const seen = new Set<string>();
  const walk = (loc: Location, depth: number): void => {
    if (seen.has(loc.id)) return;
    seen.add(loc.id);
    lines.push(`${"  ".repeat(depth)}${loc.name} (${loc.id})`);
    for (const child of state.childrenOf(loc.id)) walk(child, depth + 1);
  };
  for (const root of state.rootLocations()) walk(root, 0);

  const unrooted = [...state.locations.values()].filter((l) => !seen.has(l.id));
  if (unrooted.length > 0) {
    lines.push("(parent cycle)");
    for (const loc of unrooted) walk(loc, 1);
  }
  return lines;
}
