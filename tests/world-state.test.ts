import test from "node:test";
import assert from "node:assert/strict";
import { defaultLocation, renderLocationTree, WorldState } from "../src/world/state.js";

function place(state: WorldState, id: string, parent = ""): void {
  state.locations.set(id, { ...defaultLocation(id, id.toUpperCase()), parentLocation: parent });
}

test("childrenOf lists direct children only", () => {
  const state = WorldState.empty();
  place(state, "night_city");
  place(state, "watson", "night_city");
  place(state, "kabuki", "watson");
  assert.deepEqual(
    state.childrenOf("night_city").map((l) => l.id),
    ["watson"],
  );
});

test("ancestry walks parents nearest first", () => {
  const state = WorldState.empty();
  place(state, "night_city");
  place(state, "watson", "night_city");
  place(state, "kabuki", "watson");
  assert.deepEqual(
    state.ancestry("kabuki").map((l) => l.id),
    ["watson", "night_city"],
  );
});

test("a dangling parent id behaves like a root", () => {
  const state = WorldState.empty();
  place(state, "afterlife", "missing_district");
  assert.deepEqual(state.ancestry("afterlife"), []);
  assert.deepEqual(
    state.rootLocations().map((l) => l.id),
    ["afterlife"],
  );
});

test("parent cycles terminate", () => {
  const state = WorldState.empty();
  place(state, "a", "b");
  place(state, "b", "a");
  place(state, "self", "self");
  assert.deepEqual(
    state.ancestry("a").map((l) => l.id),
    ["b"],
  );
  assert.deepEqual(state.ancestry("self"), []);
  assert.deepEqual(state.rootLocations(), []);
});

test("renderLocationTree nests children and lists cycles last", () => {
  const state = WorldState.empty();
  place(state, "night_city");
  place(state, "watson", "night_city");
  place(state, "a", "b");
  place(state, "b", "a");
  assert.deepEqual(renderLocationTree(state), [
    "NIGHT_CITY (night_city)",
    "  WATSON (watson)",
    "(parent cycle)",
    "  A (a)",
    "    B (b)",
  ]);
});

test("remove reports whether anything was deleted", () => {
  const state = WorldState.empty();
  place(state, "watson");
  assert.equal(state.remove("location", "watson"), true);
  assert.equal(state.remove("location", "watson"), false);
  assert.equal(state.remove("npc", "nobody"), false);
});
