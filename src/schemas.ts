import { z } from "zod";

export const LocationDeltaSchema = z.object({
  name: z.string().describe("The location's proper name, as spoken at the table"),
  description: z.string().describe("What was learned about the place in this chunk"),
  region: z
    .string()
    .optional()
    .nullable()
    .describe("District, zone or biome the location sits in"),
  parent: z
    .string()
    .optional()
    .nullable()
    .describe("Name of the larger location this one is inside, if any"),
});

export const NpcDeltaSchema = z.object({
  name: z.string().describe("The NPC's name or handle"),
  description: z.string().describe("What was learned about the NPC in this chunk"),
  role: z.string().optional().nullable().describe("Occupation or role (fixer, medtech, ...)"),
  faction: z.string().optional().nullable().describe("Name of the faction or corporation they belong to"),
  home: z.string().optional().nullable().describe("Name of the location where they are usually found"),
  location: z.string().optional().nullable().describe("Name of the location they were last seen at, if it changed"),
});

export const FactionDeltaSchema = z.object({
  name: z.string().describe("The faction's name"),
  description: z.string().describe("What was learned about the faction in this chunk"),
  type: z.string().optional().nullable().describe("gang, corporation, nomad pack, ..."),
});

export const ChunkResultSchema = z.object({
  summary: z.string().describe("A concise, chronological summary of this transcript chunk"),
  locations: z
    .array(LocationDeltaSchema)
    .describe("Locations that are NEW or whose details CHANGED in this chunk"),
  npcs: z
    .array(NpcDeltaSchema)
    .describe("NPCs that are NEW or whose details CHANGED in this chunk"),
  factions: z
    .array(FactionDeltaSchema)
    .describe("Factions that are NEW or whose details CHANGED in this chunk"),
});

export type ChunkResultParsed = z.infer<typeof ChunkResultSchema>;
