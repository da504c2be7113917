// src/types/schemas.ts

import { z } from "zod";

// numbers and booleans in env values or mount entries are kept as their text
const ScalarTextSchema = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

export const DockerSettingsSchema = z
  .object({
    image: z.string().optional().catch(undefined).describe("Container image used to run the server"),
  })
  .passthrough();

/**
 * One `mcpServers` entry. A field of the wrong type falls back to its default
 * so that one sloppy profile never stops the others from loading.
 */
export const ServerEntrySchema = z.object({
  description: z.string().catch("").describe("Human readable summary"),
  command: z.string().catch("").describe("Executable that starts the server"),
  args: z.array(ScalarTextSchema).catch([]).describe("Ordered command arguments"),
  transport: z.string().catch("stdio").describe("stdio or sse"),
  env: z.record(ScalarTextSchema).catch({}).describe("Environment overrides for the server process"),
  docker: DockerSettingsSchema.catch({}),
  capabilities: z.record(z.unknown()).catch({}),
  mounted_directories: z.array(z.record(ScalarTextSchema)).optional().catch(undefined),
  options: z.record(z.unknown()).optional().catch(undefined),
});

export const ServerConfigDocumentSchema = z.object({
  mcpServers: z.record(z.unknown()).default({}),
});

export type DockerSettings = z.infer<typeof DockerSettingsSchema>;
export type ServerEntry = z.infer<typeof ServerEntrySchema>;

export interface ServerProfile {
  readonly name: string;
  readonly description: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly transport: string;
  readonly env: Readonly<Record<string, string>>;
  readonly docker: Readonly<DockerSettings>;
  readonly capabilities: Readonly<Record<string, unknown>>;
  readonly mountedDirectories?: ReadonlyArray<Readonly<Record<string, string>>>;
  readonly options?: Readonly<Record<string, unknown>>;
}
