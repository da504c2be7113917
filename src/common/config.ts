// src/common/config.ts

import * as fs from "fs";
import * as path from "path";
import { ConfigMalformedError, ConfigNotFoundError, ServerNotFoundError, describeError } from "./errors";
import type { ZodIssue } from "zod";
import { logger } from "../infra/logger";
import {
  ServerConfigDocumentSchema,
  ServerEntrySchema,
  type ServerEntry,
  type ServerProfile,
} from "../types/schemas";

export const DEFAULT_CONFIG_PATH = path.join("conf", "mcp-servers.json");

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
export const DEFAULT_OLLAMA_MODEL = "qwen2.5:7b";
export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";

export type ProviderName = "openai" | "ollama";

export const PROVIDER_NAMES: readonly ProviderName[] = ["openai", "ollama"];

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ProviderSettings {
  openaiApiKey?: string;
  openaiModel: string;
  ollamaBaseUrl: string;
  ollamaModel: string;
}

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export function resolveConfigPath(env: Environment = process.env): string {
  return path.resolve(env.MCP_CONFIG_PATH || DEFAULT_CONFIG_PATH);
}

export function readProviderSettings(env: Environment = process.env): ProviderSettings {
  return {
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    openaiModel: env.OPENAI_MODEL || DEFAULT_OPENAI_MODEL,
    ollamaBaseUrl: env.OLLAMA_BASE_URL || DEFAULT_OLLAMA_BASE_URL,
    ollamaModel: env.OLLAMA_MODEL || DEFAULT_OLLAMA_MODEL,
  };
}

/** The cloud backend wins whenever its credential is present. */
export function detectProvider(env: Environment): ProviderName {
  return env.OPENAI_API_KEY ? "openai" : "ollama";
}

function toProfile(name: string, entry: ServerEntry): ServerProfile {
  return Object.freeze({
    name,
    description: entry.description,
    command: entry.command,
    args: Object.freeze([...entry.args]),
    transport: entry.transport,
    env: Object.freeze({ ...entry.env }),
    docker: Object.freeze({ ...entry.docker }),
    capabilities: Object.freeze({ ...entry.capabilities }),
    mountedDirectories: entry.mounted_directories,
    options: entry.options,
  });
}

function describeIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

const TABLE_WIDTH = 80;

/**
 * Named server profiles read from the `mcpServers` map of a JSON document.
 */
export class ServerRegistry {
  private constructor(
    readonly source: string,
    private readonly profiles: ReadonlyMap<string, ServerProfile>,
    private readonly rejected: ReadonlyMap<string, string> = new Map()
  ) {}

  static load(configPath: string = resolveConfigPath()): ServerRegistry {
    if (!fs.existsSync(configPath)) {
      throw new ConfigNotFoundError(configPath);
    }

    let document: unknown;
    try {
      document = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new ConfigMalformedError(`Invalid JSON in ${configPath}: ${describeError(error)}`);
    }
    return ServerRegistry.fromDocument(document, configPath);
  }

  /**
   * Only a document whose top level or `mcpServers` is not an object fails here.
   * An entry that is not an object is kept aside and fails when `get` asks for it.
   */
  static fromDocument(document: unknown, source: string = "<inline>"): ServerRegistry {
    const parsed = ServerConfigDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new ConfigMalformedError(`Invalid server configuration in ${source}: ${describeIssues(parsed.error.issues)}`);
    }

    const profiles = new Map<string, ServerProfile>();
    const rejected = new Map<string, string>();
    for (const [name, raw] of Object.entries(parsed.data.mcpServers)) {
      const entry = ServerEntrySchema.safeParse(raw);
      if (entry.success) {
        profiles.set(name, toProfile(name, entry.data));
      } else {
        const reason = describeIssues(entry.error.issues);
        logger.warn("Skipping unusable server profile", { source, server: name, reason });
        rejected.set(name, reason);
      }
    }
    return new ServerRegistry(source, profiles, rejected);
  }

  list(): string[] {
    return Array.from(this.profiles.keys()).sort();
  }

  get(name: string): ServerProfile {
    const profile = this.profiles.get(name);
    if (profile) {
      return profile;
    }
    const reason = this.rejected.get(name);
    if (reason !== undefined) {
      throw new ConfigMalformedError(`Invalid configuration for server '${name}' in ${this.source}: ${reason}`);
    }
    throw new ServerNotFoundError(name, this.list());
  }

  all(): ReadonlyMap<string, ServerProfile> {
    return this.profiles;
  }

  formatTable(): string {
    if (this.profiles.size === 0) {
      return "No servers configured";
    }

    const output: string[] = [];
    output.push("");
    output.push("=".repeat(TABLE_WIDTH));
    output.push("Available MCP Servers");
    output.push("=".repeat(TABLE_WIDTH));
    output.push(`${"Name".padEnd(15)} ${"Image".padEnd(20)} Description`);
    output.push("-".repeat(TABLE_WIDTH));

    for (const name of this.list()) {
      const profile = this.get(name);
      const image = profile.docker.image ?? "N/A";
      const description =
        profile.description.length > 45 ? `${profile.description.slice(0, 42)}...` : profile.description;
      output.push(`${name.padEnd(15)} ${image.padEnd(20)} ${description}`.trimEnd());
    }

    output.push("=".repeat(TABLE_WIDTH));
    output.push("");
    output.push(`Total servers configured: ${this.profiles.size}`);
    output.push("");
    output.push("Usage: mcp-client --server <name> --chat");
    output.push("       mcp-client --server <name> --members");
    output.push("");
    return output.join("\n");
  }

  printTable(): void {
    console.log(this.formatTable());
  }
}
