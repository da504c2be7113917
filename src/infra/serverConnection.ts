// src/infra/serverConnection.ts

import * as path from "path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import {
  StdioClientTransport,
  getDefaultEnvironment,
  type StdioServerParameters,
} from "@modelcontextprotocol/sdk/client/stdio.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { infoMessage } from "../common/colors";
import { ConfigurationError, ConnectionError, describeError } from "../common/errors";
import type { ServerProfile } from "../types/schemas";
import { logger } from "./logger";

export const CLIENT_NAME = "mcp-chat-client";
export const CLIENT_VERSION = "1.0.0";

export type ServerTarget =
  | { kind: "script"; scriptPath: string }
  | { kind: "profile"; profile: ServerProfile };

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
}

export interface PromptSummary {
  name: string;
  description?: string;
}

export interface ResourceSummary {
  name: string;
  uri: string;
  description?: string;
}

export interface ToolCallOutcome {
  content: string;
  isError: boolean;
}

/** What the rest of the client needs from a live MCP peer. */
export interface McpSession {
  listTools(): Promise<ToolDescriptor[]>;
  listPrompts(): Promise<PromptSummary[]>;
  listResources(): Promise<ResourceSummary[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<ToolCallOutcome>;
}

export interface ManagedSession extends McpSession {
  close(): Promise<void>;
}

export interface ConnectOptions {
  verbose?: boolean;
}

export function describeTarget(target: ServerTarget): string {
  return target.kind === "profile" ? target.profile.name : target.scriptPath;
}

export function buildLaunchParameters(
  target: ServerTarget,
  platform: NodeJS.Platform = process.platform
): StdioServerParameters {
  if (target.kind === "script") {
    const { scriptPath } = target;
    const extension = path.extname(scriptPath).toLowerCase();
    let command = process.execPath;
    if (![".js", ".mjs", ".cjs"].includes(extension)) {
      // anything that is not a node script goes to the python interpreter
      command = platform === "win32" ? "python" : "python3";
    }
    // legacy scripts are chatty on stderr
    return { command, args: [scriptPath], stderr: "ignore" };
  }

  const { profile } = target;
  if (!profile.command) {
    throw new ConfigurationError(`Server '${profile.name}' has no command configured`);
  }
  return {
    command: profile.command,
    args: [...profile.args],
    env: Object.keys(profile.env).length > 0 ? { ...getDefaultEnvironment(), ...profile.env } : undefined,
  };
}

export function formatConnectionFailure(target: ServerTarget, error: unknown): string {
  let message = `Error: Failed to connect to server: ${describeError(error)}`;
  if (target.kind === "profile" && target.profile.command === "docker") {
    const image = target.profile.docker.image;
    message +=
      "\n\nDocker troubleshooting:\n" +
      "1. Ensure Docker is running: docker info\n" +
      `2. Check if image exists: docker images | grep ${image ?? "mcp"}\n` +
      `3. Pull image if needed: docker pull ${image ?? "mcp/unknown"}\n`;
  }
  return message;
}

export function extractToolOutcome(raw: unknown): ToolCallOutcome {
  const parsed = CallToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Tool result did not match the expected shape", { issues: parsed.error.issues.length });
    return { content: "", isError: false };
  }
  const first = parsed.data.content[0];
  return {
    content: first?.type === "text" ? first.text : "",
    isError: parsed.data.isError ?? false,
  };
}

function createTransport(target: ServerTarget, verbose: boolean): Transport {
  if (target.kind === "profile" && target.profile.transport === "sse") {
    const url = target.profile.args[0];
    if (!url || !url.startsWith("http")) {
      throw new ConfigurationError(`Invalid SSE URL for server ${target.profile.name}: ${url ?? "<missing>"}`);
    }
    if (verbose) {
      console.log(infoMessage(`SSE endpoint: ${url}`));
    }
    return new SSEClientTransport(new URL(url));
  }

  if (target.kind === "profile" && target.profile.transport !== "stdio") {
    throw new ConnectionError(
      `Error: Unsupported transport '${target.profile.transport}' for server ${target.profile.name}`
    );
  }

  const params = buildLaunchParameters(target);
  if (verbose) {
    if (params.command === "docker") {
      console.log(infoMessage(`Starting Docker container: ${(params.args ?? []).join(" ")}`));
    }
    console.log(infoMessage(`Command: ${params.command} ${(params.args ?? []).join(" ")}`));
  }
  return new StdioClientTransport(params);
}

/**
 * One MCP client session over stdio (or SSE) for the lifetime of the CLI run.
 */
export class ServerConnection implements ManagedSession {
  private closed = false;

  private constructor(
    private readonly client: Client,
    readonly label: string
  ) {}

  static async open(target: ServerTarget, options: ConnectOptions = {}): Promise<ServerConnection> {
    const verbose = options.verbose ?? false;
    const label = describeTarget(target);
    if (verbose) {
      console.log(infoMessage(`Connecting to server: ${label}`));
    }

    const transport = createTransport(target, verbose);
    const client = new Client({ name: CLIENT_NAME, version: CLIENT_VERSION }, { capabilities: {} });

    try {
      await client.connect(transport);
    } catch (error) {
      logger.error("MCP handshake failed", { server: label, error: describeError(error) });
      try {
        await client.close();
      } catch (closeError) {
        logger.warn("Failed to release transport after handshake failure", { error: describeError(closeError) });
      }
      throw new ConnectionError(formatConnectionFailure(target, error));
    }

    logger.info("Connected to MCP server", { server: label });
    if (verbose) {
      console.log(infoMessage("✓ Connected successfully"));
    }
    return new ServerConnection(client, label);
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const response = await this.client.listTools();
    return response.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  async listPrompts(): Promise<PromptSummary[]> {
    const response = await this.client.listPrompts();
    return response.prompts.map((prompt) => ({ name: prompt.name, description: prompt.description }));
  }

  async listResources(): Promise<ResourceSummary[]> {
    const response = await this.client.listResources();
    return response.resources.map((resource) => ({
      name: resource.name,
      uri: resource.uri,
      description: resource.description,
    }));
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallOutcome> {
    logger.debug("Calling tool", { server: this.label, tool: name, arguments: args });
    const raw = await this.client.callTool({ name, arguments: args });
    return extractToolOutcome(raw);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.client.close();
    logger.info("Disconnected from MCP server", { server: this.label });
  }
}
