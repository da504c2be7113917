// src/core/queryHandler.ts

import { decodeToolArguments, formatArguments } from "../common/argumentUtils";
import { describeError } from "../common/errors";
import { logger } from "../infra/logger";
import type { McpSession } from "../infra/serverConnection";

export const MAX_TOKENS = 1000;
export const ASSISTANT_PREFIX = "Assistant: ";
export const NO_DESCRIPTION = "No description";

const EMPTY_OBJECT_SCHEMA: Record<string, unknown> = { type: "object", properties: {} };

/** Provider-neutral function declaration derived from one MCP tool. */
export interface ToolDeclaration {
  name: string;
  description: string;
  parametersSchema: Record<string, unknown>;
}

export interface ToolInvocationResult {
  toolName: string;
  arguments: Record<string, unknown>;
  content: string;
  log: string;
}

export interface QueryHandler {
  readonly providerName: string;
  readonly model: string;
  listToolsForModel(): Promise<ToolDeclaration[]>;
  processQuery(query: string): Promise<string>;
}

/**
 * Shared half of the tool-augmented conversation: tool declarations and
 * per-call execution. Subclasses own the provider wire format and the two
 * rounds of `processQuery`.
 *
 * Only one layer of tool calls is honoured per query: the second round is
 * sent without tools, so whatever the model says there is final.
 */
export abstract class BaseQueryHandler implements QueryHandler {
  abstract readonly providerName: string;

  protected constructor(
    protected readonly session: McpSession,
    readonly model: string
  ) {}

  abstract processQuery(query: string): Promise<string>;

  async listToolsForModel(): Promise<ToolDeclaration[]> {
    const tools = await this.session.listTools();
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description || NO_DESCRIPTION,
      parametersSchema: tool.inputSchema ?? EMPTY_OBJECT_SCHEMA,
    }));
  }

  /** Never throws: a failed call becomes `Error: ...` content for the model. */
  protected async executeTool(toolName: string, rawArguments: unknown): Promise<ToolInvocationResult> {
    let args: Record<string, unknown> = {};
    try {
      args = decodeToolArguments(toolName, rawArguments);
      const outcome = await this.session.callTool(toolName, args);
      logger.info("Tool executed", { provider: this.providerName, tool: toolName, isError: outcome.isError });
      return {
        toolName,
        arguments: args,
        content: outcome.content,
        log: `[Used ${toolName}(${formatArguments(args)})]`,
      };
    } catch (error) {
      const content = `Error: ${describeError(error)}`;
      logger.warn("Tool execution failed", { provider: this.providerName, tool: toolName, error: content });
      return { toolName, arguments: args, content, log: `[${content}]` };
    }
  }

  protected formatAnswer(parts: string[]): string {
    return ASSISTANT_PREFIX + parts.join("\n");
  }
}
