// src/core/ollamaQueryHandler.ts

import { warningMessage } from "../common/colors";
import { describeError } from "../common/errors";
import { logger } from "../infra/logger";
import {
  OllamaHttpClient,
  type OllamaApi,
  type OllamaChatRequest,
  type OllamaMessage,
  type OllamaTool,
} from "../infra/ollamaApi";
import type { McpSession } from "../infra/serverConnection";
import { BaseQueryHandler, MAX_TOKENS, type ToolDeclaration } from "./queryHandler";

export interface OllamaHandlerOptions {
  model: string;
  baseUrl: string;
  api?: OllamaApi;
  warn?: (message: string) => void;
}

export function toOllamaTool(declaration: ToolDeclaration): OllamaTool {
  return {
    type: "function",
    function: {
      name: declaration.name,
      description: declaration.description,
      parameters: declaration.parametersSchema,
    },
  };
}

export function isModelAvailable(model: string, available: string[]): boolean {
  return available.some((name) => name.includes(model) || name.startsWith(model));
}

export class OllamaQueryHandler extends BaseQueryHandler {
  readonly providerName = "Ollama";

  private constructor(
    session: McpSession,
    model: string,
    private readonly api: OllamaApi
  ) {
    super(session, model);
  }

  /**
   * Builds the handler and checks the daemon's local catalog. A missing model
   * only warns: the daemon pulls it on first use.
   */
  static async create(session: McpSession, options: OllamaHandlerOptions): Promise<OllamaQueryHandler> {
    const api = options.api ?? new OllamaHttpClient(options.baseUrl);
    const warn = options.warn ?? ((message: string) => console.log(warningMessage(message)));
    const handler = new OllamaQueryHandler(session, options.model, api);
    await handler.verifyModel(warn);
    return handler;
  }

  private async verifyModel(warn: (message: string) => void): Promise<void> {
    try {
      const available = await this.api.listModels();
      if (!isModelAvailable(this.model, available)) {
        warn(`Warning: Model '${this.model}' not found locally. Ollama will attempt to pull it on first use.`);
        warn(`Available models: ${available.join(", ")}`);
      }
    } catch (error) {
      logger.warn("Ollama model catalog unavailable", { error: describeError(error) });
      warn(`Warning: Could not verify Ollama models: ${describeError(error)}`);
    }
  }

  async processQuery(query: string): Promise<string> {
    const messages: OllamaMessage[] = [{ role: "user", content: query }];
    const tools = (await this.listToolsForModel()).map(toOllamaTool);

    const initialResponse = await this.complete({
      model: this.model,
      messages: [...messages],
      ...(tools.length > 0 ? { tools } : {}),
      options: { num_predict: MAX_TOKENS },
    });
    const currentMessage = initialResponse.message;
    const resultParts: string[] = [];

    if (currentMessage.content) {
      resultParts.push(currentMessage.content);
    }

    const toolCalls = currentMessage.tool_calls ?? [];
    if (toolCalls.length > 0) {
      messages.push(currentMessage);

      for (const toolCall of toolCalls) {
        const toolResult = await this.executeTool(toolCall.function.name, toolCall.function.arguments);
        resultParts.push(toolResult.log);
        messages.push({ role: "tool", content: toolResult.content });
      }

      const finalResponse = await this.complete({
        model: this.model,
        messages: [...messages],
        options: { num_predict: MAX_TOKENS },
      });
      if (finalResponse.message.content) {
        resultParts.push(finalResponse.message.content);
      }
    }

    return this.formatAnswer(resultParts);
  }

  private async complete(request: OllamaChatRequest) {
    logger.debug("Ollama chat request", { model: request.model, messages: request.messages.length });
    return this.api.chat(request);
  }
}
