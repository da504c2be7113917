// src/core/openaiQueryHandler.ts

import { OpenAI } from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { ProviderRequestError, ProviderSetupError } from "../common/errors";
import { logger } from "../infra/logger";
import type { McpSession } from "../infra/serverConnection";
import { BaseQueryHandler, MAX_TOKENS, type ToolDeclaration } from "./queryHandler";

/** The slice of the OpenAI SDK this handler talks to. */
export interface ChatCompletionsClient {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export interface OpenAIHandlerOptions {
  model: string;
  apiKey?: string;
  completions?: ChatCompletionsClient;
}

export function toOpenAITool(declaration: ToolDeclaration): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: declaration.name,
      description: declaration.description,
      parameters: declaration.parametersSchema,
    },
  };
}

export class OpenAIQueryHandler extends BaseQueryHandler {
  readonly providerName = "OpenAI";
  private readonly completions: ChatCompletionsClient;

  constructor(session: McpSession, options: OpenAIHandlerOptions) {
    super(session, options.model);
    if (options.completions) {
      this.completions = options.completions;
      return;
    }
    if (!options.apiKey) {
      throw new ProviderSetupError("Error: OPENAI_API_KEY environment variable not set");
    }
    const openai = new OpenAI({ apiKey: options.apiKey });
    this.completions = { create: (body) => openai.chat.completions.create(body) };
  }

  async processQuery(query: string): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [{ role: "user", content: query }];
    const tools = (await this.listToolsForModel()).map(toOpenAITool);

    const initialResponse = await this.complete({
      model: this.model,
      max_tokens: MAX_TOKENS,
      messages: [...messages],
      ...(tools.length > 0 ? { tools } : {}),
    });
    const currentMessage = this.firstMessage(initialResponse);
    const resultParts: string[] = [];

    if (currentMessage.content) {
      resultParts.push(currentMessage.content);
    }

    const toolCalls = currentMessage.tool_calls ?? [];
    if (toolCalls.length > 0) {
      messages.push({
        role: "assistant",
        content: currentMessage.content ?? "",
        tool_calls: toolCalls,
      });

      for (const toolCall of toolCalls) {
        const toolResult = await this.executeTool(toolCall.function.name, toolCall.function.arguments);
        resultParts.push(toolResult.log);
        messages.push({ role: "tool", tool_call_id: toolCall.id, content: toolResult.content });
      }

      const finalResponse = await this.complete({
        model: this.model,
        max_tokens: MAX_TOKENS,
        messages: [...messages],
      });
      const content = this.firstMessage(finalResponse).content;
      if (content) {
        resultParts.push(content);
      }
    }

    return this.formatAnswer(resultParts);
  }

  private async complete(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> {
    logger.debug("OpenAI completion request", { model: body.model, messages: body.messages.length });
    return this.completions.create(body);
  }

  private firstMessage(response: ChatCompletion): ChatCompletionMessage {
    const choice = response.choices[0];
    if (!choice) {
      throw new ProviderRequestError("OpenAI returned no choices");
    }
    return choice.message;
  }
}
