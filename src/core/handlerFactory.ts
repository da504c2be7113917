// src/core/handlerFactory.ts

import { detectProvider, readProviderSettings, type Environment, type ProviderName } from "../common/config";
import { logger } from "../infra/logger";
import type { McpSession } from "../infra/serverConnection";
import { OllamaQueryHandler, type OllamaHandlerOptions } from "./ollamaQueryHandler";
import { OpenAIQueryHandler, type OpenAIHandlerOptions } from "./openaiQueryHandler";
import type { QueryHandler } from "./queryHandler";

export interface HandlerRequest {
  provider?: ProviderName;
  model?: string;
  env?: Environment;
  /** Test seams; production builds the real SDK clients. */
  openai?: Pick<OpenAIHandlerOptions, "completions">;
  ollama?: Pick<OllamaHandlerOptions, "api" | "warn">;
}

export async function createQueryHandler(session: McpSession, request: HandlerRequest = {}): Promise<QueryHandler> {
  const env = request.env ?? process.env;
  const settings = readProviderSettings(env);
  const provider = request.provider ?? detectProvider(env);
  logger.info("Creating query handler", { provider, requestedModel: request.model });

  switch (provider) {
    case "openai":
      return new OpenAIQueryHandler(session, {
        model: request.model || settings.openaiModel,
        apiKey: settings.openaiApiKey,
        ...request.openai,
      });
    case "ollama":
      return OllamaQueryHandler.create(session, {
        model: request.model || settings.ollamaModel,
        baseUrl: settings.ollamaBaseUrl,
        ...request.ollama,
      });
  }
}
