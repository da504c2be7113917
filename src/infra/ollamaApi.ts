// src/infra/ollamaApi.ts

import axios, { type AxiosInstance } from "axios";
import { ProviderRequestError, describeError } from "../common/errors";
import { logger } from "./logger";

export interface OllamaToolCall {
  function: {
    name: string;
    arguments?: Record<string, unknown> | string;
  };
}

export interface OllamaMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  tool_calls?: OllamaToolCall[];
}

export interface OllamaTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaMessage[];
  tools?: OllamaTool[];
  options?: { num_predict?: number };
}

export interface OllamaChatResponse {
  model: string;
  message: OllamaMessage;
  done: boolean;
}

interface OllamaTagsResponse {
  models?: Array<{ name: string }>;
}

/** The two daemon endpoints the chat handler relies on. */
export interface OllamaApi {
  chat(request: OllamaChatRequest): Promise<OllamaChatResponse>;
  listModels(): Promise<string[]>;
}

export type OllamaHttp = Pick<AxiosInstance, "get" | "post">;

export class OllamaHttpClient implements OllamaApi {
  private readonly http: OllamaHttp;

  constructor(
    readonly baseUrl: string,
    http?: OllamaHttp
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: baseUrl,
        headers: { "Content-Type": "application/json" },
      });
  }

  async chat(request: OllamaChatRequest): Promise<OllamaChatResponse> {
    try {
      const response = await this.http.post<OllamaChatResponse>("/api/chat", { ...request, stream: false });
      return response.data;
    } catch (error) {
      logger.error("Ollama chat request failed", { baseUrl: this.baseUrl, error: describeError(error) });
      throw new ProviderRequestError(`Failed to communicate with Ollama at ${this.baseUrl}: ${describeError(error)}`);
    }
  }

  async listModels(): Promise<string[]> {
    const response = await this.http.get<OllamaTagsResponse>("/api/tags");
    return (response.data.models ?? []).map((model) => model.name);
  }
}
