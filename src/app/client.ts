// src/app/client.ts

import { errorMessage, infoMessage } from "../common/colors";
import type { Environment, ProviderName } from "../common/config";
import { McpClientError, UserInterruptError, describeError } from "../common/errors";
import { createQueryHandler, type HandlerRequest } from "../core/handlerFactory";
import { MemberLister } from "../core/memberLister";
import type { QueryHandler } from "../core/queryHandler";
import { logger } from "../infra/logger";
import {
  ServerConnection,
  type ConnectOptions,
  type ManagedSession,
  type ServerTarget,
} from "../infra/serverConnection";
import { chatLoop, type LinePrompter } from "./chatLoop";

export type SessionOpener = (target: ServerTarget, options: ConnectOptions) => Promise<ManagedSession>;

export type HandlerBuilder = (session: ManagedSession, request: HandlerRequest) => Promise<QueryHandler>;

export interface McpClientOptions {
  target: ServerTarget;
  provider?: ProviderName;
  model?: string;
  verbose?: boolean;
  env?: Environment;
  openSession?: SessionOpener;
  buildHandler?: HandlerBuilder;
}

/**
 * Owns the MCP session for one CLI run. Use `withMcpClient` so the peer
 * process is released on every exit path.
 */
export class McpClient {
  private session: ManagedSession | null = null;
  private released = false;

  constructor(private readonly options: McpClientOptions) {}

  async start(): Promise<void> {
    if (this.session) {
      return;
    }
    const open = this.options.openSession ?? ((target, options) => ServerConnection.open(target, options));
    const session = await open(this.options.target, { verbose: this.options.verbose });
    if (this.released) {
      // cleanup() ran while the peer was still starting
      await session.close();
      throw new UserInterruptError();
    }
    this.session = session;
  }

  async listAllMembers(): Promise<void> {
    const session = this.requireSession();
    const profile = this.options.target.kind === "profile" ? this.options.target.profile : undefined;
    console.log(await new MemberLister(session).listMembers(profile));
  }

  /** Aborting `signal` ends the chat at its next prompt. */
  async runChat(prompter?: LinePrompter, signal?: AbortSignal): Promise<void> {
    const session = this.requireSession();
    const build = this.options.buildHandler ?? createQueryHandler;

    let handler: QueryHandler;
    try {
      handler = await build(session, {
        provider: this.options.provider,
        model: this.options.model,
        env: this.options.env,
      });
    } catch (error) {
      if (!(error instanceof McpClientError)) {
        logger.error("Unexpected failure while creating query handler", { error: describeError(error) });
      }
      console.log(errorMessage(describeError(error)));
      return;
    }

    const { target } = this.options;
    if (target.kind === "profile") {
      console.log(`\nServer: ${target.profile.name}`);
      console.log(`Description: ${target.profile.description}`);
    }
    console.log(infoMessage(`LLM: ${handler.providerName} with model: ${handler.model}`));

    await chatLoop(handler, prompter, undefined, signal);
  }

  /** Idempotent; the first call closes the peer, later calls do nothing. */
  async cleanup(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    const session = this.session;
    this.session = null;
    if (session) {
      await session.close();
    }
  }

  private requireSession(): ManagedSession {
    if (!this.session) {
      throw new McpClientError("MCP session is not connected; call start() first", "NOT_CONNECTED");
    }
    return this.session;
  }
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(new UserInterruptError());
      return;
    }
    signal.addEventListener("abort", () => reject(new UserInterruptError()), { once: true });
  });
}

/** Settles like `work`, or rejects with UserInterruptError as soon as `signal` aborts. */
export function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  return signal ? Promise.race([work, untilAborted(signal)]) : work;
}

/**
 * Starts a client, runs `body`, and releases the session on every exit path.
 * Aborting `signal` while the peer is starting rejects with UserInterruptError;
 * once `body` runs, reacting to the abort is up to `body`.
 */
export async function withMcpClient<T>(
  options: McpClientOptions,
  body: (client: McpClient) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  const client = new McpClient(options);
  try {
    await abortable(client.start(), signal);
    return await body(client);
  } finally {
    await client.cleanup();
  }
}
