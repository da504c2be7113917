// src/app/main.ts

import * as fs from "fs";
import { CommanderError, type OutputConfiguration } from "commander";
import { errorMessage } from "../common/colors";
import { DEFAULT_CONFIG_PATH, ServerRegistry, resolveConfigPath, type Environment } from "../common/config";
import {
  ConfigNotFoundError,
  ConfigurationError,
  ConnectionError,
  McpClientError,
  ServerNotFoundError,
  UserInterruptError,
  describeError,
} from "../common/errors";
import { logger } from "../infra/logger";
import type { ServerTarget } from "../infra/serverConnection";
import type { LinePrompter } from "./chatLoop";
import { parseCliArgs, type CliCommand, type ServerSelection } from "./cli";
import { abortable, withMcpClient, type HandlerBuilder, type SessionOpener } from "./client";

export interface MainDependencies {
  env?: Environment;
  openSession?: SessionOpener;
  buildHandler?: HandlerBuilder;
  prompter?: LinePrompter;
  /** When omitted, a process-level SIGINT aborts the run. */
  signal?: AbortSignal;
  output?: OutputConfiguration;
}

function listServers(env: Environment): number {
  try {
    ServerRegistry.load(resolveConfigPath(env)).printTable();
    return 0;
  } catch (error) {
    if (error instanceof ConfigNotFoundError) {
      console.log(`Error: ${error.message}`);
      console.log(`\nNo configuration file found. Expected: ${DEFAULT_CONFIG_PATH}`);
      return 1;
    }
    console.log(`Error loading server configuration: ${describeError(error)}`);
    return 1;
  }
}

function resolveTarget(selection: ServerSelection, env: Environment): ServerTarget {
  if (selection.kind === "script") {
    if (!fs.existsSync(selection.scriptPath)) {
      throw new ConfigurationError(`Server script '${selection.scriptPath}' not found`, "SCRIPT_NOT_FOUND");
    }
    return { kind: "script", scriptPath: selection.scriptPath };
  }

  const profile = ServerRegistry.load(resolveConfigPath(env)).get(selection.serverName);
  console.log(`Using configured server: ${selection.serverName}`);
  console.log(`Description: ${profile.description}`);
  return { kind: "profile", profile };
}

function reportFailure(error: unknown): number {
  if (error instanceof UserInterruptError) {
    console.log("\n\nInterrupted by user");
    return 0;
  }
  if (error instanceof ConfigNotFoundError) {
    console.log(errorMessage(`Error: ${error.message}`));
    console.log(`\nConfiguration file not found. Expected: ${DEFAULT_CONFIG_PATH}`);
    return 1;
  }
  if (error instanceof ServerNotFoundError) {
    console.log(errorMessage(`Error: ${error.message}`));
    console.log("\nUse --list-servers to see available servers");
    return 1;
  }
  if (error instanceof ConnectionError) {
    console.log(errorMessage(error.message));
    return 1;
  }
  if (!(error instanceof McpClientError)) {
    logger.error("Unexpected failure", { error: describeError(error) });
  }
  console.log(errorMessage(`Error: ${describeError(error)}`));
  return 1;
}

/** Runs one CLI invocation and resolves to the process exit code. */
export async function main(args: string[], deps: MainDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;

  let command: CliCommand;
  try {
    command = parseCliArgs(args, deps.output);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  if (command.kind === "list-servers") {
    return listServers(env);
  }

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  if (!deps.signal) {
    process.once("SIGINT", onInterrupt);
  }

  const signal = deps.signal ?? controller.signal;
  try {
    const target = resolveTarget(command.server, env);
    const { action } = command;
    await withMcpClient(
      {
        target,
        provider: command.provider,
        model: command.model,
        verbose: command.dockerVerbose,
        env,
        openSession: deps.openSession,
        buildHandler: deps.buildHandler,
      },
      (client) =>
        action === "members" ? abortable(client.listAllMembers(), signal) : client.runChat(deps.prompter, signal),
      signal
    );
    return 0;
  } catch (error) {
    return reportFailure(error);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
