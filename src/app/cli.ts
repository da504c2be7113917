// src/app/cli.ts

import { Command, Option, type OutputConfiguration } from "commander";
import { PROVIDER_NAMES, isProviderName, type ProviderName } from "../common/config";

export type ServerSelection = { kind: "script"; scriptPath: string } | { kind: "server"; serverName: string };

export type CliAction = "members" | "chat";

export type CliCommand =
  | { kind: "list-servers" }
  | {
      kind: "run";
      server: ServerSelection;
      action: CliAction;
      provider?: ProviderName;
      model?: string;
      dockerVerbose: boolean;
    };

type RawOptions = {
  server?: string;
  listServers?: boolean;
  members?: boolean;
  chat?: boolean;
  provider?: string;
  model?: string;
  dockerVerbose?: boolean;
};

export function createProgram(): Command {
  return new Command("mcp-client")
    .description("MCP client that lists server members or chats with OpenAI or Ollama using the server's tools")
    .argument("[server_path]", "path to an MCP server script (.js or .py)")
    .addOption(new Option("-s, --server <name>", "name of a server from conf/mcp-servers.json"))
    .addOption(new Option("--list-servers", "list the configured servers and exit").conflicts("server"))
    .addOption(new Option("--members", "list the server's tools, prompts and resources").conflicts("chat"))
    .addOption(new Option("--chat", "start an interactive chat that can call the server's tools"))
    .addOption(
      new Option("--provider <name>", "LLM provider (detected from OPENAI_API_KEY when omitted)").choices(PROVIDER_NAMES)
    )
    .addOption(new Option("--model <name>", "model to use with the selected provider"))
    .addOption(new Option("--docker-verbose", "print how the server container is started").default(false))
    .showHelpAfterError()
    .exitOverride();
}

/**
 * Parses user arguments (without `node` and the script path).
 * Throws CommanderError on `--help` and on invalid usage.
 */
export function parseCliArgs(args: string[], output?: OutputConfiguration): CliCommand {
  const program: Command = createProgram();
  if (output) {
    program.configureOutput(output);
  }
  program.parse(args, { from: "user" });

  const options = program.opts<RawOptions>();
  const serverPath: string | undefined = program.args[0];

  if (serverPath !== undefined && (options.server !== undefined || options.listServers)) {
    program.error("error: server_path cannot be combined with --server or --list-servers");
  }

  if (options.listServers) {
    return { kind: "list-servers" };
  }

  let server: ServerSelection;
  if (serverPath !== undefined) {
    server = { kind: "script", scriptPath: serverPath };
  } else if (options.server !== undefined) {
    server = { kind: "server", serverName: options.server };
  } else {
    program.error("error: either server_path or --server must be specified (or use --list-servers)");
  }

  if (!options.members && !options.chat) {
    program.error("error: one of --members or --chat is required (unless using --list-servers)");
  }

  return {
    kind: "run",
    server,
    action: options.members ? "members" : "chat",
    provider: options.provider !== undefined && isProviderName(options.provider) ? options.provider : undefined,
    model: options.model,
    dockerVerbose: options.dockerVerbose ?? false,
  };
}
