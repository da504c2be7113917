import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_OPENAI_MODEL,
  ServerRegistry,
  detectProvider,
  isProviderName,
  readProviderSettings,
  resolveConfigPath,
} from "./config";
import { ConfigMalformedError, ConfigNotFoundError, ServerNotFoundError } from "./errors";

const sampleDocument = {
  mcpServers: {
    time: {
      description: "Current time and timezone conversion",
      command: "docker",
      args: ["run", "-i", "--rm", "mcp/time"],
      docker: { image: "mcp/time" },
      env: { LOCAL_TIMEZONE: "UTC" },
    },
    calculator: {
      description: "Arithmetic",
      command: "node",
      args: ["calc.js"],
    },
  },
};

describe("ServerRegistry", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mcp-client-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(contents: string): string {
    const file = path.join(tempDir, "mcp-servers.json");
    fs.writeFileSync(file, contents);
    return file;
  }

  it("loads profiles from a file and lists names sorted", () => {
    const registry = ServerRegistry.load(writeConfig(JSON.stringify(sampleDocument)));

    expect(registry.list()).toEqual(["calculator", "time"]);
    const time = registry.get("time");
    expect(time.name).toBe("time");
    expect(time.command).toBe("docker");
    expect(time.args).toEqual(["run", "-i", "--rm", "mcp/time"]);
    expect(time.env).toEqual({ LOCAL_TIMEZONE: "UTC" });
    expect(time.docker.image).toBe("mcp/time");
  });

  it("fills defaults for omitted fields", () => {
    const registry = ServerRegistry.fromDocument({ mcpServers: { bare: {} } });
    const bare = registry.get("bare");

    expect(bare.description).toBe("");
    expect(bare.command).toBe("");
    expect(bare.args).toEqual([]);
    expect(bare.transport).toBe("stdio");
    expect(bare.env).toEqual({});
    expect(bare.docker).toEqual({});
    expect(bare.capabilities).toEqual({});
  });

  it("treats a document without mcpServers as empty", () => {
    const registry = ServerRegistry.fromDocument({});
    expect(registry.list()).toEqual([]);
    expect(registry.formatTable()).toBe("No servers configured");
  });

  it("rejects an unknown name and lists the available ones", () => {
    const registry = ServerRegistry.fromDocument(sampleDocument);

    expect(() => registry.get("weather")).toThrow(ServerNotFoundError);
    expect(() => registry.get("weather")).toThrow("Server 'weather' not found. Available: calculator, time");
  });

  it("reports a missing file", () => {
    const missing = path.join(tempDir, "absent.json");
    expect(() => ServerRegistry.load(missing)).toThrow(ConfigNotFoundError);
    expect(() => ServerRegistry.load(missing)).toThrow(`Configuration file not found: ${missing}`);
  });

  it("reports invalid JSON", () => {
    const file = writeConfig("{ not json");
    expect(() => ServerRegistry.load(file)).toThrow(ConfigMalformedError);
    expect(() => ServerRegistry.load(file)).toThrow(`Invalid JSON in ${file}:`);
  });

  it("reports a document whose server map is not an object", () => {
    const load = () => ServerRegistry.fromDocument({ mcpServers: ["time"] }, "test.json");

    expect(load).toThrow(ConfigMalformedError);
    expect(load).toThrow("Invalid server configuration in test.json: mcpServers: Expected object, received array");
  });

  it("keeps numeric env values as text", () => {
    const registry = ServerRegistry.fromDocument({
      mcpServers: {
        time: { command: "docker", env: { PORT: 8080, DEBUG: true, TZ: "UTC" } },
        other: {},
      },
    });

    expect(registry.list()).toEqual(["other", "time"]);
    expect(registry.get("time").env).toEqual({ PORT: "8080", DEBUG: "true", TZ: "UTC" });
  });

  it("keeps a mount entry with a boolean flag next to a valid profile", () => {
    const registry = ServerRegistry.fromDocument({
      mcpServers: {
        files: {
          command: "docker",
          mounted_directories: [{ host: "/a", container: "/b", readonly: true }],
        },
        time: { command: "docker", docker: { image: "mcp/time" } },
      },
    });

    expect(registry.get("files").mountedDirectories).toEqual([{ host: "/a", container: "/b", readonly: "true" }]);
    expect(registry.get("time").docker.image).toBe("mcp/time");
  });

  it("falls back to defaults for fields of the wrong type", () => {
    const time = ServerRegistry.fromDocument({
      mcpServers: {
        time: {
          description: 42,
          command: "docker",
          args: "mcp/time",
          transport: null,
          env: ["TZ=UTC"],
          docker: "mcp/time",
          capabilities: 7,
          mounted_directories: "/a:/b",
          options: false,
        },
      },
    }).get("time");

    expect(time.description).toBe("");
    expect(time.command).toBe("docker");
    expect(time.args).toEqual([]);
    expect(time.transport).toBe("stdio");
    expect(time.env).toEqual({});
    expect(time.docker).toEqual({});
    expect(time.capabilities).toEqual({});
    expect(time.mountedDirectories).toBeUndefined();
    expect(time.options).toBeUndefined();
  });

  it("fails only when an entry that is not an object is requested", () => {
    const registry = ServerRegistry.fromDocument({ mcpServers: { broken: "docker", time: { command: "docker" } } });

    expect(registry.list()).toEqual(["time"]);
    expect(registry.get("time").command).toBe("docker");
    expect(() => registry.get("broken")).toThrow(ConfigMalformedError);
    expect(() => registry.get("broken")).toThrow(
      "Invalid configuration for server 'broken' in <inline>: <root>: Expected object, received string"
    );
  });

  it("freezes loaded profiles", () => {
    const profile = ServerRegistry.fromDocument(sampleDocument).get("calculator");
    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.args)).toBe(true);
  });

  it("formats the server table", () => {
    const registry = ServerRegistry.fromDocument({
      mcpServers: {
        time: { description: "Current time", docker: { image: "mcp/time" } },
        notes: { description: "x".repeat(50) },
      },
    });

    expect(registry.formatTable().split("\n")).toEqual([
      "",
      "=".repeat(80),
      "Available MCP Servers",
      "=".repeat(80),
      `${"Name".padEnd(15)} ${"Image".padEnd(20)} Description`,
      "-".repeat(80),
      `${"notes".padEnd(15)} ${"N/A".padEnd(20)} ${"x".repeat(42)}...`,
      `${"time".padEnd(15)} ${"mcp/time".padEnd(20)} Current time`,
      "=".repeat(80),
      "",
      "Total servers configured: 2",
      "",
      "Usage: mcp-client --server <name> --chat",
      "       mcp-client --server <name> --members",
      "",
    ]);
  });

  it("keeps a description of exactly 45 characters intact", () => {
    const description = "d".repeat(45);
    const table = ServerRegistry.fromDocument({ mcpServers: { a: { description } } }).formatTable();
    expect(table.split("\n")[6]).toBe(`${"a".padEnd(15)} ${"N/A".padEnd(20)} ${description}`);
  });
});

describe("provider settings", () => {
  it("applies defaults when nothing is set", () => {
    expect(readProviderSettings({})).toEqual({
      openaiApiKey: undefined,
      openaiModel: DEFAULT_OPENAI_MODEL,
      ollamaBaseUrl: DEFAULT_OLLAMA_BASE_URL,
      ollamaModel: DEFAULT_OLLAMA_MODEL,
    });
    expect(DEFAULT_OPENAI_MODEL).toBe("gpt-4o-mini");
    expect(DEFAULT_OLLAMA_MODEL).toBe("qwen2.5:7b");
    expect(DEFAULT_OLLAMA_BASE_URL).toBe("http://localhost:11434");
  });

  it("reads overrides from the environment", () => {
    expect(
      readProviderSettings({
        OPENAI_API_KEY: "test-secret",
        OPENAI_MODEL: "gpt-test",
        OLLAMA_BASE_URL: "http://ollama.internal:11434",
        OLLAMA_MODEL: "llama-test",
      })
    ).toEqual({
      openaiApiKey: "test-secret",
      openaiModel: "gpt-test",
      ollamaBaseUrl: "http://ollama.internal:11434",
      ollamaModel: "llama-test",
    });
  });

  it("detects OpenAI only when a key is present", () => {
    expect(detectProvider({ OPENAI_API_KEY: "test-secret" })).toBe("openai");
    expect(detectProvider({ OPENAI_API_KEY: "" })).toBe("ollama");
    expect(detectProvider({})).toBe("ollama");
  });

  it("recognizes provider names", () => {
    expect(isProviderName("openai")).toBe(true);
    expect(isProviderName("ollama")).toBe(true);
    expect(isProviderName("anthropic")).toBe(false);
  });

  it("resolves the config path from MCP_CONFIG_PATH", () => {
    expect(resolveConfigPath({ MCP_CONFIG_PATH: "/etc/mcp/servers.json" })).toBe(path.resolve("/etc/mcp/servers.json"));
    expect(resolveConfigPath({})).toBe(path.resolve("conf", "mcp-servers.json"));
  });
});
