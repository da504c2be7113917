// src/core/memberLister.ts

import { describeError } from "../common/errors";
import { logger } from "../infra/logger";
import type { McpSession } from "../infra/serverConnection";
import type { ServerProfile } from "../types/schemas";
import { NO_DESCRIPTION } from "./queryHandler";

interface Member {
  name: string;
  description?: string;
}

type Section = "tools" | "prompts" | "resources";

export class MemberLister {
  private session: McpSession;

  constructor(session: McpSession) {
    this.session = session;
  }

  async listMembers(profile?: ServerProfile): Promise<string> {
    const output: string[] = [];

    if (profile) {
      output.push(`MCP Server: ${profile.name}`);
      output.push(`Description: ${profile.description}`);
    } else {
      output.push("MCP Server Members");
    }
    output.push("=".repeat(50));

    // a failing section is reported inline; the rest still print
    const sections: Array<[Section, () => Promise<Member[]>]> = [
      ["tools", () => this.session.listTools()],
      ["prompts", () => this.session.listPrompts()],
      ["resources", () => this.session.listResources()],
    ];
    for (const [section, list] of sections) {
      output.push(...(await this.listSection(section, list)));
    }

    output.push("");
    output.push("=".repeat(50));
    return output.join("\n");
  }

  private async listSection(section: Section, list: () => Promise<Member[]>): Promise<string[]> {
    const title = section.toUpperCase();
    try {
      const items = await list();
      if (items.length === 0) {
        return ["", `${title}: None available`];
      }
      return [
        "",
        `${title} (${items.length}):`,
        "-".repeat(30),
        ...items.map((item) => ` > ${item.name} - ${item.description || NO_DESCRIPTION}`),
      ];
    } catch (error) {
      logger.warn(`Failed to list ${section}`, { error: describeError(error) });
      return ["", `${title}: Error - ${describeError(error)}`];
    }
  }
}
