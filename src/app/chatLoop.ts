// src/app/chatLoop.ts

import * as readline from "readline/promises";
import { stdin as input, stdout as output } from "process";
import { errorMessage, userPrompt } from "../common/colors";
import { UserInterruptError, describeError } from "../common/errors";
import type { QueryHandler } from "../core/queryHandler";
import { logger } from "../infra/logger";

/** Line source for the chat; `ask` rejects with UserInterruptError on Ctrl+C or end of input. */
export interface LinePrompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/** An abort of `signal` ends the pending question the same way Ctrl+C at the prompt does. */
export function createTerminalPrompter(signal?: AbortSignal): LinePrompter {
  const rl = readline.createInterface({ input, output });
  const controller = new AbortController();
  const interrupt = (): void => controller.abort();
  rl.on("SIGINT", interrupt);
  rl.on("close", interrupt);
  if (signal?.aborted) {
    interrupt();
  }
  signal?.addEventListener("abort", interrupt, { once: true });

  return {
    async ask(question: string): Promise<string> {
      try {
        return await rl.question(question, { signal: controller.signal });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new UserInterruptError();
        }
        throw error;
      }
    },
    close(): void {
      signal?.removeEventListener("abort", interrupt);
      rl.close();
    },
  };
}

/**
 * Reads queries until `quit`, Ctrl+C, end of input or an abort of `signal`.
 * A query already sent to the model is answered before an abort is noticed.
 */
export async function chatLoop(
  handler: Pick<QueryHandler, "processQuery">,
  prompter?: LinePrompter,
  print: (text: string) => void = (text) => console.log(text),
  signal?: AbortSignal
): Promise<void> {
  const lines = prompter ?? createTerminalPrompter(signal);
  print("\nMCP Client's Chat Started!");
  print("Type your queries or 'quit' to exit.");

  try {
    while (true) {
      if (signal?.aborted) {
        print("\n\nInterrupted by user");
        break;
      }

      let query: string;
      try {
        query = (await lines.ask(`\n${userPrompt()}`)).trim();
      } catch (error) {
        if (error instanceof UserInterruptError) {
          print("\n\nInterrupted by user");
          break;
        }
        throw error;
      }

      if (!query) {
        continue;
      }

      if (query.toLowerCase() === "quit") {
        break;
      }

      try {
        print("\n" + (await handler.processQuery(query)));
      } catch (error) {
        logger.error("Query failed", { error: describeError(error) });
        print(`\n${errorMessage(`Error: ${describeError(error)}`)}`);
      }
    }
  } finally {
    lines.close();
    print("\nGoodbye!");
  }
}
