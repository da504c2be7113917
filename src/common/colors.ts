// src/common/colors.ts

import pc from "picocolors";

export function userPrompt(text: string = "You: "): string {
  return pc.bold(pc.yellow(text));
}

export function errorMessage(text: string): string {
  return pc.bold(pc.red(text));
}

export function infoMessage(text: string): string {
  return pc.blue(text);
}

export function warningMessage(text: string): string {
  return pc.magenta(text);
}
