import * as clack from "@clack/prompts";
import { text } from "../components/text.js";
import { resolveOutputFormat } from "../internal/output-format.js";

export { log } from "@clack/prompts";

export function stripAnsi(value: string): string {
  return value.replace(/\u001b\[[0-9;]*m/g, "");
}

export function intro(title: string): void {
  const format = resolveOutputFormat();
  if (format === "markdown") {
    process.stdout.write(`# ${stripAnsi(title)}\n\n`);
    return;
  }
  if (format === "json") {
    return;
  }
  clack.intro(text.intro(title));
}

export function outro(message: string): void {
  if (resolveOutputFormat() !== "terminal") {
    return;
  }
  clack.outro(message);
}
