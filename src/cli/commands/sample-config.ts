import { loadSampleConfig } from "@git-bump/engine";
import type { CliContainer } from "../container.js";

export async function runSampleConfigCommand(
  container: CliContainer
): Promise<void> {
  const sample = await loadSampleConfig();
  container.stdout(sample.endsWith("\n") ? sample : `${sample}\n`);
}
