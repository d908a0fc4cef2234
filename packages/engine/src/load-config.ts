import { aggregateMappings } from "./aggregate.js";
import { FileIOError, NoConfigFoundError } from "./errors.js";
import { readText } from "./fs-utils.js";
import { resolveConfigPaths } from "./paths.js";
import type {
  BumpFileSystem,
  CandidatePath,
  EffectiveMapping,
  Mapping,
  ScriptRuntime
} from "./types.js";

export interface LoadEffectiveMappingOptions {
  candidates: readonly CandidatePath[];
  runtime: ScriptRuntime;
  fs: BumpFileSystem;
  /** Throw `NoConfigFoundError` instead of returning an empty mapping. */
  requireConfig?: boolean;
}

export interface LoadedConfig {
  /** Config files that were evaluated, lowest priority first */
  sources: CandidatePath[];
  mapping: EffectiveMapping;
}

export async function loadEffectiveMapping(
  options: LoadEffectiveMappingOptions
): Promise<LoadedConfig> {
  const { candidates, runtime, fs } = options;
  const sources = await resolveConfigPaths(candidates, fs);

  if (sources.length === 0 && options.requireConfig) {
    throw new NoConfigFoundError([...candidates]);
  }

  const mappings: Mapping[] = [];
  for (const source of sources) {
    let script: string;
    try {
      script = await readText(fs, source.path);
    } catch (error) {
      throw new FileIOError("read-error", source.path, error);
    }
    mappings.push(runtime.load(script, source.path));
  }

  const mapping = aggregateMappings(mappings, {
    onDiscard: (callable) => runtime.release(callable)
  });

  return { sources, mapping };
}
