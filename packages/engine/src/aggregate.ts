import type { Callable, EffectiveMapping, Mapping } from "./types.js";

export interface AggregateOptions {
  /** Receives every callable replaced by a later mapping. */
  onDiscard?: (callable: Callable, file: string) => void;
}

/**
 * Fold mappings from lowest to highest priority. A repeated key takes the
 * later callable and keeps the position of its first occurrence.
 */
export function aggregateMappings(
  mappings: readonly Mapping[],
  options: AggregateOptions = {}
): EffectiveMapping {
  const effective = new Map<string, Callable>();
  for (const mapping of mappings) {
    for (const [file, callable] of mapping) {
      const previous = effective.get(file);
      if (previous) {
        options.onDiscard?.(previous, file);
      }
      effective.set(file, callable);
    }
  }
  return effective;
}
