import { SCHEMA_DESCRIPTORS } from '@mrfcheck/schema';
import type { SchemaDescriptor } from '@mrfcheck/schema';

export type SchemaMatch =
  | { matched: true; descriptor: SchemaDescriptor }
  | {
      matched: false;
      /** Variant sharing the most signature keys, or null when nothing overlaps. */
      closest: SchemaDescriptor | null;
      presentKeys: readonly string[];
    };

export function topLevelKeys(document: unknown): string[] {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) return [];
  return Object.keys(document);
}

/**
 * A variant matches when every key of its signature is present at the top level.
 * The largest matching signature wins; equal sizes go to the earlier variant.
 */
export function matchSchema(
  document: unknown,
  descriptors: readonly SchemaDescriptor[] = SCHEMA_DESCRIPTORS,
): SchemaMatch {
  const keys = new Set(topLevelKeys(document));

  let best: SchemaDescriptor | null = null;
  let closest: SchemaDescriptor | null = null;
  let closestHits = 0;
  for (const descriptor of descriptors) {
    const hits = descriptor.signature.filter((key) => keys.has(key)).length;
    if (hits === descriptor.signature.length && (!best || descriptor.signature.length > best.signature.length)) {
      best = descriptor;
    }
    if (hits > closestHits) {
      closest = descriptor;
      closestHits = hits;
    }
  }

  if (best) return { matched: true, descriptor: best };
  return { matched: false, closest, presentKeys: [...keys] };
}
