import type { IdlType, Typedef } from './program';

/**
 * A type that is not an alias
 */
export type ResolvedType = Exclude<IdlType, Typedef>;

/**
 * Get the true type behind a series of typedefs
 *
 * Throws if the chain loops back on itself.
 */
export function trueType(type: IdlType): ResolvedType {
  const seen = new Set<Typedef>();
  let current = type;

  while (current.kind === 'typedef') {
    if (seen.has(current)) {
      throw new Error(`Cyclic typedef chain through '${current.name}'`);
    }
    seen.add(current);
    current = current.type;
  }

  return current;
}
