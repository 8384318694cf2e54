// ─────────────────────────────────────────────
//  Engine errors
//  Gameplay never throws; these cover setup, load and broken invariants.
// ─────────────────────────────────────────────

export class InvariantError extends Error {
  override name = 'InvariantError';
}

/** Game configuration failed validation. `issues` holds one line per problem. */
export class ConfigError extends Error {
  override name = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid game configuration: ${issues.join('; ')}`);
  }
}

/** A snapshot could not be loaded. The store keeps its previous state. */
export class SnapshotError extends Error {
  override name = 'SnapshotError';

  constructor(readonly issues: string[]) {
    super(`Malformed snapshot: ${issues.join('; ')}`);
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (condition) return;
  throw new InvariantError(message);
}
