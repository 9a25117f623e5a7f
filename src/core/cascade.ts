/**
 * Ordered fallback strategies and the runner that applies them.
 *
 * Each field of the metadata record is resolved by a declarative list of
 * named strategies. The runner tries them in order and stops at the first
 * one that produces a usable value; a strategy that throws counts as "no
 * result" and never aborts the field or the record.
 */

export interface Strategy<C, T> {
  /** Short label used in debug output */
  name: string;
  run: (ctx: C) => T | null | undefined;
}

export interface CascadeHit<T> {
  value: T;
  strategy: string;
}

/** Post-processing applied to every strategy result; null rejects it. */
export type Accept<T> = (value: T) => T | null;

/** Trimmed text, or null when nothing but whitespace is left. */
export const acceptText: Accept<string> = (value) => {
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
};

export const acceptPositive: Accept<number> = (value) =>
  Number.isFinite(value) && value > 0 ? value : null;

function attempt<C, T>(field: string, strategy: Strategy<C, T>, ctx: C, accept: Accept<T>): T | null {
  try {
    const value = strategy.run(ctx);
    if (value === null || value === undefined) return null;
    return accept(value);
  } catch (e) {
    if (process.env.DEBUG) console.debug('[watchmeta]', `${field}/${strategy.name} failed:`, e instanceof Error ? e.message : e);
    return null;
  }
}

/**
 * First accepted result, in strategy order.
 */
export function runCascade<C, T>(
  field: string,
  strategies: readonly Strategy<C, T>[],
  ctx: C,
  accept: Accept<T>,
): CascadeHit<T> | null {
  for (const strategy of strategies) {
    const value = attempt(field, strategy, ctx, accept);
    if (value !== null) {
      if (process.env.DEBUG) console.debug('[watchmeta]', `${field} resolved by ${strategy.name}`);
      return { value, strategy: strategy.name };
    }
  }
  return null;
}

/**
 * Every accepted result. Used where the best candidate is chosen by
 * comparison rather than by priority.
 */
export function collectCandidates<C, T>(
  field: string,
  strategies: readonly Strategy<C, T>[],
  ctx: C,
  accept: Accept<T>,
): CascadeHit<T>[] {
  const hits: CascadeHit<T>[] = [];
  for (const strategy of strategies) {
    const value = attempt(field, strategy, ctx, accept);
    if (value !== null) hits.push({ value, strategy: strategy.name });
  }
  return hits;
}
