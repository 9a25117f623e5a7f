/**
 * Schema-free JSON tree with safe, optional path lookups.
 *
 * Renderer trees in watch pages change shape between requests, so every
 * accessor returns `undefined` on a shape mismatch instead of throwing.
 */

export type Tree =
  | { kind: 'object'; entries: ReadonlyMap<string, Tree> }
  | { kind: 'array'; items: readonly Tree[] }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'null' };

/** One step of a path: an object key, or `[]` to fan out over an array. */
export type PathSegment = string | [];

export function toTree(value: unknown): Tree {
  if (value === null || value === undefined) return { kind: 'null' };
  if (typeof value === 'string') return { kind: 'string', value };
  if (typeof value === 'number') return { kind: 'number', value };
  if (typeof value === 'boolean') return { kind: 'bool', value };
  if (Array.isArray(value)) {
    return { kind: 'array', items: value.map(toTree) };
  }
  if (typeof value === 'object') {
    const entries = new Map<string, Tree>();
    for (const [key, child] of Object.entries(value)) {
      entries.set(key, toTree(child));
    }
    return { kind: 'object', entries };
  }
  return { kind: 'null' };
}

/**
 * Parse JSON text into a tree. Returns null when the text isn't valid JSON.
 */
export function parseTree(json: string): Tree | null {
  try {
    return toTree(JSON.parse(json));
  } catch (e) {
    if (process.env.DEBUG) console.debug('[watchmeta]', 'tree parse failed:', e instanceof Error ? e.message : e);
    return null;
  }
}

export function child(tree: Tree | undefined, key: string): Tree | undefined {
  return tree?.kind === 'object' ? tree.entries.get(key) : undefined;
}

export function items(tree: Tree | undefined): readonly Tree[] {
  return tree?.kind === 'array' ? tree.items : [];
}

export function asString(tree: Tree | undefined): string | undefined {
  return tree?.kind === 'string' ? tree.value : undefined;
}

export function isObject(tree: Tree | undefined): boolean {
  return tree?.kind === 'object';
}

/**
 * Resolve a path, fanning out at every `[]` segment.
 *
 * @example
 * select(root, ['contents', 'results', [], 'videoPrimaryInfoRenderer'])
 */
export function select(tree: Tree | undefined, path: readonly PathSegment[]): Tree[] {
  let current: Tree[] = tree ? [tree] : [];
  for (const segment of path) {
    const next: Tree[] = [];
    for (const node of current) {
      if (typeof segment === 'string') {
        const found = child(node, segment);
        if (found) next.push(found);
      } else {
        next.push(...items(node));
      }
    }
    current = next;
    if (current.length === 0) break;
  }
  return current;
}

/** First match of `select`, if any. */
export function selectFirst(tree: Tree | undefined, path: readonly PathSegment[]): Tree | undefined {
  return select(tree, path)[0];
}

/**
 * Text of a `{ simpleText }` or `{ runs: [{ text }] }` node. Runs are
 * joined without separators.
 */
export function textOf(tree: Tree | undefined): string | undefined {
  const simple = asString(child(tree, 'simpleText'));
  if (simple !== undefined) return simple;
  const runs = items(child(tree, 'runs'));
  if (runs.length === 0) return undefined;
  return runs.map((run) => asString(child(run, 'text')) ?? '').join('');
}
