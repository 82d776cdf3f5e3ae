import type { VariableScopeMode } from '../config.ts';
import type { ParsedFile } from './types.ts';

/** Maps a variable name in a file to the identity the graph tracks. */
export interface VariableScope {
  readonly mode: VariableScopeMode;
  key(file: string, name: string): string;
}

/** Same name means same variable, across every file. */
export function createGlobalScope(): VariableScope {
  return { mode: 'global', key: (_file, name) => name };
}

/**
 * Resolve an include target to one of the analyzed files. Targets are taken
 * relative to the including file's directory (`__DIR__ . '/x.php'` leaves
 * `/x.php`); when that misses, a unique path suffix match is accepted.
 */
export function resolveInclude(
  fromFile: string,
  target: string,
  fileNames: readonly string[]
): string | undefined {
  const normalized = target.replace(/\\/g, '/');
  const parts = fromFile.split('/');
  parts.pop();

  const resolved: string[] = [...parts];
  for (const segment of normalized.split('/')) {
    if (segment === '' || segment === '.') continue;
    else if (segment === '..') resolved.pop();
    else resolved.push(segment);
  }
  const candidate = resolved.join('/');
  if (fileNames.includes(candidate)) return candidate;

  const suffix = normalized.replace(/^(?:\.{0,2}\/)+/, '');
  if (!suffix) return undefined;
  const matches = fileNames.filter((name) => name === suffix || name.endsWith(`/${suffix}`));
  return matches.length === 1 ? matches[0] : undefined;
}

/**
 * Files connected through resolved include directives share variables; a
 * same-named variable in an unrelated file is a different variable.
 */
export function createIncludeLinkedScope(files: readonly ParsedFile[]): VariableScope {
  const parent = new Map<string, string>();
  const fileNames = files.map((file) => file.path).sort();

  function find(file: string): string {
    let root = file;
    for (let next = parent.get(root); next !== undefined && next !== root; next = parent.get(root)) {
      root = next;
    }
    parent.set(file, root);
    return root;
  }

  function union(a: string, b: string): void {
    const rootA = find(a);
    const rootB = find(b);
    if (rootA === rootB) return;
    // The smaller path becomes the root so keys do not depend on file order.
    if (rootA < rootB) parent.set(rootB, rootA);
    else parent.set(rootA, rootB);
  }

  for (const file of files) {
    for (const include of file.includes) {
      const target = resolveInclude(file.path, include.target, fileNames);
      if (target) union(file.path, target);
    }
  }

  return { mode: 'include-linked', key: (file, name) => `${find(file)}::${name}` };
}

export function createVariableScope(
  mode: VariableScopeMode,
  files: readonly ParsedFile[]
): VariableScope {
  return mode === 'include-linked' ? createIncludeLinkedScope(files) : createGlobalScope();
}
