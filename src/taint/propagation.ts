import type { DataFlowGraph } from './graph.ts';
import type { VariableScope } from './scope.ts';
import type { SourceTaint, TaintSource, VariableState } from './types.ts';

// ── Variable store ───────────────────────────────────────────────────────────

/** Holds variable states; the propagation engine is its only writer. */
export interface VariableStore {
  get(key: string): VariableState | undefined;
  /** State for `key`, created untainted on first access. */
  ensure(key: string, name: string): VariableState;
  values(): IterableIterator<VariableState>;
  readonly size: number;
}

export function createVariableStore(graph: DataFlowGraph): VariableStore {
  const states = new Map<string, VariableState>();
  return {
    get: (key) => states.get(key),
    ensure(key, name) {
      let state = states.get(key);
      if (!state) {
        state = {
          key,
          name: graph.nameOf(key) ?? name,
          isTainted: false,
          confidence: 1,
          taintSources: new Map(),
          dependencies: graph.dependencies(key),
          lastWriteLine: graph.lastWriteLine(key),
        };
        states.set(key, state);
      }
      return state;
    },
    values: () => states.values(),
    get size() {
      return states.size;
    },
  };
}

export function compareLocations(
  a: { file: string; line: number; column: number },
  b: { file: string; line: number; column: number }
): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.line !== b.line) return a.line - b.line;
  return a.column - b.column;
}

/**
 * Record `confidence` for `source` on a state. Returns true only when the
 * entry is new or strictly lower than before.
 */
function writeTaint(
  state: VariableState,
  source: TaintSource,
  confidence: number,
  via: SourceTaint['via']
): boolean {
  const existing = state.taintSources.get(source);
  if (existing && existing.confidence <= confidence) return false;

  state.taintSources.set(source, via ? { confidence, via } : { confidence });
  state.confidence = state.isTainted ? Math.min(state.confidence, confidence) : confidence;
  state.isTainted = true;
  return true;
}

// ── Worklist propagation ─────────────────────────────────────────────────────

export interface PropagationResult {
  store: VariableStore;
  /** Variable visits performed; bounded because confidences only decrease. */
  visits: number;
}

/**
 * Push every source's taint along the graph until nothing changes. Each edge
 * carries `min(confidence, weight)` per source, so confidences never rise and
 * the worklist drains even on cyclic graphs.
 */
export function propagateTaint(
  graph: DataFlowGraph,
  sources: readonly TaintSource[],
  scope: VariableScope,
  store: VariableStore = createVariableStore(graph)
): PropagationResult {
  const queue: string[] = [];
  const queued = new Set<string>();
  let visits = 0;

  function enqueue(key: string): void {
    if (queued.has(key)) return;
    queued.add(key);
    queue.push(key);
  }

  for (const source of [...sources].sort(compareLocations)) {
    const key = scope.key(source.file, source.variable);
    const state = store.ensure(key, source.variable);
    if (writeTaint(state, source, source.baseConfidence, undefined)) enqueue(key);
  }

  for (let head = 0; head < queue.length; head++) {
    const key = queue[head] ?? '';
    queued.delete(key);
    visits++;

    const state = store.get(key);
    if (!state) continue;

    for (const edge of graph.outgoing(key)) {
      if (edge.weight <= 0 || edge.to === key) continue;
      const target = store.ensure(edge.to, edge.toName);
      let changed = false;
      for (const [source, taint] of state.taintSources) {
        if (writeTaint(target, source, Math.min(taint.confidence, edge.weight), edge)) changed = true;
      }
      if (changed) enqueue(edge.to);
    }
  }

  return { store, visits };
}
