import type { EngineOptions, PenaltyFactors, TierThresholds } from '../config.ts';
import type { GuardDetector } from './guards.ts';
import { compareLocations, type VariableStore } from './propagation.ts';
import type { VariableScope } from './scope.ts';
import { argumentNodeName } from './statement-parser.ts';
import type {
  ConfidenceTier,
  DataFlowEdge,
  FlowStep,
  FlowType,
  SinkKind,
  TaintFlow,
  TaintSink,
  TaintSource,
  VariableState,
} from './types.ts';

// ── Scoring ──────────────────────────────────────────────────────────────────

export interface FlowEvidence {
  hasGuard: boolean;
  hasValidation: boolean;
  flowType: FlowType;
}

/** Apply each penalty that holds. Every factor is below 1, so each one lowers the score. */
export function scoreFlow(base: number, evidence: FlowEvidence, penalties: PenaltyFactors): number {
  let confidence = base;
  if (evidence.hasGuard) confidence *= penalties.guard;
  if (evidence.hasValidation) confidence *= penalties.validation;
  if (evidence.flowType === 'cross-file') confidence *= penalties.crossFile;
  return confidence;
}

export function confidenceTier(confidence: number, tiers: TierThresholds): ConfidenceTier {
  if (confidence >= tiers.high) return 'high';
  if (confidence >= tiers.medium) return 'medium';
  return 'low';
}

// ── Flow paths ───────────────────────────────────────────────────────────────

const SYNTHETIC_ARGUMENT = /#arg\d+@/;

export function sourceStep(source: TaintSource): FlowStep {
  const label = SYNTHETIC_ARGUMENT.test(source.variable) ? source.rawText : source.variable;
  return { file: source.file, line: source.line, label: `source: ${label}` };
}

export function sinkStep(sink: TaintSink, argumentIndex: number): FlowStep {
  const argument = sink.arguments[argumentIndex] ?? '';
  return { file: sink.file, line: sink.line, label: `sink: ${sink.callee}(${argument})` };
}

/**
 * Rebuild the path a source's taint took into `key` by following the edge
 * each entry arrived through. The final edge into the argument node is
 * represented by the sink step.
 */
export function traceFlowPath(
  store: VariableStore,
  key: string,
  source: TaintSource,
  sink: TaintSink,
  argumentIndex: number
): FlowStep[] {
  const edges: DataFlowEdge[] = [];
  const seen = new Set<string>();
  let current: string | undefined = key;

  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    const via: DataFlowEdge | undefined = store.get(current)?.taintSources.get(source)?.via;
    if (!via) break;
    edges.unshift(via);
    current = via.from;
  }

  const intermediate = edges.slice(0, -1).map(
    (edge): FlowStep => ({ file: edge.file, line: edge.line, label: `${edge.operation}: ${edge.toName}` })
  );
  return [sourceStep(source), ...intermediate, sinkStep(sink, argumentIndex)];
}

// ── Synthesis ────────────────────────────────────────────────────────────────

interface Candidate {
  argumentIndex: number;
  key: string;
  source: TaintSource;
  confidence: number;
}

/** Highest confidence first; ties go to the earliest line, then file, then column. */
function strongestSource(state: VariableState): { source: TaintSource; confidence: number } | undefined {
  let best: { source: TaintSource; confidence: number } | undefined;
  for (const [source, taint] of state.taintSources) {
    if (
      !best ||
      taint.confidence > best.confidence ||
      (taint.confidence === best.confidence && isEarlier(source, best.source))
    ) {
      best = { source, confidence: taint.confidence };
    }
  }
  return best;
}

function isEarlier(a: TaintSource, b: TaintSource): boolean {
  if (a.line !== b.line) return a.line < b.line;
  if (a.file !== b.file) return a.file < b.file;
  return a.column < b.column;
}

export interface SynthesisInput {
  sinks: readonly TaintSink[];
  store: VariableStore;
  scope: VariableScope;
  detector: GuardDetector;
  options: Pick<EngineOptions, 'minConfidence' | 'penalties'>;
}

/**
 * One flow per sink whose argument nodes carry taint. The argument with the
 * strongest source wins (lowest index on ties).
 */
export function synthesizeFlows(input: SynthesisInput): TaintFlow[] {
  const { store, scope, detector, options } = input;
  const flows: TaintFlow[] = [];

  for (const sink of [...input.sinks].sort(compareLocations)) {
    const site = { file: sink.file, line: sink.line, column: sink.column, callee: sink.callee };
    let chosen: Candidate | undefined;

    for (let index = 0; index < sink.arguments.length; index++) {
      const key = scope.key(sink.file, argumentNodeName(site, index));
      const state = store.get(key);
      if (!state?.isTainted) continue;
      const strongest = strongestSource(state);
      if (strongest && (!chosen || strongest.confidence > chosen.confidence)) {
        chosen = { argumentIndex: index, key, ...strongest };
      }
    }

    if (!chosen) continue;
    const { source, argumentIndex, key } = chosen;
    const evidence = detector(source.file, sink.file);
    const flowType: FlowType = source.file === sink.file ? 'same-file' : 'cross-file';
    const confidence = scoreFlow(chosen.confidence, { ...evidence, flowType }, options.penalties);
    if (confidence < options.minConfidence) continue;

    flows.push({
      source,
      sink,
      taintedArgument: sink.arguments[argumentIndex] ?? '',
      flowPath: traceFlowPath(store, key, source, sink, argumentIndex),
      hasGuard: evidence.hasGuard,
      hasValidation: evidence.hasValidation,
      confidence,
      flowType,
    });
  }

  return flows;
}

// ── Aggregation ──────────────────────────────────────────────────────────────

export interface FlowSummary {
  countsByConfidence: Record<ConfidenceTier, number>;
  countsBySinkKind: Record<SinkKind, number>;
}

export function summarizeFlows(flows: readonly TaintFlow[], tiers: TierThresholds): FlowSummary {
  const countsByConfidence: Record<ConfidenceTier, number> = { high: 0, medium: 0, low: 0 };
  const countsBySinkKind: Record<SinkKind, number> = {
    'url-generation': 0,
    redirect: 0,
    authentication: 0,
    'template-render': 0,
    'response-header': 0,
    mail: 0,
    unknown: 0,
  };

  for (const flow of flows) {
    countsByConfidence[confidenceTier(flow.confidence, tiers)]++;
    countsBySinkKind[flow.sink.sinkKind]++;
  }

  return { countsByConfidence, countsBySinkKind };
}
