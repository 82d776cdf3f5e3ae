import { resolveEngineOptions, type EngineOptions, type EngineOverrides, type TierThresholds } from '../config.ts';
import { createLogger } from '../logger.ts';
import type { PatternLibrary } from '../rules.ts';
import { classifyFile } from './classifier.ts';
import { summarizeFlows, synthesizeFlows } from './flows.ts';
import { buildDataFlowGraph } from './graph.ts';
import { createGuardDetector } from './guards.ts';
import { compareLocations, propagateTaint } from './propagation.ts';
import { createVariableScope } from './scope.ts';
import { parseFile } from './statement-parser.ts';
import type {
  AnalysisResult,
  AnalysisStats,
  NormalizedFindings,
  ParsedFile,
  SkippedFile,
  SourceFile,
  TaintSink,
  TaintSource,
} from './types.ts';

const logger = createLogger('engine');

export interface AnalysisInput {
  files: SourceFile[];
  /** Files the collector could not read; carried into the result. */
  skipped?: SkippedFile[];
}

/**
 * Parse, classify, build the graph, propagate and synthesize flows. The
 * three graph stages run once over all files together.
 */
export function runTaintEngine(
  files: readonly SourceFile[],
  library: PatternLibrary,
  options: EngineOptions
): NormalizedFindings {
  const ordered = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  const parsed: ParsedFile[] = ordered.map((file) => parseFile(file.path, file.content));
  const nodeCount = parsed.reduce((sum, file) => sum + file.nodes.length, 0);
  logger.debug({ files: parsed.length, nodes: nodeCount }, 'Parsed files');

  const sources: TaintSource[] = [];
  const sinks: TaintSink[] = [];
  for (const file of parsed) {
    const classified = classifyFile(file, library);
    sources.push(...classified.sources);
    sinks.push(...classified.sinks);
  }
  sources.sort(compareLocations);
  sinks.sort(compareLocations);

  const scope = createVariableScope(options.variableScope, parsed);
  const graph = buildDataFlowGraph(parsed, {
    propagation: library.propagation,
    weights: options.edgeWeights,
    scope,
  });
  const { store, visits } = propagateTaint(graph, sources, scope);
  logger.debug(
    { sources: sources.length, sinks: sinks.length, edges: graph.edges.length, visits },
    'Propagation finished'
  );

  const detector = createGuardDetector(new Map(ordered.map((file) => [file.path, file.content])), library);
  const flows = synthesizeFlows({ sinks, store, scope, detector, options });

  let taintedVariables = 0;
  for (const state of store.values()) {
    if (state.isTainted) taintedVariables++;
  }

  return {
    sources,
    sinks,
    flows,
    stats: {
      filesAnalyzed: parsed.length,
      nodes: nodeCount,
      edges: graph.edges.length,
      taintedVariables,
    },
  };
}

export interface ResultMeta {
  framework: string;
  backend: string;
  tiers: TierThresholds;
  skipped?: SkippedFile[];
  filesAnalyzed?: number;
}

/** Attach summary counts and run metadata to a back end's findings. */
export function buildAnalysisResult(findings: NormalizedFindings, meta: ResultMeta): AnalysisResult {
  const { countsByConfidence, countsBySinkKind } = summarizeFlows(findings.flows, meta.tiers);
  const stats: AnalysisStats = findings.stats ?? {
    filesAnalyzed: meta.filesAnalyzed ?? 0,
    nodes: 0,
    edges: 0,
    taintedVariables: 0,
  };

  return {
    framework: meta.framework,
    backend: meta.backend,
    sources: findings.sources,
    sinks: findings.sinks,
    flows: findings.flows,
    countsByConfidence,
    countsBySinkKind,
    skippedFiles: meta.skipped ?? [],
    stats,
  };
}

/**
 * Run the built-in engine over in-memory files.
 *
 * @example
 * ```typescript
 * const result = analyzeSources(
 *   { files: [{ path: 'index.php', content: source }] },
 *   loadPatternLibrary('generic')
 * );
 * result.flows[0]?.sink.sinkKind; // 'redirect'
 * ```
 */
export function analyzeSources(
  input: AnalysisInput,
  library: PatternLibrary,
  overrides: EngineOverrides = {}
): AnalysisResult {
  const options = resolveEngineOptions(overrides);
  const findings = runTaintEngine(input.files, library, options);
  logger.info(
    { framework: library.framework, flows: findings.flows.length, skipped: input.skipped?.length ?? 0 },
    'Analysis complete'
  );
  return buildAnalysisResult(findings, {
    framework: library.framework,
    backend: 'builtin',
    tiers: options.tiers,
    skipped: input.skipped,
  });
}
