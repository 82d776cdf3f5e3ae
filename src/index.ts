export {
  analyzeSources,
  buildAnalysisResult,
  runTaintEngine,
  type AnalysisInput,
} from './taint/index.ts';
export { parseExpression, parseFile, parseStatement } from './taint/statement-parser.ts';
export { classifyFile, classifyNode } from './taint/classifier.ts';
export { buildDataFlowGraph, DataFlowGraph } from './taint/graph.ts';
export { propagateTaint, createVariableStore, type VariableStore } from './taint/propagation.ts';
export {
  createGlobalScope,
  createIncludeLinkedScope,
  createVariableScope,
  type VariableScope,
} from './taint/scope.ts';
export { createGuardDetector, detectGuardEvidence, type GuardEvidence } from './taint/guards.ts';
export { confidenceTier, scoreFlow, summarizeFlows, synthesizeFlows } from './taint/flows.ts';
export {
  analyzeWithBackend,
  builtinBackend,
  createPsalmBackend,
  createSemgrepBackend,
  ReportFormatError,
  type AnalysisBackend,
  type BackendContext,
} from './backends/index.ts';
export {
  listFrameworks,
  loadPatternLibrary,
  PatternLibraryError,
  type PatternLibrary,
} from './rules.ts';
export {
  DEFAULT_ENGINE_OPTIONS,
  resolveEngineOptions,
  resolveScanSettings,
  type EngineOptions,
  type EngineOverrides,
} from './config.ts';
export { collectSourceFiles, mapConcurrent, readSourceFiles, scanProject } from './scanner.ts';
export type { CollectResult, ReadResult } from './scanner.ts';
export type * from './taint/types.ts';
