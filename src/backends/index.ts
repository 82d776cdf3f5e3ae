import { resolveEngineOptions, type EngineOptions, type EngineOverrides } from '../config.ts';
import { createLogger } from '../logger.ts';
import type { PatternLibrary } from '../rules.ts';
import { buildAnalysisResult, type AnalysisInput } from '../taint/index.ts';
import type { AnalysisResult, NormalizedFindings, SourceFile } from '../taint/types.ts';

const logger = createLogger('backend');

export interface BackendContext {
  files: readonly SourceFile[];
  library: PatternLibrary;
  options: EngineOptions;
}

/**
 * Anything that can turn a set of files into sources, sinks and flows. The
 * aggregator only ever sees the normalized findings.
 */
export interface AnalysisBackend {
  readonly name: string;
  analyze(context: BackendContext): NormalizedFindings;
}

export function analyzeWithBackend(
  backend: AnalysisBackend,
  input: AnalysisInput,
  library: PatternLibrary,
  overrides: EngineOverrides = {}
): AnalysisResult {
  const options = resolveEngineOptions(overrides);
  const findings = backend.analyze({ files: input.files, library, options });
  logger.info(
    { backend: backend.name, sources: findings.sources.length, flows: findings.flows.length },
    'Back end finished'
  );
  return buildAnalysisResult(findings, {
    framework: library.framework,
    backend: backend.name,
    tiers: options.tiers,
    skipped: input.skipped,
    filesAnalyzed: input.files.length,
  });
}

export { builtinBackend } from './builtin.ts';
export { ReportFormatError, readReportFile } from './normalize.ts';
export { createPsalmBackend } from './psalm.ts';
export { createSemgrepBackend } from './semgrep.ts';
