import { createLogger } from '../logger.ts';
import type { PatternLibrary } from '../rules.ts';
import { matchSourcePattern } from '../taint/classifier.ts';
import { sinkStep, sourceStep } from '../taint/flows.ts';
import { compareLocations } from '../taint/propagation.ts';
import { parseStatement } from '../taint/statement-parser.ts';
import type { NormalizedFindings, TaintSink, TaintSource } from '../taint/types.ts';
import type { AnalysisBackend, BackendContext } from './index.ts';
import {
  describeSink,
  finalizeFlows,
  isRecord,
  matchReportPath,
  pickTaintedArgument,
  positiveIntegerField,
  ReportFormatError,
  stringField,
  type FlowDraft,
} from './normalize.ts';

const logger = createLogger('semgrep');

/** Base confidence of a flow built from a Semgrep dataflow trace. */
export const SEMGREP_TRACE_CONFIDENCE = 0.8;

interface Location {
  file: string;
  line: number;
  column: number;
}

function locationOf(record: Record<string, unknown>, fileNames: readonly string[]): Location | undefined {
  const path = stringField(record, 'path');
  const start = record.start;
  if (!path || !isRecord(start)) return undefined;
  const line = positiveIntegerField(start, 'line');
  if (!line) return undefined;
  return { file: matchReportPath(path, fileNames), line, column: positiveIntegerField(start, 'col') ?? 1 };
}

function buildSource(
  location: Location,
  code: string,
  library: PatternLibrary,
  confidence: number
): TaintSource {
  const node = parseStatement(code.trim(), location);
  return {
    ...location,
    variable: node?.kind === 'assignment' ? node.target : code.trim(),
    sourceKind: matchSourcePattern(code, library)?.kind ?? 'host-header',
    rawText: code.trim(),
    baseConfidence: confidence,
  };
}

/**
 * Taint source of a dataflow trace. Semgrep prints it as
 * `["CliLoc", [{ path, start, end }, "content"]]`.
 */
function tracedSource(
  extra: Record<string, unknown>,
  fileNames: readonly string[],
  library: PatternLibrary
): TaintSource | undefined {
  const trace = extra.dataflow_trace;
  if (!isRecord(trace)) return undefined;
  const taintSource = trace.taint_source;
  if (!Array.isArray(taintSource)) return undefined;
  const payload: unknown = taintSource[1];
  if (!Array.isArray(payload)) return undefined;
  const [loc, content]: unknown[] = payload;
  if (!isRecord(loc)) return undefined;
  const location = locationOf(loc, fileNames);
  if (!location) return undefined;
  return buildSource(location, typeof content === 'string' ? content : '', library, SEMGREP_TRACE_CONFIDENCE);
}

function normalizeSemgrep(report: Record<string, unknown>, context: BackendContext): NormalizedFindings {
  const results = report.results;
  if (!Array.isArray(results)) {
    throw new ReportFormatError('Invalid Semgrep report: must contain a "results" array at the top level');
  }

  const fileNames = context.files.map((file) => file.path);
  const sources: TaintSource[] = [];
  const sinks: TaintSink[] = [];
  const drafts: FlowDraft[] = [];

  results.forEach((result: unknown, index: number) => {
    const checkId = isRecord(result) ? stringField(result, 'check_id') : undefined;
    const location = isRecord(result) ? locationOf(result, fileNames) : undefined;
    if (!isRecord(result) || !checkId || !location) {
      logger.warn({ index }, 'Skipping Semgrep result without check_id, path or start line');
      return;
    }

    const extra = isRecord(result.extra) ? result.extra : {};
    const code = stringField(extra, 'lines') ?? '';

    if (checkId.toLowerCase().includes('source')) {
      sources.push(buildSource(location, code, context.library, 1));
      return;
    }

    const sink = describeSink(
      {
        ...location,
        snippet: code,
        fallbackCallee: checkId.split('.').pop() ?? checkId,
        hint: `${checkId} ${stringField(extra, 'message') ?? ''}`,
      },
      context.library
    );
    sinks.push(sink);

    const source = tracedSource(extra, fileNames, context.library);
    if (!source) return;
    sources.push(source);
    const taintedArgument = pickTaintedArgument(sink, source.rawText);
    drafts.push({
      source,
      sink,
      taintedArgument,
      flowPath: [sourceStep(source), sinkStep(sink, Math.max(0, sink.arguments.indexOf(taintedArgument)))],
      baseConfidence: SEMGREP_TRACE_CONFIDENCE,
    });
  });

  return {
    sources: sources.sort(compareLocations),
    sinks: sinks.sort(compareLocations),
    flows: finalizeFlows(drafts, context),
  };
}

/**
 * Back end over a Semgrep `--json` report. Results whose rule id mentions
 * "source" are sources; the rest are sinks, and those carrying a dataflow
 * trace become flows.
 */
export function createSemgrepBackend(report: unknown): AnalysisBackend {
  if (!isRecord(report)) {
    throw new ReportFormatError('Invalid Semgrep report: must be a JSON object');
  }
  return {
    name: 'semgrep',
    analyze: (context) => normalizeSemgrep(report, context),
  };
}
