import { createLogger } from '../logger.ts';
import { matchSourcePattern } from '../taint/classifier.ts';
import { sinkStep } from '../taint/flows.ts';
import { compareLocations } from '../taint/propagation.ts';
import type { FlowStep, NormalizedFindings, TaintSink, TaintSource } from '../taint/types.ts';
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

const logger = createLogger('psalm');

/** Base confidence of a flow built from a Psalm taint issue. */
export const PSALM_CONFIDENCE = 0.9;

interface PsalmLocation {
  file: string;
  line: number;
  column: number;
  /** Whole source line(s) around the location. */
  snippet: string;
  /** Expression Psalm highlighted; falls back to the snippet. */
  selected: string;
  label: string;
}

/** `file_name` is project-relative; `file_path` is absolute. */
function psalmLocation(entry: Record<string, unknown>, fileNames: readonly string[]): PsalmLocation | undefined {
  const path = stringField(entry, 'file_name') ?? stringField(entry, 'file_path');
  const line = positiveIntegerField(entry, 'line_from');
  if (!path || !line) return undefined;
  return {
    file: matchReportPath(path, fileNames),
    line,
    column: positiveIntegerField(entry, 'column_from') ?? 1,
    snippet: stringField(entry, 'snippet') ?? '',
    selected: stringField(entry, 'selected_text') ?? stringField(entry, 'snippet') ?? '',
    label: stringField(entry, 'label') ?? stringField(entry, 'entry_path_description') ?? '',
  };
}

function issuesOf(report: unknown): unknown[] {
  if (Array.isArray(report)) return report;
  if (isRecord(report) && Array.isArray(report.issues)) return report.issues;
  throw new ReportFormatError(
    'Invalid Psalm report: expected a JSON array of issues or an object with an "issues" array'
  );
}

function traceOf(issue: Record<string, unknown>, fileNames: readonly string[]): PsalmLocation[] {
  const trace = issue.taint_trace;
  if (!Array.isArray(trace)) return [];
  const steps: PsalmLocation[] = [];
  for (const entry of trace) {
    if (!isRecord(entry)) continue;
    const location = psalmLocation(entry, fileNames);
    if (location) steps.push(location);
  }
  return steps;
}

function normalizePsalm(issues: readonly unknown[], context: BackendContext): NormalizedFindings {
  const fileNames = context.files.map((file) => file.path);
  const sources: TaintSource[] = [];
  const sinks: TaintSink[] = [];
  const drafts: FlowDraft[] = [];

  issues.forEach((issue, index) => {
    if (!isRecord(issue)) {
      logger.warn({ index }, 'Skipping Psalm issue that is not an object');
      return;
    }
    const type = stringField(issue, 'type') ?? '';
    if (!type.startsWith('Tainted')) return;

    const location = psalmLocation(issue, fileNames);
    if (!location) {
      logger.warn({ index, type }, 'Skipping Psalm issue without file name or line');
      return;
    }

    const sink = describeSink(
      {
        file: location.file,
        line: location.line,
        column: location.column,
        snippet: location.snippet,
        fallbackCallee: type,
        hint: `${type} ${stringField(issue, 'message') ?? ''}`,
      },
      context.library
    );
    sinks.push(sink);

    const trace = traceOf(issue, fileNames);
    const origin = trace[0] ?? location;
    const source: TaintSource = {
      file: origin.file,
      line: origin.line,
      column: origin.column,
      variable: origin.selected || origin.label,
      sourceKind:
        matchSourcePattern(`${origin.selected} ${origin.label}`, context.library)?.kind ?? 'host-header',
      rawText: origin.selected || origin.label,
      baseConfidence: PSALM_CONFIDENCE,
    };
    sources.push(source);

    const taintedArgument = pickTaintedArgument(sink, origin.selected);
    const steps: FlowStep[] = trace.map((step, position) => ({
      file: step.file,
      line: step.line,
      label: position === 0 ? `source: ${step.label || step.selected}` : step.label || step.selected,
    }));
    if (steps.length === 0) {
      steps.push({ file: source.file, line: source.line, label: `source: ${source.rawText}` });
    }
    steps.push(sinkStep(sink, Math.max(0, sink.arguments.indexOf(taintedArgument))));

    drafts.push({ source, sink, taintedArgument, flowPath: steps, baseConfidence: PSALM_CONFIDENCE });
  });

  return {
    sources: sources.sort(compareLocations),
    sinks: sinks.sort(compareLocations),
    flows: finalizeFlows(drafts, context),
  };
}

/**
 * Back end over `psalm --taint-analysis --output-format=json`. Every issue
 * whose type starts with `Tainted` becomes a flow from the first entry of its
 * taint trace, or from the issue itself when the trace is missing.
 */
export function createPsalmBackend(report: unknown): AnalysisBackend {
  const issues = issuesOf(report);
  return {
    name: 'psalm',
    analyze: (context) => normalizePsalm(issues, context),
  };
}
