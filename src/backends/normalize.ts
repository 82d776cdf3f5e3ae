import { existsSync, readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import type { PatternLibrary } from '../rules.ts';
import { matchSinkPattern } from '../taint/classifier.ts';
import { scoreFlow } from '../taint/flows.ts';
import { createGuardDetector } from '../taint/guards.ts';
import { compareLocations } from '../taint/propagation.ts';
import { callDisplayName, collectCalls, parseStatement } from '../taint/statement-parser.ts';
import type { CallNode, FlowStep, SinkKind, TaintFlow, TaintSink, TaintSource } from '../taint/types.ts';
import type { BackendContext } from './index.ts';

export class ReportFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportFormatError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringField(record: Record<string, unknown>, field: string): string | undefined {
  const value = record[field];
  return typeof value === 'string' && value ? value : undefined;
}

export function positiveIntegerField(record: Record<string, unknown>, field: string): number | undefined {
  const value = record[field];
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
}

/** Read a tool report from disk. Throws ReportFormatError when it is missing or not JSON. */
export function readReportFile(filePath: string): unknown {
  const absPath = isAbsolute(filePath) ? filePath : resolve(filePath);
  if (!existsSync(absPath)) {
    throw new ReportFormatError(`Report file not found: ${absPath}`);
  }
  try {
    return JSON.parse(readFileSync(absPath, 'utf-8'));
  } catch {
    throw new ReportFormatError(`Failed to parse ${absPath} as JSON. Reports must be JSON output.`);
  }
}

// ── Paths ────────────────────────────────────────────────────────────────────

/**
 * Map a path as a tool printed it (absolute, `./`-prefixed, backslashes) onto
 * the analyzed file it names. Unknown paths come back normalized.
 */
export function matchReportPath(reported: string, fileNames: readonly string[]): string {
  const normalized = reported.replace(/\\/g, '/').replace(/^\.\//, '');
  if (fileNames.includes(normalized)) return normalized;
  const match = fileNames.find((name) => normalized.endsWith(`/${name}`));
  return match ?? normalized;
}

// ── Sink classification ──────────────────────────────────────────────────────

const SINK_KEYWORDS: readonly [RegExp, SinkKind][] = [
  [/redirect/i, 'redirect'],
  [/render|template|twig|blade/i, 'template-render'],
  [/header|cookie/i, 'response-header'],
  [/mail/i, 'mail'],
  [/login|logout|password|auth/i, 'authentication'],
  [/url|route|link/i, 'url-generation'],
];

export function keywordSinkKind(text: string): SinkKind {
  return SINK_KEYWORDS.find(([pattern]) => pattern.test(text))?.[1] ?? 'unknown';
}

/** First call in a snippet of code, if the statement parser finds one. */
export function firstCallIn(snippet: string, file: string, line: number): CallNode | undefined {
  const node = parseStatement(snippet.trim(), { file, line });
  return node ? collectCalls(node)[0] : undefined;
}

export interface SinkDescription {
  file: string;
  line: number;
  column: number;
  /** Code at the sink; parsed for the call when possible. */
  snippet: string;
  /** Used as the callee when the snippet holds no call. */
  fallbackCallee: string;
  /** Tool-specific text (rule id, message) consulted for the kind when no library pattern matches. */
  hint: string;
}

export function describeSink(description: SinkDescription, library: PatternLibrary): TaintSink {
  const call = firstCallIn(description.snippet, description.file, description.line);
  const callee = call ? callDisplayName(call) : description.fallbackCallee;
  const sinkKind =
    matchSinkPattern(callee, library)?.kind ??
    keywordSinkKind(`${callee} ${description.hint}`);

  return {
    file: description.file,
    line: description.line,
    column: description.column,
    callee,
    arguments: call ? call.arguments.map((argument) => argument.rawText) : [],
    sinkKind,
    rawText: description.snippet.trim(),
  };
}

/** Argument of the sink that mentions the source's text, else the first one. */
export function pickTaintedArgument(sink: TaintSink, sourceText: string): string {
  const needle = sourceText.trim();
  const hit = needle ? sink.arguments.find((argument) => argument.includes(needle)) : undefined;
  return hit ?? sink.arguments[0] ?? '';
}

// ── Flow finalization ────────────────────────────────────────────────────────

export interface FlowDraft {
  source: TaintSource;
  sink: TaintSink;
  taintedArgument: string;
  flowPath: FlowStep[];
  /** Confidence the tool's report warrants before evidence penalties. */
  baseConfidence: number;
}

/**
 * Give external flows the same treatment as built-in ones: guard and
 * validation evidence from the file texts, the cross-file penalty, and the
 * minimum-confidence filter.
 */
export function finalizeFlows(drafts: readonly FlowDraft[], context: BackendContext): TaintFlow[] {
  const { options, library } = context;
  const detector = createGuardDetector(
    new Map(context.files.map((file) => [file.path, file.content])),
    library
  );

  const flows: TaintFlow[] = [];
  for (const draft of [...drafts].sort((a, b) => compareLocations(a.sink, b.sink))) {
    const evidence = detector(draft.source.file, draft.sink.file);
    const flowType = draft.source.file === draft.sink.file ? 'same-file' : 'cross-file';
    const confidence = scoreFlow(draft.baseConfidence, { ...evidence, flowType }, options.penalties);
    if (confidence < options.minConfidence) continue;
    flows.push({
      source: draft.source,
      sink: draft.sink,
      taintedArgument: draft.taintedArgument,
      flowPath: draft.flowPath,
      hasGuard: evidence.hasGuard,
      hasValidation: evidence.hasValidation,
      confidence,
      flowType,
    });
  }
  return flows;
}
