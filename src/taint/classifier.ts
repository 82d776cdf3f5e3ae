import type { PatternLibrary, SinkPattern, SourcePattern } from '../rules.ts';
import {
  argumentNodeName,
  callDisplayName,
  callSiteOf,
  collectCalls,
} from './statement-parser.ts';
import type { ParsedFile, ParsedNode, TaintSink, TaintSource } from './types.ts';

export interface Classification {
  sources: TaintSource[];
  sinks: TaintSink[];
}

/** First source pattern matching the text, in library order. */
export function matchSourcePattern(text: string, library: PatternLibrary): SourcePattern | undefined {
  return library.sources.find((source) => source.pattern.test(text));
}

/** First sink pattern matching a call's display name, in library order. */
export function matchSinkPattern(callee: string, library: PatternLibrary): SinkPattern | undefined {
  return library.sinks.find((sink) => sink.pattern.test(callee));
}

/**
 * Tag one node. An assignment whose right-hand side reads a Host indicator
 * seeds its target; every sink call inside the node is reported, and each of
 * its arguments that reads a Host indicator directly seeds that argument.
 */
export function classifyNode(node: ParsedNode, library: PatternLibrary): Classification {
  const sources: TaintSource[] = [];
  const sinks: TaintSink[] = [];

  if (node.kind === 'assignment') {
    const match = matchSourcePattern(node.source.rawText, library);
    if (match) {
      sources.push({
        file: node.file,
        line: node.line,
        column: node.column,
        variable: node.target,
        sourceKind: match.kind,
        rawText: node.rawText,
        baseConfidence: match.confidence,
      });
    }
  }

  for (const call of collectCalls(node)) {
    const callee = callDisplayName(call);
    const match = matchSinkPattern(callee, library);
    if (!match) continue;

    sinks.push({
      file: call.file,
      line: call.line,
      column: call.column,
      callee,
      arguments: call.arguments.map((argument) => argument.rawText),
      sinkKind: match.kind,
      rawText: call.rawText,
    });

    const site = callSiteOf(call);
    call.arguments.forEach((argument, index) => {
      const inline = matchSourcePattern(argument.rawText, library);
      if (!inline) return;
      sources.push({
        file: call.file,
        line: call.line,
        column: argument.column,
        variable: argumentNodeName(site, index),
        sourceKind: inline.kind,
        rawText: argument.rawText,
        baseConfidence: inline.confidence,
      });
    });
  }

  return { sources, sinks };
}

export function classifyFile(parsed: ParsedFile, library: PatternLibrary): Classification {
  const sources: TaintSource[] = [];
  const sinks: TaintSink[] = [];
  for (const node of parsed.nodes) {
    const result = classifyNode(node, library);
    sources.push(...result.sources);
    sinks.push(...result.sinks);
  }
  return { sources, sinks };
}
