import type { EdgeWeights } from '../config.ts';
import type { PropagationRules } from '../rules.ts';
import type { VariableScope } from './scope.ts';
import {
  argumentNodeName,
  bareCalleeName,
  callSiteOf,
  collectCalls,
  scanVariables,
} from './statement-parser.ts';
import type { CallNode, DataFlowEdge, ExpressionNode, OperationKind, ParsedFile } from './types.ts';

// ── Dependencies of an expression ────────────────────────────────────────────

export interface Dependency {
  variable: string;
  weight: number;
  /** How the value reached the enclosing expression. */
  operation: OperationKind;
}

export interface DependencyOptions {
  propagation: PropagationRules;
  weights: EdgeWeights;
}

/** Weight a call's rule gives its return value; 0 means the call removes taint. */
export function propagationWeight(call: CallNode, rules: PropagationRules): number {
  const name = bareCalleeName(call);
  if (rules.removing.has(name)) return 0;
  if (rules.preserving.has(name)) return rules.preservingWeight;
  return rules.unknownWeight;
}

function dedupe(dependencies: Dependency[]): Dependency[] {
  const seen = new Set<string>();
  return dependencies.filter((dependency) => {
    const key = `${dependency.variable}\0${dependency.weight}\0${dependency.operation}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Variables an expression reads, each with the weight its value survives with. */
export function dependenciesOf(expression: ExpressionNode, options: DependencyOptions): Dependency[] {
  const { weights } = options;

  switch (expression.kind) {
    case 'variable-ref':
      return [{ variable: expression.name, weight: weights.assign, operation: 'assign' }];

    case 'array-access':
      return dedupe([
        { variable: expression.container, weight: weights.arrayAccess, operation: 'array-access' },
        ...scanVariables(expression.rawText.slice(expression.rawText.indexOf('['))).map(
          ({ name }): Dependency => ({ variable: name, weight: weights.arrayAccess, operation: 'array-access' })
        ),
      ]);

    case 'literal':
      return scanVariables(expression.text).map(({ name, interpolated }): Dependency =>
        interpolated
          ? { variable: name, weight: weights.concatenation, operation: 'concatenation' }
          : { variable: name, weight: weights.assign, operation: 'assign' }
      );

    case 'concatenation':
      return dedupe(
        expression.parts.flatMap((part) =>
          dependenciesOf(part, options).map((dependency): Dependency =>
            dependency.operation === 'assign'
              ? { ...dependency, weight: weights.concatenation, operation: 'concatenation' }
              : dependency
          )
        )
      );

    case 'call': {
      const rule = propagationWeight(expression, options.propagation);
      if (rule <= 0) return [];
      const inputs = expression.arguments.flatMap((argument) => dependenciesOf(argument, options));
      if (expression.receiver.kind === 'method') {
        inputs.push(...dependenciesOf(expression.receiver.object, options));
      }
      return dedupe(
        inputs.map((dependency): Dependency => ({
          variable: dependency.variable,
          weight: Math.min(dependency.weight, rule),
          operation: 'function-call-return',
        }))
      );
    }
  }
}

// ── Graph ────────────────────────────────────────────────────────────────────

/** Multigraph over variable keys; parallel edges are kept. */
export class DataFlowGraph {
  private readonly outgoingEdges = new Map<string, DataFlowEdge[]>();
  private readonly incoming = new Map<string, Set<string>>();
  private readonly writes = new Map<string, number>();
  private readonly names = new Map<string, string>();
  private readonly allEdges: DataFlowEdge[] = [];

  addEdge(edge: DataFlowEdge): void {
    this.allEdges.push(edge);
    const list = this.outgoingEdges.get(edge.from);
    if (list) list.push(edge);
    else this.outgoingEdges.set(edge.from, [edge]);

    const sources = this.incoming.get(edge.to);
    if (sources) sources.add(edge.from);
    else this.incoming.set(edge.to, new Set([edge.from]));

    this.names.set(edge.from, edge.fromName);
    this.names.set(edge.to, edge.toName);
  }

  recordWrite(key: string, name: string, line: number): void {
    this.writes.set(key, line);
    this.names.set(key, name);
  }

  outgoing(key: string): readonly DataFlowEdge[] {
    return this.outgoingEdges.get(key) ?? [];
  }

  dependencies(key: string): ReadonlySet<string> {
    return this.incoming.get(key) ?? new Set();
  }

  lastWriteLine(key: string): number | undefined {
    return this.writes.get(key);
  }

  nameOf(key: string): string | undefined {
    return this.names.get(key);
  }

  get edges(): readonly DataFlowEdge[] {
    return this.allEdges;
  }
}

export interface GraphOptions extends DependencyOptions {
  scope: VariableScope;
}

/**
 * Ingest every node of every file into one graph. Assignments link the
 * variables their right-hand side reads to the target; each call argument
 * links its variables to the synthetic node of that argument.
 */
export function buildDataFlowGraph(files: readonly ParsedFile[], options: GraphOptions): DataFlowGraph {
  const graph = new DataFlowGraph();
  const { scope, weights } = options;

  function link(
    file: string,
    line: number,
    dependency: Dependency,
    toName: string,
    operation: OperationKind,
    weight: number
  ): void {
    const from = scope.key(file, dependency.variable);
    const to = scope.key(file, toName);
    if (from === to || weight <= 0) return;
    graph.addEdge({
      from,
      to,
      fromName: dependency.variable,
      toName,
      operation,
      file,
      line,
      weight,
    });
  }

  for (const parsed of files) {
    for (const node of parsed.nodes) {
      if (node.kind === 'assignment') {
        const compound = node.operator === '.=';
        for (const dependency of dependenciesOf(node.source, options)) {
          const operation =
            compound && dependency.operation === 'assign' ? 'concatenation' : dependency.operation;
          const weight =
            compound && dependency.operation === 'assign' ? weights.concatenation : dependency.weight;
          link(node.file, node.line, dependency, node.target, operation, weight);
        }
        graph.recordWrite(scope.key(node.file, node.target), node.target, node.line);
      }

      for (const call of collectCalls(node)) {
        const site = callSiteOf(call);
        call.arguments.forEach((argument, index) => {
          const target = argumentNodeName(site, index);
          for (const dependency of dependenciesOf(argument, options)) {
            link(
              call.file,
              call.line,
              dependency,
              target,
              'function-call-argument',
              Math.min(dependency.weight, weights.callArgument)
            );
          }
        });
      }
    }
  }

  return graph;
}
