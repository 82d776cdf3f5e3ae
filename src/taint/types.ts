// ── Node model ───────────────────────────────────────────────────────────────

export interface NodeLocation {
  readonly file: string;
  readonly line: number;
  /** 1-based column where the construct starts on its (first) line. */
  readonly column: number;
  readonly rawText: string;
}

export type CallReceiver =
  | { readonly kind: 'function' }
  | { readonly kind: 'constructor' }
  | { readonly kind: 'method'; readonly object: ExpressionNode }
  | { readonly kind: 'static'; readonly className: string };

export interface AssignmentNode extends NodeLocation {
  readonly kind: 'assignment';
  readonly target: string;
  /** `=`, `.=`, `??=`, ... */
  readonly operator: string;
  readonly source: ExpressionNode;
}

export interface CallNode extends NodeLocation {
  readonly kind: 'call';
  readonly callee: string;
  readonly arguments: readonly ExpressionNode[];
  readonly receiver: CallReceiver;
}

export interface ArrayAccessNode extends NodeLocation {
  readonly kind: 'array-access';
  readonly container: string;
  readonly key: string;
  /** True when the container is a request superglobal. */
  readonly isExternalInput: boolean;
}

export interface VariableRefNode extends NodeLocation {
  readonly kind: 'variable-ref';
  readonly name: string;
}

export interface LiteralNode extends NodeLocation {
  readonly kind: 'literal';
  readonly text: string;
}

export interface ConcatenationNode extends NodeLocation {
  readonly kind: 'concatenation';
  readonly parts: readonly ExpressionNode[];
}

export type ExpressionNode =
  | CallNode
  | ArrayAccessNode
  | VariableRefNode
  | LiteralNode
  | ConcatenationNode;

export type ParsedNode = AssignmentNode | ExpressionNode;

export type NodeKind = ParsedNode['kind'];

export interface IncludeDirective {
  file: string;
  line: number;
  /** Path literal as written, e.g. `/config.php` from `__DIR__ . '/config.php'`. */
  target: string;
}

export interface ParsedFile {
  path: string;
  nodes: ParsedNode[];
  includes: IncludeDirective[];
}

// ── Sources and sinks ────────────────────────────────────────────────────────

export type SourceKind = 'host-header' | 'server-name' | 'forwarded-host' | 'request-host';

export const SOURCE_KINDS: readonly SourceKind[] = [
  'host-header',
  'server-name',
  'forwarded-host',
  'request-host',
];

export type SinkKind =
  | 'url-generation'
  | 'redirect'
  | 'authentication'
  | 'template-render'
  | 'response-header'
  | 'mail'
  | 'unknown';

export const SINK_KINDS: readonly SinkKind[] = [
  'url-generation',
  'redirect',
  'authentication',
  'template-render',
  'response-header',
  'mail',
  'unknown',
];

export interface TaintSource {
  file: string;
  line: number;
  column: number;
  /** Variable seeded with taint; a synthetic argument node for inline sources. */
  variable: string;
  sourceKind: SourceKind;
  rawText: string;
  baseConfidence: number;
}

export interface TaintSink {
  file: string;
  line: number;
  column: number;
  /** Display name of the call: `redirect`, `$this->redirect`, `URL::to`, `new RedirectResponse`. */
  callee: string;
  arguments: string[];
  sinkKind: SinkKind;
  rawText: string;
}

// ── Graph and propagation state ──────────────────────────────────────────────

export type OperationKind =
  | 'assign'
  | 'concatenation'
  | 'array-access'
  | 'function-call-argument'
  | 'function-call-return';

export interface DataFlowEdge {
  /** Variable keys as produced by the active VariableScope. */
  from: string;
  to: string;
  fromName: string;
  toName: string;
  operation: OperationKind;
  file: string;
  line: number;
  weight: number;
}

export interface SourceTaint {
  confidence: number;
  /** Edge that delivered the current confidence; absent for the seed itself. */
  via?: DataFlowEdge;
}

export interface VariableState {
  readonly key: string;
  readonly name: string;
  isTainted: boolean;
  /** Minimum over the confidences of all taint entries; never increases. */
  confidence: number;
  readonly taintSources: Map<TaintSource, SourceTaint>;
  readonly dependencies: ReadonlySet<string>;
  readonly lastWriteLine: number | undefined;
}

// ── Flows and results ────────────────────────────────────────────────────────

export type FlowType = 'same-file' | 'cross-file';

export interface FlowStep {
  file: string;
  line: number;
  label: string;
}

export interface TaintFlow {
  source: TaintSource;
  sink: TaintSink;
  taintedArgument: string;
  flowPath: FlowStep[];
  hasGuard: boolean;
  hasValidation: boolean;
  confidence: number;
  flowType: FlowType;
}

export type ConfidenceTier = 'high' | 'medium' | 'low';

export interface SourceFile {
  path: string;
  content: string;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface AnalysisStats {
  filesAnalyzed: number;
  nodes: number;
  edges: number;
  taintedVariables: number;
}

/** Shape every back end hands to the aggregator. */
export interface NormalizedFindings {
  sources: TaintSource[];
  sinks: TaintSink[];
  flows: TaintFlow[];
  stats?: AnalysisStats;
}

export interface AnalysisResult {
  framework: string;
  backend: string;
  sources: TaintSource[];
  sinks: TaintSink[];
  flows: TaintFlow[];
  countsByConfidence: Record<ConfidenceTier, number>;
  countsBySinkKind: Record<SinkKind, number>;
  skippedFiles: SkippedFile[];
  stats: AnalysisStats;
}
