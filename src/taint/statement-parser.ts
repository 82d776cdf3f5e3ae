import type {
  AssignmentNode,
  CallNode,
  CallReceiver,
  ExpressionNode,
  IncludeDirective,
  ParsedFile,
  ParsedNode,
} from './types.ts';

export const SUPERGLOBALS = new Set([
  '$_GET',
  '$_POST',
  '$_COOKIE',
  '$_SESSION',
  '$_SERVER',
  '$_FILES',
  '$_ENV',
  '$_REQUEST',
  '$GLOBALS',
]);

/** Names that look like calls but are language constructs. */
const LANGUAGE_CONSTRUCTS = new Set([
  'array',
  'list',
  'isset',
  'unset',
  'empty',
  'eval',
  'exit',
  'die',
  'function',
  'fn',
  'match',
  'include',
  'include_once',
  'require',
  'require_once',
  'if',
  'elseif',
  'while',
  'for',
  'foreach',
  'switch',
  'catch',
  'declare',
  'use',
  'return',
  'echo',
  'print',
  'clone',
]);

const CONTROL_HEADER = /^(?:if|elseif|else\s+if|while|for|foreach|switch|catch|declare)\s*\(/i;
const BARE_CONTROL = /^(?:else|do|try|finally)\b:?/i;
const LEADING_KEYWORD = /^(?:return|echo|print|yield|throw)\b/i;
const CASE_LABEL = /^(?:case\b[^:]*|default\s*):(?!:)/i;
const OPEN_TAG = /^<\?(?:php\b|=)?/i;
const CLOSE_TAG = /\?>$/;

const ASSIGNMENT =
  /^(\$[A-Za-z_]\w*(?:\s*(?:\?->|->|::)\s*\$?[A-Za-z_]\w*|\s*\[[^\]]*\])*)\s*(\.=|\?\?=|\*\*=|[+\-*\/%]=|=(?![=>]))/;
const VARIABLE = /^\$[A-Za-z_]\w*(?:\s*\??->\s*[A-Za-z_]\w*)*$/;
const ARRAY_HEAD = /^(\$[A-Za-z_]\w*)\s*\[/;
const INCLUDE = /^(?:include|include_once|require|require_once)\b/i;
const CAST = /^\(\s*(?:string|int|integer|bool|boolean|float|double|array|object)\s*\)\s*/i;
const NAMED_ARGUMENT = /^[A-Za-z_]\w*\s*:(?!:)/;

// ── Fragments ────────────────────────────────────────────────────────────────

/**
 * A slice of source text plus a same-length copy with string contents masked,
 * so bracket and operator scans never look inside literals.
 */
interface Fragment {
  readonly text: string;
  readonly masked: string;
  readonly column: number;
}

interface Position {
  readonly file: string;
  readonly line: number;
}

function sliceFragment(fragment: Fragment, start: number, end?: number): Fragment {
  return {
    text: fragment.text.slice(start, end),
    masked: fragment.masked.slice(start, end),
    column: fragment.column + start,
  };
}

function trimFragment(fragment: Fragment): Fragment {
  const leading = fragment.text.length - fragment.text.trimStart().length;
  const trailing = fragment.text.length - fragment.text.trimEnd().length;
  if (leading === fragment.text.length) return sliceFragment(fragment, fragment.text.length);
  return sliceFragment(fragment, leading, fragment.text.length - trailing);
}

function dropPrefix(fragment: Fragment, length: number): Fragment {
  return trimFragment(sliceFragment(fragment, length));
}

// ── Lexical helpers ──────────────────────────────────────────────────────────

/** Replace the contents of string literals with `_`, keeping quotes and offsets. */
export function maskStrings(text: string): string {
  let result = '';
  let quote: string | null = null;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote) {
      if (escaped) {
        escaped = false;
        result += ch === '\n' ? ch : '_';
      } else if (ch === '\\') {
        escaped = true;
        result += '_';
      } else if (ch === quote) {
        quote = null;
        result += ch;
      } else {
        result += ch === '\n' ? ch : '_';
      }
    } else {
      if (ch === '"' || ch === "'" || ch === '`') quote = ch;
      result += ch;
    }
  }
  return result;
}

const blank = (text: string): string => text.replace(/[^\n]/g, ' ');

/**
 * Blank out comments and inline HTML, keeping line breaks so line numbers
 * survive. Content without any PHP open tag is treated as code throughout.
 */
export function extractPhpCode(content: string): string {
  let result = '';
  let inPhp = !/<\?(?:php\b|=)/i.test(content);
  let quote: string | null = null;
  let escaped = false;
  let i = 0;

  while (i < content.length) {
    if (!inPhp) {
      const open = /<\?(?:php\b|=)/gi;
      open.lastIndex = i;
      const match = open.exec(content);
      const stop = match ? match.index + match[0].length : content.length;
      result += blank(content.slice(i, stop));
      i = stop;
      inPhp = true;
      continue;
    }

    const ch = content.charAt(i);
    const next = content.charAt(i + 1);

    if (quote) {
      result += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === quote) quote = null;
      i++;
      continue;
    }

    if (ch === '?' && next === '>') {
      result += '  ';
      i += 2;
      inPhp = false;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = content.indexOf('*/', i + 2);
      const stop = end === -1 ? content.length : end + 2;
      result += blank(content.slice(i, stop));
      i = stop;
      continue;
    }

    if ((ch === '/' && next === '/') || ch === '#') {
      let stop = content.indexOf('\n', i);
      if (stop === -1) stop = content.length;
      const closeTag = content.indexOf('?>', i);
      if (closeTag !== -1 && closeTag < stop) stop = closeTag;
      result += blank(content.slice(i, stop));
      i = stop;
      continue;
    }

    if (ch === '"' || ch === "'" || ch === '`') quote = ch;
    result += ch;
    i++;
  }

  return result;
}

/** Index of the bracket closing the one at `open`, or -1. Expects masked text. */
export function findClosing(masked: string, open: number): number {
  let depth = 0;
  for (let i = open; i < masked.length; i++) {
    const ch = masked.charAt(i);
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Split at top-level positions accepted by `isSeparator`; empty pieces are
 * dropped. Braces nest only when `nestBraces` is set, since statement
 * splitting treats them as separators.
 */
function splitTopLevel(
  fragment: Fragment,
  isSeparator: (masked: string, index: number) => boolean,
  nestBraces = true
): Fragment[] {
  const pieces: Fragment[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < fragment.masked.length; i++) {
    const ch = fragment.masked.charAt(i);
    if (ch === '(' || ch === '[' || (nestBraces && ch === '{')) depth++;
    else if (ch === ')' || ch === ']' || (nestBraces && ch === '}')) depth = Math.max(0, depth - 1);
    else if (depth === 0 && isSeparator(fragment.masked, i)) {
      pieces.push(trimFragment(sliceFragment(fragment, start, i)));
      start = i + 1;
    }
  }
  pieces.push(trimFragment(sliceFragment(fragment, start)));
  return pieces.filter((piece) => piece.text.length > 0);
}

const STATEMENT_END = /[;{}]\s*$/;
/** A trailing `.`, `->`, `,` or assignment `=` (not the `<?=` tag) leaves the statement open. */
const OPEN_TAIL = /(?:\.|->|,|(?<!<\?)=)\s*$/;
/** A line opening with `.`, `->`, `?->` or `::` continues the one before it. */
const CONTINUED_HEAD = /^\s*(?:\.(?!\d)|\??->|::)/;

function nextCodeLine(maskedLines: string[], from: number): string {
  for (let j = from; j < maskedLines.length; j++) {
    const candidate = maskedLines[j] ?? '';
    if (candidate.trim()) return candidate;
  }
  return '';
}

/**
 * Join the lines of one statement: while `(` or `[` stay open, after a
 * dangling operator, and before a line that opens with `.` or `->`. Each
 * result keeps its first line number.
 */
function joinContinuationLines(
  lines: string[],
  maskedLines: string[]
): { text: string; masked: string; line: number }[] {
  const result: { text: string; masked: string; line: number }[] = [];
  let text = '';
  let masked = '';
  let startLine = 0;
  let depth = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const maskedLine = maskedLines[i] ?? '';
    if (text === '' && masked === '') startLine = i + 1;
    text += (text ? ' ' : '') + line;
    masked += (masked ? ' ' : '') + maskedLine;

    for (const ch of maskedLine) {
      if (ch === '(' || ch === '[') depth++;
      else if (ch === ')' || ch === ']') depth = Math.max(0, depth - 1);
    }

    if (depth > 0) continue;
    if (
      masked.trim() &&
      !STATEMENT_END.test(masked) &&
      (OPEN_TAIL.test(masked) || CONTINUED_HEAD.test(nextCodeLine(maskedLines, i + 1)))
    ) {
      continue;
    }

    result.push({ text, masked, line: startLine });
    text = '';
    masked = '';
  }
  if (text.trim()) result.push({ text, masked, line: startLine });
  return result;
}

// ── Statement preparation ────────────────────────────────────────────────────

/** Strip tags, control headers and leading output keywords; undefined when nothing is left. */
function prepareStatement(fragment: Fragment): Fragment | undefined {
  let current = trimFragment(fragment);

  const openTag = OPEN_TAG.exec(current.masked);
  if (openTag) current = dropPrefix(current, openTag[0].length);
  const closeTag = CLOSE_TAG.exec(current.masked);
  if (closeTag) current = trimFragment(sliceFragment(current, 0, closeTag.index));

  for (;;) {
    const header = CONTROL_HEADER.exec(current.masked);
    if (header) {
      const close = findClosing(current.masked, header[0].length - 1);
      if (close === -1) return undefined;
      current = dropPrefix(current, close + 1);
      if (current.masked.startsWith(':')) current = dropPrefix(current, 1);
      continue;
    }
    const prefix =
      BARE_CONTROL.exec(current.masked) ??
      CASE_LABEL.exec(current.masked) ??
      LEADING_KEYWORD.exec(current.masked);
    if (prefix) {
      current = dropPrefix(current, prefix[0].length);
      continue;
    }
    break;
  }

  return current.text.length > 0 ? current : undefined;
}

function matchInclude(fragment: Fragment): string | undefined {
  if (!INCLUDE.test(fragment.masked)) return undefined;
  const literals = [...fragment.text.matchAll(/(['"])([^'"]*)\1/g)];
  const last = literals[literals.length - 1];
  return last?.[2] || undefined;
}

// ── Expressions ──────────────────────────────────────────────────────────────

function unwrapExpression(fragment: Fragment): Fragment {
  let current = trimFragment(fragment);
  for (;;) {
    const cast = CAST.exec(current.masked);
    if (cast) {
      current = dropPrefix(current, cast[0].length);
      continue;
    }
    if (current.masked.startsWith('@') || current.masked.startsWith('&')) {
      current = dropPrefix(current, 1);
      continue;
    }
    if (
      current.masked.startsWith('(') &&
      findClosing(current.masked, 0) === current.masked.length - 1
    ) {
      current = trimFragment(sliceFragment(current, 1, current.masked.length - 1));
      continue;
    }
    return current;
  }
}

function isConcatenationDot(masked: string, index: number): boolean {
  if (masked.charAt(index) !== '.') return false;
  const previous = masked.charAt(index - 1);
  const next = masked.charAt(index + 1);
  if (previous === '.' || next === '.' || next === '=') return false;
  return !(/\d/.test(previous) && /\d/.test(next));
}

function splitArguments(fragment: Fragment): Fragment[] {
  return splitTopLevel(fragment, (masked, i) => masked.charAt(i) === ',').map((argument) => {
    let current = argument;
    const label = NAMED_ARGUMENT.exec(current.masked);
    if (label) current = dropPrefix(current, label[0].length);
    if (current.masked.startsWith('...')) current = dropPrefix(current, 3);
    return current;
  });
}

const NAME = /\$?[A-Za-z_\\][\w\\]*/y;

function readName(masked: string, index: number): string | undefined {
  NAME.lastIndex = index;
  return NAME.exec(masked)?.[0];
}

type Callable =
  | { kind: 'function' | 'constructor'; name: string }
  | { kind: 'method' | 'static'; name: string; receiverEnd: number };

/**
 * Match an expression that ends in a call: `f(..)`, `$o->m(..)`, `C::m(..)`,
 * `new C(..)` and chains such as `redirect()->to(..)`.
 */
function matchCall(fragment: Fragment, at: Position): CallNode | undefined {
  const { masked } = fragment;
  let i = 0;

  const newKeyword = /^new\s+/i.exec(masked);
  if (newKeyword) i = newKeyword[0].length;

  const head = readName(masked, i);
  if (!head) return undefined;
  if (newKeyword && head.startsWith('$')) return undefined;

  let callable: Callable | undefined = { kind: newKeyword ? 'constructor' : 'function', name: head };
  let last: { callable: Callable; open: number; close: number } | undefined;
  i += head.length;

  while (i < masked.length) {
    const ch = masked.charAt(i);
    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const operator = masked.startsWith('?->', i)
      ? '?->'
      : masked.startsWith('->', i)
        ? '->'
        : masked.startsWith('::', i)
          ? '::'
          : undefined;
    if (operator) {
      const receiverEnd = i;
      i += operator.length;
      while (/\s/.test(masked.charAt(i))) i++;
      const name = readName(masked, i);
      if (!name) return undefined;
      callable = { kind: operator === '::' ? 'static' : 'method', name, receiverEnd };
      last = undefined;
      i += name.length;
      continue;
    }

    if (ch === '(') {
      const close = findClosing(masked, i);
      if (close === -1) return undefined;
      if (
        callable &&
        callable.kind === 'function' &&
        LANGUAGE_CONSTRUCTS.has(callable.name.toLowerCase())
      ) {
        return undefined;
      }
      last = callable ? { callable, open: i, close } : undefined;
      callable = undefined;
      i = close + 1;
      continue;
    }

    if (ch === '[' || ch === '{') {
      const close = findClosing(masked, i);
      if (close === -1) return undefined;
      callable = undefined;
      last = undefined;
      i = close + 1;
      continue;
    }

    return undefined;
  }

  if (!last) return undefined;

  const args = splitArguments(sliceFragment(fragment, last.open + 1, last.close)).map((arg) =>
    parseExpressionFragment(arg, at)
  );

  return {
    kind: 'call',
    callee: last.callable.name,
    arguments: args,
    receiver: receiverFor(last.callable, fragment, at),
    file: at.file,
    line: at.line,
    column: fragment.column,
    rawText: fragment.text,
  };
}

function receiverFor(callable: Callable, fragment: Fragment, at: Position): CallReceiver {
  switch (callable.kind) {
    case 'function':
      return { kind: 'function' };
    case 'constructor':
      return { kind: 'constructor' };
    case 'method':
      return {
        kind: 'method',
        object: parseExpressionFragment(sliceFragment(fragment, 0, callable.receiverEnd), at),
      };
    case 'static':
      return { kind: 'static', className: fragment.text.slice(0, callable.receiverEnd).trim() };
  }
}

function unquote(text: string): string {
  const quoted = /^(['"])(.*)\1$/s.exec(text);
  return quoted ? (quoted[2] ?? '') : text;
}

function parseExpressionFragment(input: Fragment, at: Position): ExpressionNode {
  const fragment = unwrapExpression(input);
  const location = {
    file: at.file,
    line: at.line,
    column: fragment.column,
    rawText: fragment.text,
  };

  const parts = splitTopLevel(fragment, isConcatenationDot);
  if (parts.length > 1) {
    return {
      kind: 'concatenation',
      parts: parts.map((part) => parseExpressionFragment(part, at)),
      ...location,
    };
  }

  if (VARIABLE.test(fragment.masked)) {
    return {
      kind: 'variable-ref',
      name: fragment.text.replace(/\s+/g, '').replace(/\?->/g, '->'),
      ...location,
    };
  }

  const arrayHead = ARRAY_HEAD.exec(fragment.masked);
  if (arrayHead) {
    const container = arrayHead[1] ?? '';
    let open = arrayHead[0].length - 1;
    let key: string | undefined;
    for (;;) {
      const close = findClosing(fragment.masked, open);
      if (close === -1) break;
      key ??= unquote(fragment.text.slice(open + 1, close).trim());
      const rest = fragment.masked.slice(close + 1);
      const next = close + 1 + (rest.length - rest.trimStart().length);
      if (next >= fragment.masked.length) {
        return {
          kind: 'array-access',
          container,
          key,
          isExternalInput: SUPERGLOBALS.has(container),
          ...location,
        };
      }
      if (fragment.masked.charAt(next) !== '[') break;
      open = next;
    }
  }

  const call = matchCall(fragment, at);
  if (call) return call;

  return { kind: 'literal', text: fragment.text, ...location };
}

// ── Public API ───────────────────────────────────────────────────────────────

function targetVariable(target: string): string {
  return target
    .replace(/\s+/g, '')
    .replace(/\?->/g, '->')
    .replace(/\[[^\]]*\]/g, '');
}

function recognize(fragment: Fragment, at: Position): ParsedNode | undefined {
  const assignment = ASSIGNMENT.exec(fragment.masked);
  if (assignment) {
    const target = targetVariable(fragment.text.slice(0, (assignment[1] ?? '').length));
    const source = dropPrefix(fragment, assignment[0].length);
    if (!source.text) return undefined;
    const node: AssignmentNode = {
      kind: 'assignment',
      target,
      operator: assignment[2] ?? '=',
      source: parseExpressionFragment(source, at),
      file: at.file,
      line: at.line,
      column: fragment.column,
      rawText: fragment.text,
    };
    return node;
  }

  const expression = parseExpressionFragment(fragment, at);
  switch (expression.kind) {
    case 'call':
    case 'array-access':
    case 'variable-ref':
      return expression;
    case 'literal':
    case 'concatenation':
      return undefined;
  }
}

/**
 * Parse one statement into zero or one node. A trailing `;` is ignored. Never
 * throws: text matching no recognised construct yields undefined.
 */
export function parseStatement(
  text: string,
  position: { file: string; line: number; column?: number }
): ParsedNode | undefined {
  const statement = text.replace(/;\s*$/, '');
  const prepared = prepareStatement({
    text: statement,
    masked: maskStrings(statement),
    column: position.column ?? 1,
  });
  return prepared ? recognize(prepared, position) : undefined;
}

/** Parse a standalone expression (used when normalizing external reports). */
export function parseExpression(
  text: string,
  position: { file: string; line: number; column?: number }
): ExpressionNode {
  return parseExpressionFragment(
    { text, masked: maskStrings(text), column: position.column ?? 1 },
    position
  );
}

export function parseFile(path: string, content: string): ParsedFile {
  const code = extractPhpCode(content);
  const logicalLines = joinContinuationLines(code.split('\n'), maskStrings(code).split('\n'));
  const nodes: ParsedNode[] = [];
  const includes: IncludeDirective[] = [];

  for (const logical of logicalLines) {
    const statements = splitTopLevel(
      { ...logical, column: 1 },
      (masked, i) => {
        const ch = masked.charAt(i);
        return ch === ';' || ch === '{' || ch === '}';
      },
      false
    );

    for (const statement of statements) {
      const prepared = prepareStatement(statement);
      if (!prepared) continue;

      const at = { file: path, line: logical.line };
      const includeTarget = matchInclude(prepared);
      if (includeTarget) {
        includes.push({ file: path, line: logical.line, target: includeTarget });
        continue;
      }

      const node = recognize(prepared, at);
      if (node) nodes.push(node);
    }
  }

  return { path, nodes, includes };
}

// ── Node helpers ─────────────────────────────────────────────────────────────

/** Every call inside a node, outermost first. */
export function collectCalls(node: ParsedNode): CallNode[] {
  switch (node.kind) {
    case 'assignment':
      return collectCalls(node.source);
    case 'call': {
      const nested = node.receiver.kind === 'method' ? collectCalls(node.receiver.object) : [];
      return [node, ...nested, ...node.arguments.flatMap(collectCalls)];
    }
    case 'concatenation':
      return node.parts.flatMap(collectCalls);
    case 'array-access':
    case 'variable-ref':
    case 'literal':
      return [];
  }
}

/** `redirect`, `$this->redirect`, `URL::to`, `new RedirectResponse`. */
export function callDisplayName(call: CallNode): string {
  switch (call.receiver.kind) {
    case 'function':
      return call.callee;
    case 'constructor':
      return `new ${call.callee}`;
    case 'method':
      return `${call.receiver.object.rawText.replace(/\s+/g, '')}->${call.callee}`;
    case 'static':
      return `${call.receiver.className}::${call.callee}`;
  }
}

/** Callee without namespace, lowercased for rule lookup. */
export function bareCalleeName(call: CallNode): string {
  const segments = call.callee.split('\\');
  return (segments[segments.length - 1] ?? call.callee).toLowerCase();
}

export interface CallSiteRef {
  file: string;
  line: number;
  column: number;
  /** Display name, see callDisplayName. */
  callee: string;
}

/** Name of the synthetic node standing for argument `index` of a call site. */
export function argumentNodeName(site: CallSiteRef, index: number): string {
  return `${site.callee}#arg${index}@${site.file}:${site.line}:${site.column}`;
}

export function callSiteOf(call: CallNode): CallSiteRef {
  return { file: call.file, line: call.line, column: call.column, callee: callDisplayName(call) };
}

/**
 * Variables referenced in free-form expression text. Single-quoted strings are
 * skipped; variables inside double-quoted strings are reported as interpolated.
 */
export function scanVariables(text: string): { name: string; interpolated: boolean }[] {
  const masked = maskStrings(text);
  const found = new Map<string, boolean>();

  const code = masked.replace(/"_*"/g, (match) => ' '.repeat(match.length));
  for (const match of code.matchAll(/\$[A-Za-z_]\w*(?:\s*->\s*[A-Za-z_]\w*(?![\w(]))*/g)) {
    const name = match[0].replace(/\s+/g, '');
    if (!found.has(name)) found.set(name, false);
  }

  for (let i = masked.indexOf('"'); i !== -1; ) {
    const close = masked.indexOf('"', i + 1);
    if (close === -1) break;
    const content = text.slice(i + 1, close);
    for (const match of content.matchAll(/(?<!\\)\$[A-Za-z_]\w*(?:->[A-Za-z_]\w*)?/g)) {
      if (!found.has(match[0])) found.set(match[0], true);
    }
    i = masked.indexOf('"', close + 1);
  }

  return [...found].map(([name, interpolated]) => ({ name, interpolated }));
}
