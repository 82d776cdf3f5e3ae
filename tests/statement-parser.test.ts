import { describe, it, expect } from 'vitest';
import {
  argumentNodeName,
  callDisplayName,
  collectCalls,
  extractPhpCode,
  parseFile,
  parseStatement,
  scanVariables,
} from '../src/taint/statement-parser.ts';
import type { CallNode, ParsedNode } from '../src/taint/types.ts';

const at = { file: 'index.php', line: 1 };

function asCall(node: ParsedNode | undefined): CallNode {
  if (node?.kind !== 'call') throw new Error(`expected a call, got ${node?.kind ?? 'nothing'}`);
  return node;
}

// ── Statements ───────────────────────────────────────────────────────────────

describe('parseStatement', () => {
  it('parses a superglobal read into an assignment', () => {
    const node = parseStatement("$host = $_SERVER['HTTP_HOST'];", { file: 'a.php', line: 3 });
    expect(node).toMatchObject({
      kind: 'assignment',
      target: '$host',
      operator: '=',
      file: 'a.php',
      line: 3,
      column: 1,
      rawText: "$host = $_SERVER['HTTP_HOST']",
      source: {
        kind: 'array-access',
        container: '$_SERVER',
        key: 'HTTP_HOST',
        isExternalInput: true,
        column: 9,
      },
    });
  });

  it('splits concatenations without looking inside strings', () => {
    const node = parseStatement('$url = "https://" . $host . "/reset";', at);
    expect(node?.kind).toBe('assignment');
    if (node?.kind !== 'assignment') return;
    expect(node.source.kind).toBe('concatenation');
    if (node.source.kind !== 'concatenation') return;
    expect(node.source.parts.map((part) => part.kind)).toEqual(['literal', 'variable-ref', 'literal']);
  });

  it('keeps compound operators', () => {
    const node = parseStatement('$a .= $b', at);
    expect(node).toMatchObject({ kind: 'assignment', target: '$a', operator: '.=' });
  });

  it('strips casts from the right-hand side', () => {
    const node = parseStatement('$n = (string) $host', at);
    expect(node).toMatchObject({ source: { kind: 'variable-ref', name: '$host' } });
  });

  it('does not treat a comparison as an assignment', () => {
    expect(parseStatement('$a == $b', at)).toBeUndefined();
  });

  it('reads property targets without array offsets', () => {
    const node = parseStatement("$this->config['host'] = $host", at);
    expect(node).toMatchObject({ kind: 'assignment', target: '$this->config' });
  });

  it('drops control headers and keeps the body statement', () => {
    const call = asCall(parseStatement('if ($ok) redirect($url);', at));
    expect(call.callee).toBe('redirect');
    expect(call.column).toBe(10);
  });

  it('drops leading output keywords', () => {
    expect(parseStatement('echo $name;', at)).toMatchObject({ kind: 'variable-ref', name: '$name' });
  });

  it('ignores language constructs that look like calls', () => {
    expect(parseStatement('isset($host)', at)).toBeUndefined();
  });
});

// ── Calls ────────────────────────────────────────────────────────────────────

describe('call display names', () => {
  it('names plain function calls by their callee', () => {
    expect(callDisplayName(asCall(parseStatement('redirect($url)', at)))).toBe('redirect');
  });

  it('names method calls by receiver and method', () => {
    const call = asCall(parseStatement('$this->redirect($url)', at));
    expect(call.receiver).toMatchObject({ kind: 'method', object: { kind: 'variable-ref', name: '$this' } });
    expect(callDisplayName(call)).toBe('$this->redirect');
  });

  it('names static calls by class and method', () => {
    expect(callDisplayName(asCall(parseStatement('Redirect::to($url)', at)))).toBe('Redirect::to');
  });

  it('names constructor calls with new', () => {
    expect(callDisplayName(asCall(parseStatement('new RedirectResponse($url)', at)))).toBe(
      'new RedirectResponse'
    );
  });

  it('names chained calls after the whole receiver', () => {
    const call = asCall(parseStatement('redirect()->to($url)', at));
    expect(callDisplayName(call)).toBe('redirect()->to');
    expect(collectCalls(call).map(callDisplayName)).toEqual(['redirect()->to', 'redirect']);
  });

  it('reads header bag receivers as property chains', () => {
    const node = parseStatement("$h = $req->headers->get('host')", at);
    if (node?.kind !== 'assignment') throw new Error('expected an assignment');
    expect(callDisplayName(asCall(node.source))).toBe('$req->headers->get');
  });

  it('splits arguments at top-level commas only', () => {
    const call = asCall(parseStatement("sprintf('%s/%s', implode(',', $parts), $host)", at));
    expect(call.arguments.map((argument) => argument.rawText)).toEqual([
      "'%s/%s'",
      "implode(',', $parts)",
      '$host',
    ]);
  });

  it('collects nested calls outermost first', () => {
    const call = asCall(parseStatement('header(sprintf("Location: %s", url($path)))', at));
    expect(collectCalls(call).map((c) => c.callee)).toEqual(['header', 'sprintf', 'url']);
  });
});

describe('argumentNodeName', () => {
  it('identifies an argument by call site and index', () => {
    expect(argumentNodeName({ file: 'a.php', line: 4, column: 3, callee: 'redirect' }, 0)).toBe(
      'redirect#arg0@a.php:4:3'
    );
  });
});

// ── Files ────────────────────────────────────────────────────────────────────

describe('extractPhpCode', () => {
  it('treats content without an open tag as code', () => {
    expect(extractPhpCode('$a = $b;')).toBe('$a = $b;');
  });

  it('blanks comments while keeping line breaks', () => {
    expect(extractPhpCode('<?php\n// x\n$a = 1;')).toBe('     \n    \n$a = 1;');
  });
});

describe('parseFile', () => {
  it('skips comments and inline HTML but keeps line numbers', () => {
    const content = [
      '<html><?php',
      "// $host = $_SERVER['HTTP_HOST'];",
      '$a = $b; /* $c = $d; */',
      '?>',
      '<p>text</p>',
      '<?= $a ?>',
    ].join('\n');
    const parsed = parseFile('page.php', content);
    expect(parsed.nodes.map((node) => [node.kind, node.line])).toEqual([
      ['assignment', 3],
      ['variable-ref', 6],
    ]);
  });

  it('joins calls spanning several lines onto their first line', () => {
    const parsed = parseFile('a.php', '<?php\nredirect(\n  $url\n);\n');
    expect(parsed.nodes).toHaveLength(1);
    const call = asCall(parsed.nodes[0]);
    expect(call.line).toBe(2);
    expect(call.arguments.map((argument) => argument.rawText)).toEqual(['$url']);
  });

  it('joins a concatenation continued by leading dots', () => {
    const parsed = parseFile('a.php', "<?php\n$url = 'https://'\n  . $_SERVER['HTTP_HOST']\n  . '/reset';\nredirect($url);\n");
    expect(parsed.nodes.map((node) => [node.kind, node.line])).toEqual([
      ['assignment', 2],
      ['call', 5],
    ]);
    const assignment = parsed.nodes[0];
    if (assignment?.kind !== 'assignment') throw new Error('expected an assignment');
    expect(assignment.source.kind).toBe('concatenation');
  });

  it('joins a method chain continued by a leading arrow', () => {
    const parsed = parseFile('a.php', "<?php\nreturn redirect()\n    ->to('https://' . $host);\n");
    expect(parsed.nodes).toHaveLength(1);
    const call = asCall(parsed.nodes[0]);
    expect(call.line).toBe(2);
    expect(callDisplayName(call)).toBe('redirect()->to');
    expect(call.arguments.map((argument) => argument.rawText)).toEqual(["'https://' . $host"]);
  });

  it('joins a statement left open by a trailing operator', () => {
    const parsed = parseFile('a.php', "<?php\n$url =\n  $base . '/reset';\n$done = 1;\n");
    expect(parsed.nodes.map((node) => [node.kind, node.line])).toEqual([
      ['assignment', 2],
      ['assignment', 4],
    ]);
  });

  it('keeps a finished statement apart from the next line', () => {
    const parsed = parseFile('a.php', '<?php\n$a = $b;\n$c = $a;\n');
    expect(parsed.nodes.map((node) => node.line)).toEqual([2, 3]);
  });

  it('parses several statements on one line with their columns', () => {
    const parsed = parseFile('a.php', '<?php\n$a = $b; $c = $a;\n');
    expect(parsed.nodes.map((node) => [node.line, node.column])).toEqual([
      [2, 1],
      [2, 10],
    ]);
  });

  it('splits statements at braces', () => {
    const parsed = parseFile('a.php', '<?php\nif ($x) { redirect($u); }\n');
    expect(parsed.nodes.map((node) => node.kind)).toEqual(['call']);
  });

  it('records include directives instead of nodes', () => {
    const parsed = parseFile('index.php', "<?php\nrequire_once __DIR__ . '/config.php';\n");
    expect(parsed.nodes).toEqual([]);
    expect(parsed.includes).toEqual([{ file: 'index.php', line: 2, target: '/config.php' }]);
  });

  it('returns nothing for an empty file', () => {
    expect(parseFile('empty.php', '')).toEqual({ path: 'empty.php', nodes: [], includes: [] });
  });
});

describe('scanVariables', () => {
  it('reports variables interpolated into double-quoted strings', () => {
    expect(scanVariables('"https://$host/path" . $suffix')).toEqual([
      { name: '$suffix', interpolated: false },
      { name: '$host', interpolated: true },
    ]);
  });

  it('ignores single-quoted strings', () => {
    expect(scanVariables("'$x' . $y")).toEqual([{ name: '$y', interpolated: false }]);
  });
});
