import { describe, it, expect } from 'vitest';
import type { EngineOverrides } from '../src/config.ts';
import { analyzeSources } from '../src/taint/index.ts';
import { loadPatternLibrary } from '../src/rules.ts';
import type { SourceFile } from '../src/taint/types.ts';

const generic = loadPatternLibrary('generic');

function php(...lines: string[]): string {
  return ['<?php', ...lines].join('\n') + '\n';
}

function analyze(files: SourceFile[], overrides: EngineOverrides = {}) {
  return analyzeSources({ files }, generic, overrides);
}

// ── Single file ──────────────────────────────────────────────────────────────

describe('direct Host flows', () => {
  const direct = php(
    "$host = $_SERVER['HTTP_HOST'];",
    '$url = "https://" . $host;',
    'redirect($url);'
  );

  it('reports a Host read reaching a redirect at full confidence', () => {
    const result = analyze([{ path: 'index.php', content: direct }]);
    expect(result.flows).toHaveLength(1);
    const flow = result.flows[0];
    expect(flow?.source.variable).toBe('$host');
    expect(flow?.sink.sinkKind).toBe('redirect');
    expect(flow?.taintedArgument).toBe('$url');
    expect(flow?.confidence).toBe(1);
    expect(flow?.hasGuard).toBe(false);
    expect(flow?.hasValidation).toBe(false);
    expect(flow?.flowType).toBe('same-file');
    expect(flow?.flowPath).toEqual([
      { file: 'index.php', line: 2, label: 'source: $host' },
      { file: 'index.php', line: 3, label: 'concatenation: $url' },
      { file: 'index.php', line: 4, label: 'sink: redirect($url)' },
    ]);
    expect(result.countsByConfidence).toEqual({ high: 1, medium: 0, low: 0 });
    expect(result.countsBySinkKind.redirect).toBe(1);
  });

  it('lowers confidence when a trusted host list is present', () => {
    const content = php("$trustedHosts = ['example.com'];", ...direct.split('\n').slice(1, 4));
    const [flow] = analyze([{ path: 'index.php', content }]).flows;
    expect(flow?.hasGuard).toBe(true);
    expect(flow?.confidence).toBe(0.7);
  });

  it('lowers confidence when the file escapes the Host value', () => {
    const content = php(
      "$host = $_SERVER['HTTP_HOST'];",
      '$label = htmlspecialchars($host);',
      '$url = "https://" . $host;',
      'redirect($url);'
    );
    const result = analyze([{ path: 'index.php', content }]);
    expect(result.flows).toHaveLength(1);
    expect(result.flows[0]?.hasValidation).toBe(true);
    expect(result.flows[0]?.confidence).toBe(0.8);
  });

  it('follows a concatenation written over several lines', () => {
    const content = php(
      "$url = 'https://'",
      "  . $_SERVER['HTTP_HOST']",
      "  . '/reset';",
      'redirect($url);'
    );
    const result = analyze([{ path: 'index.php', content }]);
    expect(result.flows).toHaveLength(1);
    expect(result.flows[0]?.source).toMatchObject({ variable: '$url', line: 2, sourceKind: 'host-header' });
    expect(result.flows[0]?.sink).toMatchObject({ callee: 'redirect', line: 5 });
    expect(result.flows[0]?.confidence).toBe(1);
  });

  it('matches a redirector chain written over several lines', () => {
    const content = php('$host = $request->getHost();', 'return redirect()', "    ->to('https://' . $host);");
    const result = analyzeSources({ files: [{ path: 'app.php', content }] }, loadPatternLibrary('laravel'));
    expect(result.flows).toHaveLength(1);
    const flow = result.flows[0];
    expect(flow?.source.variable).toBe('$host');
    expect(flow?.source.sourceKind).toBe('request-host');
    expect(flow?.sink).toMatchObject({ callee: 'redirect()->to', line: 3, sinkKind: 'redirect' });
    expect(flow?.confidence).toBeCloseTo(0.9);
  });

  it('reports a Host read passed straight into a sink', () => {
    const content = php("header('Location: https://' . $_SERVER['HTTP_HOST'] . '/login');");
    const [flow] = analyze([{ path: 'index.php', content }]).flows;
    expect(flow?.sink.sinkKind).toBe('response-header');
    expect(flow?.confidence).toBe(1);
    expect(flow?.flowPath.map((step) => step.label)).toEqual([
      "source: 'Location: https://' . $_SERVER['HTTP_HOST'] . '/login'",
      "sink: header('Location: https://' . $_SERVER['HTTP_HOST'] . '/login')",
    ]);
  });

  it('stops at taint-removing functions', () => {
    const content = php(
      "$host = $_SERVER['HTTP_HOST'];",
      '$safe = htmlspecialchars($host);',
      'redirect($safe);'
    );
    expect(analyze([{ path: 'index.php', content }]).flows).toEqual([]);
  });

  it('scores flows through unknown functions at the unknown weight', () => {
    const content = php("$host = $_SERVER['HTTP_HOST'];", '$url = build_link($host);', 'redirect($url);');
    const [flow] = analyze([{ path: 'index.php', content }]).flows;
    expect(flow?.confidence).toBe(0.4);
    expect(flow?.flowPath.map((step) => step.label)).toEqual([
      'source: $host',
      'function-call-return: $url',
      'sink: redirect($url)',
    ]);
  });

  it('follows a Host value used as an array key', () => {
    const content = php("$host = $_SERVER['HTTP_HOST'];", '$target = $routes[$host];', 'redirect($target);');
    const [flow] = analyze([{ path: 'index.php', content }]).flows;
    expect(flow?.confidence).toBeCloseTo(0.9);
    expect(flow?.flowPath.map((step) => step.label)).toEqual([
      'source: $host',
      'array-access: $target',
      'sink: redirect($target)',
    ]);
  });

  it('drops flows scored below the minimum confidence', () => {
    const content = php("$host = $_SERVER['HTTP_HOST'];", '$url = build_link($host);', 'redirect($url);');
    expect(analyze([{ path: 'index.php', content }], { minConfidence: 0.5 }).flows).toEqual([]);
  });

  it('picks the argument carrying the strongest taint', () => {
    const content = php(
      "$host = $_SERVER['HTTP_HOST'];",
      '$weak = build_link($host);',
      'mail($weak, $host);'
    );
    const [flow] = analyze([{ path: 'index.php', content }]).flows;
    expect(flow?.sink.sinkKind).toBe('mail');
    expect(flow?.taintedArgument).toBe('$host');
    expect(flow?.confidence).toBe(1);
  });

  it('reports nothing for sinks fed by constants', () => {
    const content = php("$url = 'https://example.com/login';", 'redirect($url);');
    const result = analyze([{ path: 'index.php', content }]);
    expect(result.sinks).toHaveLength(1);
    expect(result.flows).toEqual([]);
  });
});

// ── Several files ────────────────────────────────────────────────────────────

describe('cross-file flows', () => {
  const config = { path: 'config.php', content: php("$host = $_SERVER['HTTP_HOST'];") };
  const page = {
    path: 'page.php',
    content: php("require __DIR__ . '/config.php';", "redirect('https://' . $host);"),
  };
  const unrelated = {
    path: 'other.php',
    content: php("$host = 'static.example.com';", "redirect('https://' . $host);"),
  };

  it('links same-named variables across files under global scope', () => {
    const result = analyze([config, unrelated]);
    expect(result.flows).toHaveLength(1);
    const flow = result.flows[0];
    expect(flow?.flowType).toBe('cross-file');
    expect(flow?.confidence).toBe(0.9);
    expect(flow?.flowPath).toEqual([
      { file: 'config.php', line: 2, label: 'source: $host' },
      { file: 'other.php', line: 3, label: "sink: redirect('https://' . $host)" },
    ]);
  });

  it('keeps unrelated files apart under include-linked scope', () => {
    expect(analyze([config, unrelated], { variableScope: 'include-linked' }).flows).toEqual([]);
  });

  it('follows include directives under include-linked scope', () => {
    const result = analyze([config, page], { variableScope: 'include-linked' });
    expect(result.flows).toHaveLength(1);
    expect(result.flows[0]?.sink.file).toBe('page.php');
    expect(result.flows[0]?.confidence).toBe(0.9);
  });

  it('does not link differently named variables', () => {
    const other = { path: 'other.php', content: php("redirect('https://' . $name);") };
    expect(analyze([config, other]).flows).toEqual([]);
  });
});

// ── Results ──────────────────────────────────────────────────────────────────

describe('analysis results', () => {
  it('returns empty counts for no input', () => {
    const result = analyze([]);
    expect(result.flows).toEqual([]);
    expect(result.sources).toEqual([]);
    expect(result.sinks).toEqual([]);
    expect(result.countsByConfidence).toEqual({ high: 0, medium: 0, low: 0 });
    expect(Object.values(result.countsBySinkKind).every((count) => count === 0)).toBe(true);
    expect(result.stats).toEqual({ filesAnalyzed: 0, nodes: 0, edges: 0, taintedVariables: 0 });
    expect(result.backend).toBe('builtin');
    expect(result.framework).toBe('generic');
  });

  it('gives identical results regardless of file order', () => {
    const files = [
      { path: 'b.php', content: php("$host = $_SERVER['HTTP_HOST'];", 'redirect($host);') },
      { path: 'a.php', content: php("$h = $_SERVER['SERVER_NAME'];", 'header("Location: $h");') },
    ];
    const first = analyze(files);
    const second = analyze([...files].reverse());
    expect(second).toEqual(first);
    expect(first.flows.map((flow) => flow.sink.file)).toEqual(['a.php', 'b.php']);
  });

  it('carries skipped files into the result', () => {
    const result = analyzeSources({ files: [], skipped: [{ path: 'bad.php', reason: 'invalid UTF-8' }] }, generic);
    expect(result.skippedFiles).toEqual([{ path: 'bad.php', reason: 'invalid UTF-8' }]);
  });
});
