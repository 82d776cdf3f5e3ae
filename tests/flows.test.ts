import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_OPTIONS } from '../src/config.ts';
import { confidenceTier, scoreFlow, sinkStep, sourceStep, summarizeFlows } from '../src/taint/flows.ts';
import { createGuardDetector, detectGuardEvidence } from '../src/taint/guards.ts';
import { loadPatternLibrary } from '../src/rules.ts';
import type { SinkKind, TaintFlow, TaintSink, TaintSource } from '../src/taint/types.ts';

const { penalties, tiers } = DEFAULT_ENGINE_OPTIONS;
const library = loadPatternLibrary('generic');

const source: TaintSource = {
  file: 'a.php',
  line: 2,
  column: 1,
  variable: '$host',
  sourceKind: 'host-header',
  rawText: "$host = $_SERVER['HTTP_HOST']",
  baseConfidence: 1,
};

function sink(sinkKind: SinkKind): TaintSink {
  return {
    file: 'a.php',
    line: 4,
    column: 1,
    callee: 'redirect',
    arguments: ['$url'],
    sinkKind,
    rawText: 'redirect($url)',
  };
}

function flow(confidence: number, sinkKind: SinkKind): TaintFlow {
  return {
    source,
    sink: sink(sinkKind),
    taintedArgument: '$url',
    flowPath: [],
    hasGuard: false,
    hasValidation: false,
    confidence,
    flowType: 'same-file',
  };
}

// ── Scoring ──────────────────────────────────────────────────────────────────

describe('scoreFlow', () => {
  it('keeps the base confidence without evidence', () => {
    expect(scoreFlow(0.9, { hasGuard: false, hasValidation: false, flowType: 'same-file' }, penalties)).toBe(0.9);
  });

  it('applies each penalty that holds', () => {
    expect(scoreFlow(1, { hasGuard: true, hasValidation: false, flowType: 'same-file' }, penalties)).toBe(0.7);
    expect(scoreFlow(1, { hasGuard: false, hasValidation: true, flowType: 'same-file' }, penalties)).toBe(0.8);
    expect(scoreFlow(1, { hasGuard: false, hasValidation: false, flowType: 'cross-file' }, penalties)).toBe(0.9);
    expect(scoreFlow(1, { hasGuard: true, hasValidation: true, flowType: 'cross-file' }, penalties)).toBeCloseTo(
      0.504
    );
  });
});

describe('confidenceTier', () => {
  it('buckets by the configured thresholds', () => {
    expect(confidenceTier(0.7, tiers)).toBe('high');
    expect(confidenceTier(0.69, tiers)).toBe('medium');
    expect(confidenceTier(0.4, tiers)).toBe('medium');
    expect(confidenceTier(0.39, tiers)).toBe('low');
  });
});

describe('summarizeFlows', () => {
  it('counts flows per tier and sink kind with every key present', () => {
    const summary = summarizeFlows([flow(1, 'redirect'), flow(0.5, 'mail'), flow(0.35, 'redirect')], tiers);
    expect(summary.countsByConfidence).toEqual({ high: 1, medium: 1, low: 1 });
    expect(summary.countsBySinkKind).toEqual({
      'url-generation': 0,
      redirect: 2,
      authentication: 0,
      'template-render': 0,
      'response-header': 0,
      mail: 1,
      unknown: 0,
    });
  });
});

// ── Path steps ───────────────────────────────────────────────────────────────

describe('path steps', () => {
  it('labels the source by its variable', () => {
    expect(sourceStep(source)).toEqual({ file: 'a.php', line: 2, label: 'source: $host' });
  });

  it('labels inline sources by the expression read', () => {
    const inline = { ...source, variable: 'header#arg0@a.php:5:1', rawText: "$_SERVER['HTTP_HOST']" };
    expect(sourceStep(inline).label).toBe("source: $_SERVER['HTTP_HOST']");
  });

  it('labels the sink with the tainted argument', () => {
    expect(sinkStep(sink('redirect'), 0)).toEqual({ file: 'a.php', line: 4, label: 'sink: redirect($url)' });
  });
});

// ── Guard evidence ───────────────────────────────────────────────────────────

describe('guard detection', () => {
  const contents = new Map([
    ['config.php', "<?php\n$trustedHosts = ['example.com'];\n"],
    ['view.php', '<?php\necho htmlspecialchars($name);\n'],
    ['plain.php', "<?php\n$host = $_SERVER['HTTP_HOST'];\n"],
  ]);

  it('finds nothing in a file without evidence', () => {
    expect(detectGuardEvidence(contents, 'plain.php', 'plain.php', library)).toEqual({
      hasGuard: false,
      hasValidation: false,
      matched: [],
    });
  });

  it('unites evidence from the source and sink files', () => {
    expect(detectGuardEvidence(contents, 'config.php', 'view.php', library)).toEqual({
      hasGuard: true,
      hasValidation: true,
      matched: ['trusted-hosts', 'htmlspecialchars'],
    });
  });

  it('treats files it was not given as empty', () => {
    const detect = createGuardDetector(contents, library);
    expect(detect('missing.php', 'plain.php').hasGuard).toBe(false);
  });
});
