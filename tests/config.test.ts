import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ENGINE_OPTIONS,
  DEFAULT_SCAN_SETTINGS,
  resolveEngineOptions,
  resolveScanSettings,
} from '../src/config.ts';

describe('resolveEngineOptions', () => {
  it('returns the defaults without overrides or environment', () => {
    expect(resolveEngineOptions({}, {})).toEqual(DEFAULT_ENGINE_OPTIONS);
  });

  it('reads the environment under explicit overrides', () => {
    const env = { HNP_MIN_CONFIDENCE: '0.5', HNP_VARIABLE_SCOPE: 'include-linked' };
    expect(resolveEngineOptions({}, env)).toMatchObject({ minConfidence: 0.5, variableScope: 'include-linked' });
    expect(resolveEngineOptions({ minConfidence: 0.2 }, env).minConfidence).toBe(0.2);
  });

  it('merges partial penalty and tier overrides', () => {
    const options = resolveEngineOptions({ penalties: { guard: 0.5 }, tiers: { high: 0.8 } }, {});
    expect(options.penalties).toEqual({ guard: 0.5, validation: 0.8, crossFile: 0.9 });
    expect(options.tiers).toEqual({ high: 0.8, medium: 0.4 });
  });

  it('rejects penalties that would not lower confidence', () => {
    expect(() => resolveEngineOptions({ penalties: { guard: 1 } }, {})).toThrow(
      'Invalid guard penalty 1: must lie in (0, 1)'
    );
  });

  it('rejects a high tier below the medium tier', () => {
    expect(() => resolveEngineOptions({ tiers: { high: 0.3 } }, {})).toThrow(
      'Invalid high tier threshold 0.3: must lie in [0.4, 1]'
    );
  });

  it('rejects malformed environment values', () => {
    expect(() => resolveEngineOptions({}, { HNP_MIN_CONFIDENCE: 'high' })).toThrow(
      'Invalid HNP_MIN_CONFIDENCE="high": expected a number'
    );
    expect(() => resolveEngineOptions({}, { HNP_VARIABLE_SCOPE: 'local' })).toThrow(
      /Invalid HNP_VARIABLE_SCOPE="local"/
    );
  });
});

describe('resolveScanSettings', () => {
  it('returns the defaults without overrides or environment', () => {
    expect(resolveScanSettings({}, {})).toEqual(DEFAULT_SCAN_SETTINGS);
  });

  it('takes framework and concurrency from the environment', () => {
    const settings = resolveScanSettings({}, { HNP_FRAMEWORK: 'laravel', HNP_CONCURRENCY: '2' });
    expect(settings.framework).toBe('laravel');
    expect(settings.concurrency).toBe(2);
  });

  it('rejects a concurrency that is not a positive integer', () => {
    expect(() => resolveScanSettings({ concurrency: 0 }, {})).toThrow(
      'Invalid concurrency 0: must be a positive integer'
    );
    expect(() => resolveScanSettings({}, { HNP_CONCURRENCY: '1.5' })).toThrow(/must be a positive integer/);
  });
});
