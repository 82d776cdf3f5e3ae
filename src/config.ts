// ── Engine options ───────────────────────────────────────────────────────────

export type VariableScopeMode = 'global' | 'include-linked';

const VARIABLE_SCOPE_MODES: readonly VariableScopeMode[] = ['global', 'include-linked'];

/** Multiplicative confidence reductions; each lies strictly between 0 and 1. */
export interface PenaltyFactors {
  guard: number;
  validation: number;
  crossFile: number;
}

export interface EdgeWeights {
  assign: number;
  concatenation: number;
  arrayAccess: number;
  callArgument: number;
}

export interface TierThresholds {
  high: number;
  medium: number;
}

export interface EngineOptions {
  minConfidence: number;
  variableScope: VariableScopeMode;
  penalties: PenaltyFactors;
  edgeWeights: EdgeWeights;
  tiers: TierThresholds;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  minConfidence: 0.3,
  variableScope: 'global',
  penalties: { guard: 0.7, validation: 0.8, crossFile: 0.9 },
  edgeWeights: { assign: 1, concatenation: 1, arrayAccess: 0.9, callArgument: 1 },
  tiers: { high: 0.7, medium: 0.4 },
};

export interface EngineOverrides {
  minConfidence?: number;
  variableScope?: VariableScopeMode;
  penalties?: Partial<PenaltyFactors>;
  edgeWeights?: Partial<EdgeWeights>;
  tiers?: Partial<TierThresholds>;
}

export function isVariableScopeMode(value: string): value is VariableScopeMode {
  return VARIABLE_SCOPE_MODES.some((mode) => mode === value);
}

function numberFromEnv(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid ${name}="${raw}": expected a number`);
  }
  return value;
}

function scopeFromEnv(env: NodeJS.ProcessEnv): VariableScopeMode | undefined {
  const raw = env.HNP_VARIABLE_SCOPE?.trim();
  if (!raw) return undefined;
  if (!isVariableScopeMode(raw)) {
    throw new Error(
      `Invalid HNP_VARIABLE_SCOPE="${raw}": expected one of ${VARIABLE_SCOPE_MODES.join(', ')}`
    );
  }
  return raw;
}

function assertRange(label: string, value: number, min: number, max: number, open = false): void {
  const inside = open ? value > min && value < max : value >= min && value <= max;
  if (!Number.isFinite(value) || !inside) {
    const range = open ? `(${min}, ${max})` : `[${min}, ${max}]`;
    throw new Error(`Invalid ${label} ${value}: must lie in ${range}`);
  }
}

/**
 * Merge overrides over environment values over defaults. Penalties must lie
 * strictly inside (0, 1) and the medium tier may not exceed the high tier.
 */
export function resolveEngineOptions(
  overrides: EngineOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): EngineOptions {
  const defaults = DEFAULT_ENGINE_OPTIONS;
  const options: EngineOptions = {
    minConfidence:
      overrides.minConfidence ?? numberFromEnv('HNP_MIN_CONFIDENCE', env) ?? defaults.minConfidence,
    variableScope: overrides.variableScope ?? scopeFromEnv(env) ?? defaults.variableScope,
    penalties: { ...defaults.penalties, ...overrides.penalties },
    edgeWeights: { ...defaults.edgeWeights, ...overrides.edgeWeights },
    tiers: { ...defaults.tiers, ...overrides.tiers },
  };

  assertRange('minimum confidence', options.minConfidence, 0, 1);
  for (const [name, factor] of Object.entries(options.penalties)) {
    assertRange(`${name} penalty`, factor, 0, 1, true);
  }
  for (const [name, weight] of Object.entries(options.edgeWeights)) {
    assertRange(`${name} edge weight`, weight, 0, 1);
  }
  assertRange('medium tier threshold', options.tiers.medium, 0, 1);
  assertRange('high tier threshold', options.tiers.high, options.tiers.medium, 1);

  return options;
}

// ── Scan settings ────────────────────────────────────────────────────────────

export interface ScanSettings {
  framework: string;
  concurrency: number;
  /** Lowercase file extensions, dot included. */
  extensions: string[];
  ignoredDirectories: string[];
}

export const DEFAULT_SCAN_SETTINGS: ScanSettings = {
  framework: 'generic',
  concurrency: 8,
  extensions: ['.php', '.phtml', '.inc'],
  ignoredDirectories: ['vendor', 'node_modules', 'cache', 'storage'],
};

export function resolveScanSettings(
  overrides: Partial<ScanSettings> = {},
  env: NodeJS.ProcessEnv = process.env
): ScanSettings {
  const concurrency =
    overrides.concurrency ?? numberFromEnv('HNP_CONCURRENCY', env) ?? DEFAULT_SCAN_SETTINGS.concurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Invalid concurrency ${concurrency}: must be a positive integer`);
  }

  return {
    framework: overrides.framework || env.HNP_FRAMEWORK?.trim() || DEFAULT_SCAN_SETTINGS.framework,
    concurrency,
    extensions: overrides.extensions ?? DEFAULT_SCAN_SETTINGS.extensions,
    ignoredDirectories: overrides.ignoredDirectories ?? DEFAULT_SCAN_SETTINGS.ignoredDirectories,
  };
}
