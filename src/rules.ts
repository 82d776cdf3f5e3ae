import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { SINK_KINDS, SOURCE_KINDS, type SinkKind, type SourceKind } from './taint/types.ts';

// ── Types ────────────────────────────────────────────────────────────────────

export interface SourcePattern {
  kind: SourceKind;
  pattern: RegExp;
  confidence: number;
  description: string;
}

export interface SinkPattern {
  kind: SinkKind;
  /** Tested against the call's display name, e.g. `redirect()->to`. */
  pattern: RegExp;
  description: string;
}

export interface EvidencePattern {
  id: string;
  pattern: RegExp;
  description: string;
}

export interface PropagationRules {
  /** Lowercased bare function names. */
  preserving: ReadonlySet<string>;
  removing: ReadonlySet<string>;
  preservingWeight: number;
  unknownWeight: number;
}

export interface PatternLibrary {
  framework: string;
  sources: SourcePattern[];
  sinks: SinkPattern[];
  guards: EvidencePattern[];
  validations: EvidencePattern[];
  propagation: PropagationRules;
}

/**
 * JSON shape of a pattern library file. Patterns are regex strings without
 * delimiters; `flags` defaults to "i".
 */
export interface PatternLibraryDefinition {
  framework: string;
  extends?: string;
  sources?: { kind: SourceKind; pattern: string; flags?: string; confidence?: number; description?: string }[];
  sinks?: { kind: SinkKind; pattern: string; flags?: string; description?: string }[];
  guards?: { id: string; pattern: string; flags?: string; description?: string }[];
  validations?: { id: string; pattern: string; flags?: string; description?: string }[];
  propagation?: {
    preserving?: string[];
    removing?: string[];
    preservingWeight?: number;
    unknownWeight?: number;
  };
}

export class PatternLibraryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PatternLibraryError';
  }
}

export const DEFAULT_PRESERVING_WEIGHT = 0.9;
export const DEFAULT_UNKNOWN_WEIGHT = 0.4;
const MIN_PRESERVING_WEIGHT = 0.8;

const FRAMEWORK_ID = /^[a-z0-9][a-z0-9_-]*$/i;

/** Directory holding the built-in libraries (`rules/` at the package root). */
export function builtinRulesDirectory(): string {
  return fileURLToPath(new URL('../rules/', import.meta.url));
}

// ── Validation ───────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSourceKind(value: unknown): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

function isSinkKind(value: unknown): value is SinkKind {
  return SINK_KINDS.some((kind) => kind === value);
}

function isWeight(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

function compilePattern(entry: Record<string, unknown>, label: string, source: string): RegExp {
  const text = entry.pattern;
  if (!text || typeof text !== 'string') {
    throw new PatternLibraryError(
      `${label} in ${source} is missing a valid "pattern" field (regex string)`
    );
  }
  const flags = entry.flags ?? 'i';
  if (typeof flags !== 'string') {
    throw new PatternLibraryError(`${label} in ${source} has a non-string "flags" field`);
  }
  if (/[gy]/.test(flags)) {
    throw new PatternLibraryError(
      `${label} in ${source} uses stateful regex flags "${flags}". The g and y flags are not allowed`
    );
  }

  try {
    return new RegExp(text, flags);
  } catch (err) {
    throw new PatternLibraryError(
      `${label} in ${source} has invalid regex pattern: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

function optionalDescription(entry: Record<string, unknown>, fallback: string): string {
  return typeof entry.description === 'string' && entry.description ? entry.description : fallback;
}

function entriesOf(
  definition: Record<string, unknown>,
  field: string,
  source: string
): Record<string, unknown>[] {
  const value = definition[field];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new PatternLibraryError(`Invalid pattern library ${source}: "${field}" must be an array`);
  }
  return value.map((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      throw new PatternLibraryError(
        `Entry at index ${index} of "${field}" in ${source} is not a valid object`
      );
    }
    return entry;
  });
}

/** Validate and compile one source entry. Throws descriptive errors for invalid entries. */
export function parseSourcePattern(entry: Record<string, unknown>, index: number, source: string): SourcePattern {
  const label = `Source pattern ${index}`;
  const kind = entry.kind;
  if (!isSourceKind(kind)) {
    throw new PatternLibraryError(
      `${label} in ${source} has invalid kind "${String(kind)}". ` +
        `Must be one of: ${SOURCE_KINDS.join(', ')}`
    );
  }
  const confidence = entry.confidence ?? 1;
  if (!isWeight(confidence)) {
    throw new PatternLibraryError(`${label} in ${source} has confidence outside [0, 1]`);
  }
  const pattern = compilePattern(entry, label, source);
  return {
    kind,
    pattern,
    confidence,
    description: optionalDescription(entry, pattern.source),
  };
}

export function parseSinkPattern(entry: Record<string, unknown>, index: number, source: string): SinkPattern {
  const label = `Sink pattern ${index}`;
  const kind = entry.kind;
  if (!isSinkKind(kind)) {
    throw new PatternLibraryError(
      `${label} in ${source} has invalid kind "${String(kind)}". ` +
        `Must be one of: ${SINK_KINDS.join(', ')}`
    );
  }
  const pattern = compilePattern(entry, label, source);
  return { kind, pattern, description: optionalDescription(entry, pattern.source) };
}

export function parseEvidencePattern(
  entry: Record<string, unknown>,
  field: 'guards' | 'validations',
  source: string
): EvidencePattern {
  const id = entry.id;
  if (!id || typeof id !== 'string') {
    throw new PatternLibraryError(`Entry of "${field}" in ${source} is missing a valid "id" field`);
  }
  const pattern = compilePattern(entry, `Pattern "${id}"`, source);
  return { id, pattern, description: optionalDescription(entry, id) };
}

function nameList(value: unknown, field: string, source: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((name): name is string => typeof name === 'string')) {
    throw new PatternLibraryError(
      `Invalid pattern library ${source}: "propagation.${field}" must be an array of function names`
    );
  }
  return value.map((name: string) => name.toLowerCase());
}

function weightField(
  propagation: Record<string, unknown>,
  field: string,
  source: string
): number | undefined {
  const value = propagation[field];
  if (value === undefined) return undefined;
  if (!isWeight(value)) {
    throw new PatternLibraryError(
      `Invalid pattern library ${source}: "propagation.${field}" must be a number between 0 and 1`
    );
  }
  return value;
}

// ── Compilation and inheritance ──────────────────────────────────────────────

interface CompiledDefinition {
  framework: string;
  parent: string | undefined;
  sources: SourcePattern[];
  sinks: SinkPattern[];
  guards: EvidencePattern[];
  validations: EvidencePattern[];
  preserving: string[];
  removing: string[];
  preservingWeight: number | undefined;
  unknownWeight: number | undefined;
}

/** Validate a parsed JSON value as a pattern library definition. */
export function compileDefinition(parsed: unknown, source: string): CompiledDefinition {
  if (!isRecord(parsed)) {
    throw new PatternLibraryError(`Invalid pattern library ${source}: must be a JSON object`);
  }
  const framework = parsed.framework;
  if (!framework || typeof framework !== 'string') {
    throw new PatternLibraryError(`Invalid pattern library ${source}: missing a valid "framework" field`);
  }
  const parent = parsed.extends;
  if (parent !== undefined && typeof parent !== 'string') {
    throw new PatternLibraryError(`Invalid pattern library ${source}: "extends" must be a framework id`);
  }

  const propagation = parsed.propagation ?? {};
  if (!isRecord(propagation)) {
    throw new PatternLibraryError(`Invalid pattern library ${source}: "propagation" must be an object`);
  }
  const preservingWeight = weightField(propagation, 'preservingWeight', source);
  if (preservingWeight !== undefined && preservingWeight < MIN_PRESERVING_WEIGHT) {
    throw new PatternLibraryError(
      `Invalid pattern library ${source}: "propagation.preservingWeight" must be at least ${MIN_PRESERVING_WEIGHT}`
    );
  }

  return {
    framework,
    parent,
    sources: entriesOf(parsed, 'sources', source).map((entry, i) => parseSourcePattern(entry, i, source)),
    sinks: entriesOf(parsed, 'sinks', source).map((entry, i) => parseSinkPattern(entry, i, source)),
    guards: entriesOf(parsed, 'guards', source).map((entry) =>
      parseEvidencePattern(entry, 'guards', source)
    ),
    validations: entriesOf(parsed, 'validations', source).map((entry) =>
      parseEvidencePattern(entry, 'validations', source)
    ),
    preserving: nameList(propagation.preserving, 'preserving', source),
    removing: nameList(propagation.removing, 'removing', source),
    preservingWeight,
    unknownWeight: weightField(propagation, 'unknownWeight', source),
  };
}

/** Child entries come first so their patterns win; a child's function rule overrides its parent's. */
function inherit(child: CompiledDefinition, parent: PatternLibrary | undefined): PatternLibrary {
  const childPreserving = new Set(child.preserving);
  const childRemoving = new Set(child.removing);
  const preserving = new Set(child.preserving);
  const removing = new Set(child.removing);

  if (parent) {
    for (const name of parent.propagation.preserving) {
      if (!childRemoving.has(name)) preserving.add(name);
    }
    for (const name of parent.propagation.removing) {
      if (!childPreserving.has(name)) removing.add(name);
    }
  }

  return {
    framework: child.framework,
    sources: [...child.sources, ...(parent?.sources ?? [])],
    sinks: [...child.sinks, ...(parent?.sinks ?? [])],
    guards: [...child.guards, ...(parent?.guards ?? [])],
    validations: [...child.validations, ...(parent?.validations ?? [])],
    propagation: {
      preserving,
      removing,
      preservingWeight:
        child.preservingWeight ?? parent?.propagation.preservingWeight ?? DEFAULT_PRESERVING_WEIGHT,
      unknownWeight: child.unknownWeight ?? parent?.propagation.unknownWeight ?? DEFAULT_UNKNOWN_WEIGHT,
    },
  };
}

// ── Loading ──────────────────────────────────────────────────────────────────

function readDefinitionFile(absPath: string): CompiledDefinition {
  if (!existsSync(absPath)) {
    throw new PatternLibraryError(`Pattern library file not found: ${absPath}`);
  }

  const content = readFileSync(absPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch {
    throw new PatternLibraryError(
      `Failed to parse ${absPath} as JSON. Pattern library files must be valid JSON.`
    );
  }

  return compileDefinition(parsed, absPath);
}

function locateFramework(framework: string, searchDirs: string[]): string {
  if (!FRAMEWORK_ID.test(framework)) {
    throw new PatternLibraryError(
      `Invalid framework id "${framework}": use letters, digits, "-" and "_" only`
    );
  }
  for (const dir of searchDirs) {
    const candidate = join(dir, `${framework}.json`);
    if (existsSync(candidate)) return candidate;
  }
  throw new PatternLibraryError(
    `No pattern library for framework "${framework}" (searched: ${searchDirs.join(', ')})`
  );
}

function loadChain(absPath: string, searchDirs: string[], chain: string[]): PatternLibrary {
  const definition = readDefinitionFile(absPath);
  if (chain.includes(definition.framework)) {
    throw new PatternLibraryError(
      `Pattern library inheritance cycle: ${[...chain, definition.framework].join(' -> ')}`
    );
  }
  const parent = definition.parent
    ? loadChain(locateFramework(definition.parent, searchDirs), searchDirs, [
        ...chain,
        definition.framework,
      ])
    : undefined;
  return inherit(definition, parent);
}

export interface LoadLibraryOptions {
  /** A library file, or a directory searched before the built-in one. */
  rulesPath?: string;
}

/**
 * Load the pattern library for a framework id. With `rulesPath` pointing at a
 * file, that file is the library and `framework` is ignored; its `extends`
 * resolves against the file's directory, then the built-in libraries.
 *
 * Throws PatternLibraryError when a file is missing or invalid: the engine
 * cannot run without its libraries.
 */
export function loadPatternLibrary(framework: string, options: LoadLibraryOptions = {}): PatternLibrary {
  const builtin = builtinRulesDirectory();

  if (!options.rulesPath) {
    return loadChain(locateFramework(framework, [builtin]), [builtin], []);
  }

  const absPath = isAbsolute(options.rulesPath) ? options.rulesPath : resolve(options.rulesPath);
  if (!existsSync(absPath)) {
    throw new PatternLibraryError(`Rules path not found: ${absPath}`);
  }

  if (statSync(absPath).isFile()) {
    return loadChain(absPath, [dirname(absPath), builtin], []);
  }

  const searchDirs = [absPath, builtin];
  return loadChain(locateFramework(framework, searchDirs), searchDirs, []);
}

/** Framework ids with a built-in library, sorted. */
export function listFrameworks(): string[] {
  return readdirSync(builtinRulesDirectory(), { encoding: 'utf-8' })
    .filter((entry) => entry.endsWith('.json'))
    .map((entry) => entry.slice(0, -'.json'.length))
    .sort();
}
