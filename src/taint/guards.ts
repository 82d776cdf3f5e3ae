import type { EvidencePattern, PatternLibrary } from '../rules.ts';

export interface GuardEvidence {
  hasGuard: boolean;
  hasValidation: boolean;
  /** Ids of the guard patterns found, then of the validation patterns. */
  matched: string[];
}

interface FileEvidence {
  guards: string[];
  validations: string[];
}

export type GuardDetector = (sourceFile: string, sinkFile: string) => GuardEvidence;

function matchingIds(patterns: readonly EvidencePattern[], text: string): string[] {
  return patterns.filter((entry) => entry.pattern.test(text)).map((entry) => entry.id);
}

/**
 * Evidence is looked for anywhere in the source's file and the sink's file;
 * a hit lowers a flow's confidence but never removes the flow. Files missing
 * from `contents` contribute nothing.
 */
export function createGuardDetector(
  contents: ReadonlyMap<string, string>,
  library: PatternLibrary
): GuardDetector {
  const cache = new Map<string, FileEvidence>();

  function evidenceFor(file: string): FileEvidence {
    const cached = cache.get(file);
    if (cached) return cached;
    const text = contents.get(file) ?? '';
    const evidence = {
      guards: matchingIds(library.guards, text),
      validations: matchingIds(library.validations, text),
    };
    cache.set(file, evidence);
    return evidence;
  }

  return (sourceFile, sinkFile) => {
    const files = sourceFile === sinkFile ? [sourceFile] : [sourceFile, sinkFile];
    const guards = new Set<string>();
    const validations = new Set<string>();
    for (const file of files) {
      const evidence = evidenceFor(file);
      evidence.guards.forEach((id) => guards.add(id));
      evidence.validations.forEach((id) => validations.add(id));
    }
    return {
      hasGuard: guards.size > 0,
      hasValidation: validations.size > 0,
      matched: [...guards, ...validations],
    };
  };
}

export function detectGuardEvidence(
  contents: ReadonlyMap<string, string>,
  sourceFile: string,
  sinkFile: string,
  library: PatternLibrary
): GuardEvidence {
  return createGuardDetector(contents, library)(sourceFile, sinkFile);
}
