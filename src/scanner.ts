import { readdir, readFile, stat } from 'fs/promises';
import pLimit from 'p-limit';
import { basename, dirname, extname, join, resolve } from 'path';
import { resolveScanSettings, type EngineOverrides, type ScanSettings } from './config.ts';
import { createLogger } from './logger.ts';
import { loadPatternLibrary } from './rules.ts';
import {
  analyzeWithBackend,
  builtinBackend,
  createPsalmBackend,
  createSemgrepBackend,
  readReportFile,
  type AnalysisBackend,
} from './backends/index.ts';
import type { AnalysisResult, SkippedFile, SourceFile } from './taint/types.ts';

const logger = createLogger('scanner');

// ── Types ────────────────────────────────────────────────────────────────────

export interface ScanOptions extends Partial<ScanSettings> {
  /** Library file, or a directory searched before the built-in libraries. */
  rulesPath?: string;
  engine?: EngineOverrides;
  /** Semgrep `--json` report to normalize instead of running the built-in engine. */
  semgrepReport?: string;
  /** Psalm `--output-format=json` report to normalize instead of running the built-in engine. */
  psalmReport?: string;
}

export interface ReadResult {
  files: SourceFile[];
  skipped: SkippedFile[];
}

// ── Bounded concurrency ──────────────────────────────────────────────────────

/**
 * Map over items with at most `concurrency` calls in flight. Output order
 * matches input order.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const limit = pLimit(Math.max(1, concurrency));
  return Promise.all(items.map((item, index) => limit(() => fn(item, index))));
}

// ── File collection ──────────────────────────────────────────────────────────

export interface CollectResult {
  /** Relative paths with `/` separators, sorted. */
  paths: string[];
  /** Subdirectories that could not be listed. */
  skipped: SkippedFile[];
}

/**
 * Every file under `root` whose extension is in `settings.extensions`. Dot
 * entries and ignored directories are not entered. A subdirectory that cannot
 * be listed is skipped and reported; an unreadable root throws.
 */
export async function collectSourceFiles(
  root: string,
  settings: Pick<ScanSettings, 'extensions' | 'ignoredDirectories'>
): Promise<CollectResult> {
  const found: string[] = [];
  const skipped: SkippedFile[] = [];
  const extensions = new Set(settings.extensions.map((ext) => ext.toLowerCase()));
  const ignored = new Set(settings.ignoredDirectories);

  async function readDir(dir: string, prefix: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
      if (!prefix) throw err;
      logger.warn({ err, dir }, 'Skipping unreadable directory');
      skipped.push({ path: prefix, reason: err instanceof Error ? err.message : String(err) });
      return undefined;
    });
    if (!entries) return;
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const fullPath = join(dir, entry.name);
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isFile() && extensions.has(extname(entry.name).toLowerCase())) {
        found.push(relativePath);
      } else if (entry.isDirectory() && !ignored.has(entry.name)) {
        await readDir(fullPath, relativePath);
      }
    }
  }

  await readDir(root, '');
  return { paths: found.sort(), skipped };
}

/**
 * Read files as strict UTF-8. A file that cannot be read or decoded is
 * skipped and reported, never fatal to the run.
 */
export async function readSourceFiles(
  root: string,
  paths: readonly string[],
  concurrency: number
): Promise<ReadResult> {
  const slots = await mapConcurrent(
    paths,
    async (path): Promise<SourceFile | SkippedFile> => {
      try {
        const buffer = await readFile(join(root, path));
        const content = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
        return { path, content };
      } catch (err) {
        const reason = err instanceof TypeError ? 'invalid UTF-8' : err instanceof Error ? err.message : String(err);
        logger.warn({ err, file: path }, 'Skipping unreadable file');
        return { path, reason };
      }
    },
    concurrency
  );

  const files: SourceFile[] = [];
  const skipped: SkippedFile[] = [];
  for (const slot of slots) {
    if ('content' in slot) files.push(slot);
    else skipped.push(slot);
  }
  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { files, skipped };
}

// ── Scan ─────────────────────────────────────────────────────────────────────

function selectBackend(options: ScanOptions): AnalysisBackend {
  if (options.semgrepReport && options.psalmReport) {
    throw new Error('Choose one report: --semgrep and --psalm cannot be combined');
  }
  if (options.semgrepReport) return createSemgrepBackend(readReportFile(options.semgrepReport));
  if (options.psalmReport) return createPsalmBackend(readReportFile(options.psalmReport));
  return builtinBackend;
}

/**
 * Collect, read and analyze a directory (or a single file). Throws on
 * configuration problems: a missing pattern library, a bad report or an
 * unreadable root.
 */
export async function scanProject(target: string, options: ScanOptions = {}): Promise<AnalysisResult> {
  const settings = resolveScanSettings(options);
  const library = loadPatternLibrary(settings.framework, { rulesPath: options.rulesPath });
  const backend = selectBackend(options);

  const absTarget = resolve(target);
  const info = await stat(absTarget);
  const root = info.isFile() ? dirname(absTarget) : absTarget;
  const collected: CollectResult = info.isFile()
    ? { paths: [basename(absTarget)], skipped: [] }
    : await collectSourceFiles(root, settings);
  logger.debug({ root, files: collected.paths.length, framework: library.framework }, 'Collected files');

  const { files, skipped } = await readSourceFiles(root, collected.paths, settings.concurrency);
  return analyzeWithBackend(backend, { files, skipped: [...collected.skipped, ...skipped] }, library, options.engine);
}
