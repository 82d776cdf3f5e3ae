import { writeFile } from 'fs/promises';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { isVariableScopeMode, resolveEngineOptions } from './config.ts';
import { createLogger } from './logger.ts';
import { listFrameworks } from './rules.ts';
import { presentScanResults } from './scanner-ui.ts';
import { scanProject, type ScanOptions } from './scanner.ts';

const logger = createLogger('cli');

export interface CliOptions {
  target: string;
  help: boolean;
  /** File the full result is written to as JSON. */
  jsonOutput?: string;
  scan: ScanOptions;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: hnp-scan [path] [options]

Options:
  --framework <id>        Pattern library to use (default: generic)
  --rules <path>          Library file, or a directory searched before the built-in libraries
  --min-confidence <n>    Drop flows scored below n (0-1, default 0.3)
  --scope <mode>          Variable identity: global or include-linked (default: global)
  --concurrency <n>       Files read in parallel (default 8)
  --semgrep <file>        Normalize a Semgrep --json report instead of running the engine
  --psalm <file>          Normalize a Psalm --output-format=json report instead of running the engine
  --json <file>           Also write the full result as JSON
  -h, --help              Show this help

Exit codes: 0 no high-confidence flow, 1 high-confidence flow found, 2 error.`;

function valueAfter(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

function numberValue(raw: string, flag: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new UsageError(`Invalid ${flag} value: ${raw}`);
  }
  return value;
}

/** Parse command-line arguments. Throws UsageError on unknown flags or bad values. */
export function parseScanOptions(argv: readonly string[]): CliOptions {
  const options: CliOptions = { target: '.', help: false, scan: {} };
  let targetSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--framework':
        options.scan.framework = valueAfter(argv, i++, arg);
        break;
      case '--rules':
        options.scan.rulesPath = valueAfter(argv, i++, arg);
        break;
      case '--min-confidence': {
        const value = numberValue(valueAfter(argv, i++, arg), arg);
        if (value < 0 || value > 1) throw new UsageError(`${arg} must be between 0 and 1`);
        options.scan.engine = { ...options.scan.engine, minConfidence: value };
        break;
      }
      case '--scope': {
        const value = valueAfter(argv, i++, arg);
        if (!isVariableScopeMode(value)) {
          throw new UsageError(`Invalid --scope value: ${value} (expected global or include-linked)`);
        }
        options.scan.engine = { ...options.scan.engine, variableScope: value };
        break;
      }
      case '--concurrency': {
        const value = numberValue(valueAfter(argv, i++, arg), arg);
        if (!Number.isInteger(value) || value < 1) {
          throw new UsageError(`${arg} must be a positive integer`);
        }
        options.scan.concurrency = value;
        break;
      }
      case '--semgrep':
        options.scan.semgrepReport = valueAfter(argv, i++, arg);
        break;
      case '--psalm':
        options.scan.psalmReport = valueAfter(argv, i++, arg);
        break;
      case '--json':
        options.jsonOutput = valueAfter(argv, i++, arg);
        break;
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);
        if (targetSeen) throw new UsageError(`Unexpected argument: ${arg}`);
        options.target = arg;
        targetSeen = true;
    }
  }

  if (options.scan.semgrepReport && options.scan.psalmReport) {
    throw new UsageError('--semgrep and --psalm cannot be combined');
  }
  return options;
}

/** Run the command line; resolves to the process exit code. */
export async function runCli(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseScanOptions(argv);
  } catch (err) {
    p.log.error(pc.red(err instanceof Error ? err.message : String(err)));
    console.log(USAGE);
    return 2;
  }

  if (options.help) {
    console.log(USAGE);
    console.log(`\nBuilt-in frameworks: ${listFrameworks().join(', ')}`);
    return 0;
  }

  p.intro(pc.bgCyan(pc.black(' hnp-scan ')));
  const spinner = p.spinner();
  spinner.start(`Scanning ${options.target}`);

  try {
    const tiers = resolveEngineOptions(options.scan.engine).tiers;
    const result = await scanProject(options.target, options.scan);
    spinner.stop(`Scanned ${options.target}`);
    presentScanResults(result, tiers);

    if (options.jsonOutput) {
      await writeFile(options.jsonOutput, JSON.stringify(result, null, 2) + '\n', 'utf-8');
      p.log.info(pc.dim(`Result written to ${options.jsonOutput}`));
    }

    p.outro(result.flows.length > 0 ? 'Review the flows above' : 'Done');
    return result.countsByConfidence.high > 0 ? 1 : 0;
  } catch (err) {
    spinner.stop('Scan failed', 2);
    logger.error({ err }, 'Scan failed');
    p.log.error(pc.red(err instanceof Error ? err.message : String(err)));
    return 2;
  }
}
