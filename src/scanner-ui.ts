import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { TierThresholds } from './config.ts';
import { confidenceTier } from './taint/flows.ts';
import type { AnalysisResult, ConfidenceTier, SinkKind, TaintFlow } from './taint/types.ts';

const TIER_LABELS: Record<ConfidenceTier, string> = {
  high: pc.red(pc.bold('HIGH')),
  medium: pc.yellow('MEDIUM'),
  low: pc.blue('LOW'),
};

const TIER_ORDER: Record<ConfidenceTier, number> = { low: 0, medium: 1, high: 2 };

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

function truncate(text: string, max = 120): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text;
}

function describeEvidence(flow: TaintFlow): string {
  const notes: string[] = [];
  if (flow.flowType === 'cross-file') notes.push('cross-file');
  if (flow.hasGuard) notes.push('guard present');
  if (flow.hasValidation) notes.push('validation present');
  return notes.length > 0 ? pc.dim(` (${notes.join(', ')})`) : '';
}

function displayFlow(flow: TaintFlow, tiers: TierThresholds): void {
  const tier = confidenceTier(flow.confidence, tiers);
  const sink = flow.sink;
  p.log.message(
    `  ${TIER_LABELS[tier]} ${flow.source.sourceKind} → ${sink.sinkKind} ` +
      `${pc.dim(flow.confidence.toFixed(2))}${describeEvidence(flow)}`
  );
  p.log.message(pc.dim(`    ${sink.file}:${sink.line}: ${truncate(sink.rawText)}`));
  for (const step of flow.flowPath) {
    p.log.message(pc.dim(`      ${step.file}:${step.line}  ${truncate(step.label, 100)}`));
  }
}

function displayBreakdown(counts: Record<SinkKind, number>): void {
  const parts = Object.entries(counts)
    .filter(([, count]) => count > 0)
    .map(([kind, count]) => `${kind} ${count}`);
  if (parts.length > 0) p.log.info(`By sink kind: ${parts.join(', ')}`);
}

/**
 * Print a scan result. Flows are listed strongest first; the highest tier
 * found decides the closing message.
 */
export function presentScanResults(result: AnalysisResult, tiers: TierThresholds): void {
  const { flows, stats, skippedFiles } = result;
  p.log.info(
    pc.dim(
      `${plural(stats.filesAnalyzed, 'file')} analyzed with the ${result.framework} library ` +
        `(${result.backend} back end): ${plural(result.sources.length, 'source')}, ` +
        `${plural(result.sinks.length, 'sink')}`
    )
  );

  if (skippedFiles.length > 0) {
    p.log.warn(pc.yellow(`Skipped ${plural(skippedFiles.length, 'unreadable file')}`));
    for (const skipped of skippedFiles) {
      p.log.message(pc.dim(`  ${skipped.path}: ${skipped.reason}`));
    }
  }

  if (flows.length === 0) {
    p.log.success(pc.green('No host-header taint flows found'));
    return;
  }

  console.log();
  p.log.warn(pc.yellow(`Found ${plural(flows.length, 'taint flow')}`));
  const ordered = [...flows].sort((a, b) => b.confidence - a.confidence);
  for (const flow of ordered) displayFlow(flow, tiers);

  console.log();
  const { high, medium, low } = result.countsByConfidence;
  p.log.info(`By confidence: ${TIER_LABELS.high} ${high}  ${TIER_LABELS.medium} ${medium}  ${TIER_LABELS.low} ${low}`);
  displayBreakdown(result.countsBySinkKind);

  const top = ordered.reduce<ConfidenceTier>((max, flow) => {
    const tier = confidenceTier(flow.confidence, tiers);
    return TIER_ORDER[tier] > TIER_ORDER[max] ? tier : max;
  }, 'low');
  if (top === 'high') {
    p.log.error(pc.red(pc.bold('High-confidence host-header poisoning exposure detected.')));
  } else {
    p.log.info(pc.dim('Only medium/low confidence flows; review them manually.'));
  }
}
