import type { BenchmarkOutcome, ResultSet, Speedup } from './types.js';

export function aggregate(outcomes: readonly BenchmarkOutcome[]): ResultSet {
  const results = new Map<string, BenchmarkOutcome>();
  for (const outcome of outcomes) {
    results.set(outcome.toolName, outcome);
  }
  return results;
}

export function succeeded(outcome: BenchmarkOutcome | undefined): outcome is BenchmarkOutcome & { averageSeconds: number } {
  return outcome !== undefined && outcome.averageSeconds !== null && outcome.error === null;
}

export function baseline(results: ResultSet, primaryTool: string): number | null {
  const primary = results.get(primaryTool);
  return succeeded(primary) ? primary.averageSeconds : null;
}

/**
 * Below 1.5x one decimal is kept so near-parity results never read "1x";
 * from 1.5x up the ratio is rounded to a whole number.
 */
export function formatRatio(ratio: number): string {
  return ratio >= 1.5 ? `${ratio.toFixed(0)}x slower` : `${ratio.toFixed(1)}x slower`;
}

export function relativeLabel(outcome: BenchmarkOutcome, baselineSeconds: number | null, primaryTool: string): string {
  if (baselineSeconds === null || !succeeded(outcome)) {
    return '';
  }
  if (outcome.toolName === primaryTool) {
    return 'baseline';
  }
  return formatRatio(outcome.averageSeconds / baselineSeconds);
}

/** How many times slower each other successful tool is than the primary, in display order. */
export function speedups(
  results: ResultSet,
  baselineSeconds: number | null,
  primaryTool: string,
  order: readonly string[]
): Speedup[] {
  if (baselineSeconds === null) {
    return [];
  }
  return order
    .filter(name => name !== primaryTool)
    .map(name => results.get(name))
    .filter(succeeded)
    .map(outcome => ({ toolName: outcome.toolName, ratio: outcome.averageSeconds / baselineSeconds }));
}

/** Display order first, then anything else in insertion order. */
export function orderedNames(results: ResultSet, displayOrder: readonly string[]): string[] {
  const listed = displayOrder.filter(name => results.has(name));
  const rest = [...results.keys()].filter(name => !displayOrder.includes(name));
  return [...listed, ...rest];
}
