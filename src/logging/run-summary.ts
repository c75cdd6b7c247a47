/**
 * Run Summary
 * Accumulates per-container outcomes into the four summary counters
 */

import { ContainerOutcome, OutcomeKind, RunSummary } from '../types/container';

/**
 * Builder for collecting run summary data
 */
export class RunSummaryBuilder {
  private readonly counts: Record<OutcomeKind, number> = {
    started: 0,
    already_running: 0,
    skipped: 0,
    failed: 0,
  };
  private readonly outcomes: ContainerOutcome[] = [];

  /**
   * Record one container outcome; increments exactly one counter
   */
  record(outcome: ContainerOutcome): void {
    this.counts[outcome.outcome] += 1;
    this.outcomes.push(outcome);
  }

  /**
   * Outcomes in the order they were recorded
   */
  getOutcomes(): ContainerOutcome[] {
    return [...this.outcomes];
  }

  /**
   * Build the frozen summary
   */
  build(): RunSummary {
    return Object.freeze({
      started: this.counts.started,
      alreadyRunning: this.counts.already_running,
      skipped: this.counts.skipped,
      failed: this.counts.failed,
    });
  }
}

/**
 * Total number of containers a summary accounts for
 */
export function getSummaryTotal(summary: RunSummary): number {
  return summary.started + summary.alreadyRunning + summary.skipped + summary.failed;
}

/**
 * True when nothing was started and nothing was already running
 */
export function isNothingEligible(summary: RunSummary): boolean {
  return summary.started === 0 && summary.alreadyRunning === 0;
}

/**
 * One-line summary for the console and the log
 */
export function formatRunSummary(summary: RunSummary): string {
  return (
    `Summary: ${summary.started} started, ${summary.alreadyRunning} already running, ` +
    `${summary.skipped} skipped, ${summary.failed} failed`
  );
}
