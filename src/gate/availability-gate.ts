/**
 * Availability Gate
 *
 * Waits for the external tools a run depends on. Each readiness group is an
 * ordered list of checks; a check is only probed once every earlier check of
 * its group has passed, and a passed check is never probed again during the
 * same wait. With retry disabled there is exactly one pass.
 */

import { Clock } from '../types/clock';
import { Logger } from '../types/logger';
import { Notifier } from '../types/notifier';

/**
 * A named, side-effect-free readiness test
 */
export interface ReadinessCheck {
  id: string;
  /** Display name, e.g. "Docker daemon" */
  label: string;
  probe: () => Promise<boolean>;
}

/**
 * Checks awaited together under one deadline and one retry counter
 */
export interface ReadinessGroup {
  id: string;
  label: string;
  checks: ReadinessCheck[];
}

/**
 * Gate settings
 */
export interface GateOptions {
  retryEnabled: boolean;
  retryIntervalMs: number;
  maxWaitMs: number;
}

/**
 * Collaborators of the gate
 */
export interface GateDependencies {
  clock: Clock;
  notifier: Notifier;
  logger: Logger;
}

interface GateResultBase {
  group: string;
  retryCount: number;
  elapsedMs: number;
}

/**
 * Result of waiting for one group
 */
export type GateResult =
  | ({ status: 'ready' } & GateResultBase)
  | ({ status: 'unavailable'; missing: string[] } & GateResultBase)
  | ({ status: 'timed_out'; pending: string[] } & GateResultBase);

/**
 * Result of waiting for every group in order
 */
export type GateOutcome =
  | { ready: true; results: GateResult[] }
  | { ready: false; results: GateResult[]; failure: GateResult };

/**
 * Render milliseconds as whole seconds
 */
export function formatSeconds(ms: number): string {
  return `${Math.floor(ms / 1000)}s`;
}

export class AvailabilityGate {
  private readonly options: GateOptions;
  private readonly deps: GateDependencies;

  constructor(options: GateOptions, deps: GateDependencies) {
    this.options = options;
    this.deps = deps;
  }

  /**
   * Wait for each group in turn; stops at the first group that is not ready
   */
  async awaitAll(groups: ReadinessGroup[]): Promise<GateOutcome> {
    const results: GateResult[] = [];
    for (const group of groups) {
      const result = await this.awaitGroup(group);
      results.push(result);
      if (result.status !== 'ready') {
        return { ready: false, results, failure: result };
      }
    }
    return { ready: true, results };
  }

  /**
   * Wait for every check of one group
   */
  async awaitGroup(group: ReadinessGroup): Promise<GateResult> {
    const { clock, notifier } = this.deps;
    const logger = this.deps.logger.child({ group: group.id });
    const satisfied = new Set<string>();
    const start = clock.timestamp();
    let retryCount = 0;
    let elapsedMs = 0;

    let failing = await this.runPass(group, satisfied, logger);

    if (failing && !this.options.retryEnabled) {
      const missing = this.unsatisfiedLabels(group, satisfied);
      const message = `${failing.label} is not available`;
      notifier.error(message);
      logger.event('gate_unavailable', message, { missing });
      return { status: 'unavailable', group: group.id, missing, retryCount, elapsedMs };
    }

    while (failing) {
      await clock.delay(this.options.retryIntervalMs);
      retryCount++;
      elapsedMs = clock.timestamp() - start;

      const progress =
        `Waiting for ${failing.label}... ` +
        `(retry ${retryCount}, ${formatSeconds(elapsedMs)}/${formatSeconds(this.options.maxWaitMs)})`;
      notifier.progress(progress);
      logger.event('gate_retry', progress, { retryCount, elapsedMs, check: failing.id });

      failing = await this.runPass(group, satisfied, logger);

      if (failing && elapsedMs >= this.options.maxWaitMs) {
        const pending = this.unsatisfiedLabels(group, satisfied);
        const message = `Timed out after ${formatSeconds(elapsedMs)} waiting for ${failing.label}`;
        notifier.error(message);
        logger.event('gate_timeout', message, { retryCount, elapsedMs, pending });
        return { status: 'timed_out', group: group.id, pending, retryCount, elapsedMs };
      }
    }

    const message = `${group.label} is ready`;
    notifier.success(message);
    logger.event('gate_group_ready', message, { retryCount, elapsedMs });
    return { status: 'ready', group: group.id, retryCount, elapsedMs };
  }

  /**
   * Probe pending checks in order; returns the first one that fails, or null
   */
  private async runPass(
    group: ReadinessGroup,
    satisfied: Set<string>,
    logger: Logger
  ): Promise<ReadinessCheck | null> {
    for (const check of group.checks) {
      if (satisfied.has(check.id)) {
        continue;
      }
      if (!(await this.probe(check, logger))) {
        return check;
      }
      satisfied.add(check.id);
      const message = `${check.label} is available`;
      this.deps.notifier.success(message);
      logger.event('gate_check_passed', message, { check: check.id });
    }
    return null;
  }

  private async probe(check: ReadinessCheck, logger: Logger): Promise<boolean> {
    try {
      return await check.probe();
    } catch (error) {
      logger.debug(`Probe ${check.id} failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  private unsatisfiedLabels(group: ReadinessGroup, satisfied: Set<string>): string[] {
    return group.checks.filter((check) => !satisfied.has(check.id)).map((check) => check.label);
  }
}
