/**
 * Restart Decision Engine
 *
 * Walks the container snapshot in enumeration order, decides per container
 * and issues starts one at a time. A failed start is recorded and the walk
 * continues.
 */

import { Clock } from '../types/clock';
import { ContainerOutcome, ContainerRecord, RunSummary } from '../types/container';
import { Logger } from '../types/logger';
import { Notifier } from '../types/notifier';
import { ContainerStarter } from '../docker/container-runtime';
import { RunSummaryBuilder, formatRunSummary, isNothingEligible } from '../logging/run-summary';
import { RestartDecision, decideRestart, describeReason } from './restart-policy';

/**
 * Engine settings
 */
export interface RestartEngineOptions {
  force: boolean;
  /** Pause after each container; 0 disables */
  pauseMs: number;
}

/**
 * Collaborators of the engine
 */
export interface RestartEngineDependencies {
  starter: ContainerStarter;
  notifier: Notifier;
  logger: Logger;
  clock: Clock;
}

/**
 * Result of processing every container
 */
export interface RestartReport {
  summary: RunSummary;
  outcomes: ContainerOutcome[];
}

export const NO_ELIGIBLE_CONTAINERS_MESSAGE = 'No eligible containers were found or started';

export class RestartEngine {
  private readonly options: RestartEngineOptions;
  private readonly deps: RestartEngineDependencies;

  constructor(options: RestartEngineOptions, deps: RestartEngineDependencies) {
    this.options = options;
    this.deps = deps;
  }

  async process(containers: readonly ContainerRecord[]): Promise<RestartReport> {
    const builder = new RunSummaryBuilder();

    for (const container of containers) {
      builder.record(await this.processContainer(container));
      if (this.options.pauseMs > 0) {
        await this.deps.clock.delay(this.options.pauseMs);
      }
    }

    const summary = builder.build();
    const line = formatRunSummary(summary);
    this.deps.notifier.heading('Summary');
    this.deps.notifier.info(line);
    this.deps.logger.info(line, { ...summary, total: containers.length });

    if (isNothingEligible(summary)) {
      this.deps.notifier.info(NO_ELIGIBLE_CONTAINERS_MESSAGE);
      this.deps.logger.event('no_eligible_containers', NO_ELIGIBLE_CONTAINERS_MESSAGE);
    }

    return { summary, outcomes: builder.getOutcomes() };
  }

  private async processContainer(container: ContainerRecord): Promise<ContainerOutcome> {
    const { notifier } = this.deps;
    const logger = this.deps.logger.child({ container: container.name });
    const decision: RestartDecision = decideRestart(container, this.options.force);
    const metadata = {
      reason: decision.reason,
      policy: container.policyName,
      exitCode: container.lastExitCode,
    };

    switch (decision.action) {
      case 'skip': {
        const message = `Skipped ${container.name} (${describeReason(decision.reason, container)})`;
        notifier.info(message);
        logger.event('container_skipped', message, metadata);
        return { name: container.name, outcome: 'skipped', reason: decision.reason };
      }

      case 'none': {
        const message = `${container.name} is already running`;
        notifier.info(message);
        logger.event('container_already_running', message, metadata);
        return { name: container.name, outcome: 'already_running', reason: decision.reason };
      }

      case 'start': {
        notifier.progress(`Starting ${container.name} (${describeReason(decision.reason, container)})...`);
        const error = await this.start(container.name);
        if (error === null) {
          const message = `Started ${container.name}`;
          notifier.success(message);
          logger.event('container_started', message, metadata);
          return { name: container.name, outcome: 'started', reason: decision.reason };
        }

        const message = `Failed to start ${container.name}: ${error}`;
        notifier.error(message);
        logger.event('container_start_failed', message, { ...metadata, error });
        return { name: container.name, outcome: 'failed', reason: decision.reason, error };
      }
    }
  }

  /**
   * Issue the start; returns the error message, or null on success
   */
  private async start(name: string): Promise<string | null> {
    try {
      const result = await this.deps.starter.startContainer(name);
      return result.ok ? null : result.error.message;
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
  }
}
