/**
 * `dockstart run`
 *
 * Gate on Docker and jq, take one snapshot of the containers, then hand it
 * to the restart engine. Nothing is enumerated when the gate fails.
 */

import { RunConfig } from '../types/run-config';
import { ProcessRunner } from '../types/process-runner';
import { Clock } from '../types/clock';
import { Notifier } from '../types/notifier';
import { Logger } from '../types/logger';
import { ExitCode, FatalReason, describeFatalReason } from '../types/exit-codes';
import { ContainerRuntime } from '../docker/container-runtime';
import { AvailabilityGate, GateResult } from '../gate/availability-gate';
import { createReadinessGroups } from '../gate/readiness-checks';
import { RestartEngine, RestartReport } from '../restart/restart-engine';

export interface RunDependencies {
  runner: ProcessRunner;
  runtime: ContainerRuntime;
  clock: Clock;
  notifier: Notifier;
  logger: Logger;
}

export interface RunResult {
  exitCode: ExitCode;
  /** Present when containers were processed */
  report?: RestartReport;
  /** Present when the gate stopped the run */
  gateFailure?: GateResult;
}

function fatalReasonFor(failure: GateResult): FatalReason {
  return failure.status === 'timed_out' ? 'gate_timeout' : 'tool_unavailable';
}

export async function runDockstart(config: RunConfig, deps: RunDependencies): Promise<RunResult> {
  const { runner, runtime, clock, notifier, logger } = deps;

  logger.event('run_started', 'dockstart run started', {
    retry: config.retry.enabled,
    force: config.force,
  });

  notifier.heading('Checking availability');
  const gate = new AvailabilityGate(
    {
      retryEnabled: config.retry.enabled,
      retryIntervalMs: config.retry.intervalMs,
      maxWaitMs: config.retry.maxWaitMs,
    },
    { clock, notifier, logger }
  );

  const outcome = await gate.awaitAll(createReadinessGroups(runner, config.commands));
  if (!outcome.ready) {
    const reason = fatalReasonFor(outcome.failure);
    logger.event('run_failed', describeFatalReason(reason), { reason, group: outcome.failure.group });
    return { exitCode: ExitCode.FAILURE, gateFailure: outcome.failure };
  }

  notifier.heading('Starting containers');
  const listed = await runtime.listContainers();
  if (!listed.ok) {
    notifier.error(`Could not list containers: ${listed.error.message}`);
    logger.event('run_failed', describeFatalReason('enumeration_failed'), {
      reason: 'enumeration_failed',
      code: listed.error.code,
      error: listed.error.message,
    });
    return { exitCode: ExitCode.FAILURE };
  }

  logger.event('containers_listed', `Found ${listed.value.length} containers`, { count: listed.value.length });

  const engine = new RestartEngine(
    { force: config.force, pauseMs: config.containerPauseMs },
    { starter: runtime, notifier, logger, clock }
  );
  const report = await engine.process(listed.value);

  logger.event('run_completed', 'dockstart run completed', { ...report.summary });
  return { exitCode: ExitCode.SUCCESS, report };
}
