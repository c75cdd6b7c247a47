/**
 * Tests for the Restart Decision Engine
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { RestartEngine, NO_ELIGIBLE_CONTAINERS_MESSAGE } from './restart-engine';
import { ContainerRecord, classifyRestartPolicy } from '../types/container';
import { ContainerStarter, RuntimeError, createRuntimeError } from '../docker/container-runtime';
import { MockClock } from '../types/clock';
import { Result, ok, err } from '../types/result';
import { BufferLogger } from '../logging/buffer-logger';
import { BufferNotifier } from '../ui/buffer-notifier';
import { getSummaryTotal } from '../logging/run-summary';

function record(
  name: string,
  policyName: string,
  isRunning: boolean,
  lastExitCode: number | null
): ContainerRecord {
  return { name, restartPolicy: classifyRestartPolicy(policyName), policyName, isRunning, lastExitCode };
}

describe('RestartEngine', () => {
  let clock: MockClock;
  let notifier: BufferNotifier;
  let logger: BufferLogger;
  let startContainer: Mock<(name: string) => Promise<Result<void, RuntimeError>>>;
  let starter: ContainerStarter;

  beforeEach(() => {
    clock = new MockClock({ autoAdvance: true });
    notifier = new BufferNotifier();
    logger = new BufferLogger({ clock });
    startContainer = vi.fn<(name: string) => Promise<Result<void, RuntimeError>>>().mockResolvedValue(ok(undefined));
    starter = { startContainer };
  });

  function createEngine(force = false, pauseMs = 100): RestartEngine {
    return new RestartEngine({ force, pauseMs }, { starter, notifier, logger, clock });
  }

  describe('scenarios', () => {
    it('should start a stopped always container', async () => {
      const report = await createEngine().process([record('web', 'always', false, 0)]);

      expect(startContainer).toHaveBeenCalledWith('web');
      expect(report.summary).toEqual({ started: 1, alreadyRunning: 0, skipped: 0, failed: 0 });
      expect(report.outcomes).toEqual([{ name: 'web', outcome: 'started', reason: 'always_policy' }]);
    });

    it('should skip an unless-stopped container that exited cleanly', async () => {
      const report = await createEngine().process([record('db', 'unless-stopped', false, 0)]);

      expect(startContainer).not.toHaveBeenCalled();
      expect(report.summary).toEqual({ started: 0, alreadyRunning: 0, skipped: 1, failed: 0 });
      expect(report.outcomes[0].reason).toBe('deliberate_stop');
    });

    it('should start an unless-stopped container that was killed', async () => {
      const report = await createEngine().process([record('db', 'unless-stopped', false, 137)]);

      expect(startContainer).toHaveBeenCalledWith('db');
      expect(report.outcomes).toEqual([{ name: 'db', outcome: 'started', reason: 'crashed' }]);
    });

    it('should start an unless-stopped container when forced', async () => {
      const report = await createEngine(true).process([record('db', 'unless-stopped', false, 0)]);

      expect(startContainer).toHaveBeenCalledWith('db');
      expect(report.outcomes).toEqual([{ name: 'db', outcome: 'started', reason: 'forced' }]);
    });

    it('should skip a container without a managed restart policy', async () => {
      const report = await createEngine(true).process([record('cache', 'no', false, 1)]);

      expect(startContainer).not.toHaveBeenCalled();
      expect(report.outcomes).toEqual([{ name: 'cache', outcome: 'skipped', reason: 'unmanaged_policy' }]);
      expect(notifier.getMessages('info')[0]).toBe('Skipped cache (restart policy no is not managed)');
    });

    it('should report an empty run with the advisory notice', async () => {
      const report = await createEngine().process([]);

      expect(report.summary).toEqual({ started: 0, alreadyRunning: 0, skipped: 0, failed: 0 });
      expect(notifier.getMessages('info')).toEqual([
        'Summary: 0 started, 0 already running, 0 skipped, 0 failed',
        NO_ELIGIBLE_CONTAINERS_MESSAGE,
      ]);
      expect(logger.hasEventType('no_eligible_containers')).toBe(true);
    });
  });

  it('should count a running container as already running', async () => {
    const report = await createEngine().process([record('web', 'always', true, 0)]);

    expect(startContainer).not.toHaveBeenCalled();
    expect(report.summary.alreadyRunning).toBe(1);
    expect(notifier.getMessages('info')).not.toContain(NO_ELIGIBLE_CONTAINERS_MESSAGE);
  });

  it('should record a failed start and keep going', async () => {
    startContainer
      .mockResolvedValueOnce(err(createRuntimeError('COMMAND_FAILED', 'Error: failed to start containers: web')))
      .mockRejectedValueOnce(new Error('spawn docker EACCES'));

    const report = await createEngine().process([
      record('web', 'always', false, 0),
      record('api', 'always', false, 0),
      record('worker', 'always', false, 0),
    ]);

    expect(report.outcomes.map((o) => o.outcome)).toEqual(['failed', 'failed', 'started']);
    expect(report.outcomes[0].error).toBe('Error: failed to start containers: web');
    expect(report.outcomes[1].error).toBe('spawn docker EACCES');
    expect(notifier.getMessages('error')).toEqual([
      'Failed to start web: Error: failed to start containers: web',
      'Failed to start api: spawn docker EACCES',
    ]);
    const failures = logger.getEventsByType('container_start_failed');
    expect(failures.map((e) => e.metadata.container)).toEqual(['web', 'api']);
    expect(failures[0].level).toBe('error');
  });

  it('should account for every container in exactly one bucket', async () => {
    startContainer.mockResolvedValueOnce(err(createRuntimeError('COMMAND_FAILED', 'boom')));
    const containers = [
      record('a', 'always', false, 0),
      record('b', 'always', true, 0),
      record('c', 'unless-stopped', false, 0),
      record('d', 'unless-stopped', false, 2),
      record('e', 'on-failure', false, 1),
      record('f', 'unless-stopped', true, null),
    ];

    const report = await createEngine().process(containers);

    expect(report.summary).toEqual({ started: 1, alreadyRunning: 2, skipped: 2, failed: 1 });
    expect(getSummaryTotal(report.summary)).toBe(containers.length);
    expect(report.outcomes.map((o) => o.name)).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
  });

  it('should pause after each container', async () => {
    await createEngine(false, 100).process([
      record('a', 'always', false, 0),
      record('b', 'no', false, 0),
    ]);

    expect(clock.getDelays()).toEqual([100, 100]);
  });

  it('should not pause when the pause is disabled', async () => {
    await createEngine(false, 0).process([record('a', 'always', false, 0)]);

    expect(clock.getDelays()).toEqual([]);
  });

  it('should mirror each outcome in the log', async () => {
    await createEngine().process([
      record('web', 'always', false, 0),
      record('db', 'unless-stopped', true, null),
      record('cache', 'no', false, 0),
    ]);

    expect(logger.getEventsByType('container_started')[0].message).toBe('Started web');
    expect(logger.getEventsByType('container_already_running')[0].message).toBe('db is already running');
    expect(logger.getEventsByType('container_skipped')[0].metadata).toMatchObject({
      container: 'cache',
      reason: 'unmanaged_policy',
      policy: 'no',
    });
  });
});
