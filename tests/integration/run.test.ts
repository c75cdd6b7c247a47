/**
 * End-to-end runs against scripted docker/jq processes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { runDockstart } from '../../src/commands/run';
import { resolveRunConfig, CliFlags } from '../../src/config';
import { createDockerCliRuntime, CONTAINER_PROJECTION } from '../../src/docker';
import { NO_ELIGIBLE_CONTAINERS_MESSAGE } from '../../src/restart';
import { MockProcessRunner } from '../../src/process/mock-process-runner';
import { MockClock } from '../../src/types/clock';
import { BufferNotifier } from '../../src/ui/buffer-notifier';
import { BufferLogger } from '../../src/logging/buffer-logger';

const JQ_COMMAND = `jq -c ${CONTAINER_PROJECTION}`;

function containerLine(name: string, restartPolicy: string, running: boolean, exitCode: number): string {
  return JSON.stringify({ name, restartPolicy, running, exitCode });
}

describe('dockstart run', () => {
  let runner: MockProcessRunner;
  let clock: MockClock;
  let notifier: BufferNotifier;
  let logger: BufferLogger;

  function scriptContainers(lines: string[]): void {
    const ids = lines.map((_, i) => `id${i + 1}`);
    runner.setCommandConfig('docker ps -aq --no-trunc', { stdout: ids.join('\n') + '\n' });
    runner.setCommandConfig(`docker inspect ${ids.join(' ')}`, { stdout: '[]' });
    runner.setCommandConfig(JQ_COMMAND, { stdout: lines.join('\n') + '\n' });
  }

  async function run(flags: CliFlags = {}) {
    const config = resolveRunConfig(flags, null, { tmpDir: '/tmp/test' });
    return runDockstart(config, {
      runner,
      runtime: createDockerCliRuntime(runner, config.commands, logger),
      clock,
      notifier,
      logger,
    });
  }

  beforeEach(() => {
    runner = new MockProcessRunner();
    clock = new MockClock({ autoAdvance: true });
    notifier = new BufferNotifier();
    logger = new BufferLogger();
  });

  it('should start eligible containers and summarise every outcome', async () => {
    scriptContainers([
      containerLine('web', 'always', false, 0),
      containerLine('db', 'unless-stopped', false, 0),
      containerLine('worker', 'unless-stopped', false, 137),
      containerLine('cache', 'no', false, 0),
      containerLine('api', 'always', true, 0),
    ]);
    runner.setCommandConfig('docker start worker', {
      exitCode: 1,
      stderr: 'Error response from daemon: no such container\n',
    });

    const result = await run();

    expect(result.exitCode).toBe(0);
    expect(result.report?.summary).toEqual({ started: 1, alreadyRunning: 1, skipped: 2, failed: 1 });
    expect(runner.getCommandLines()).toEqual([
      'docker --version',
      'docker info',
      'jq --version',
      'docker ps -aq --no-trunc',
      'docker inspect id1 id2 id3 id4 id5',
      JQ_COMMAND,
      'docker start web',
      'docker start worker',
    ]);
    expect(notifier.getMessages('error')).toEqual([
      'Failed to start worker: Error response from daemon: no such container',
    ]);
    expect(notifier.getMessages('info')).toContain('Summary: 1 started, 1 already running, 2 skipped, 1 failed');
    expect(clock.getDelays()).toEqual([100, 100, 100, 100, 100]);
    expect(logger.getLastEvent()?.eventType).toBe('run_completed');
  });

  it('should start cleanly stopped unless-stopped containers with force', async () => {
    scriptContainers([
      containerLine('web', 'always', false, 0),
      containerLine('db', 'unless-stopped', false, 0),
    ]);

    const result = await run({ force: true });

    expect(result.report?.outcomes.map((o) => [o.name, o.outcome, o.reason])).toEqual([
      ['web', 'started', 'always_policy'],
      ['db', 'started', 'forced'],
    ]);
  });

  it('should exit 0 with an advisory when there are no containers', async () => {
    runner.setCommandConfig('docker ps -aq --no-trunc', { stdout: '' });

    const result = await run();

    expect(result.exitCode).toBe(0);
    expect(result.report?.summary).toEqual({ started: 0, alreadyRunning: 0, skipped: 0, failed: 0 });
    expect(notifier.getMessages('info')).toContain(NO_ELIGIBLE_CONTAINERS_MESSAGE);
    expect(logger.hasEventType('no_eligible_containers')).toBe(true);
    expect(runner.getCommandLines()).toEqual([
      'docker --version',
      'docker info',
      'jq --version',
      'docker ps -aq --no-trunc',
    ]);
  });

  it('should fail without listing containers when docker is missing and retry is off', async () => {
    runner.setMissing('docker');

    const result = await run();

    expect(result.exitCode).toBe(1);
    expect(result.gateFailure).toMatchObject({
      status: 'unavailable',
      group: 'runtime',
      missing: ['Docker command', 'Docker daemon'],
    });
    expect(runner.getCommandLines()).toEqual(['docker --version']);
    expect(notifier.getMessages('error')).toEqual(['Docker command is not available']);
    expect(logger.getEventsByType('run_failed')[0].metadata.reason).toBe('tool_unavailable');
  });

  it('should fail without listing containers when jq is missing', async () => {
    runner.setMissing('jq');

    const result = await run();

    expect(result.exitCode).toBe(1);
    expect(runner.getCommandLines()).toEqual(['docker --version', 'docker info', 'jq --version']);
    expect(notifier.getMessages('error')).toEqual(['jq command is not available']);
  });

  it('should wait for the daemon when retry is on', async () => {
    runner.setCommandConfig('docker info', [{ exitCode: 1 }, { exitCode: 1 }, { exitCode: 0 }]);
    runner.setCommandConfig('docker ps -aq --no-trunc', { stdout: '' });

    const result = await run({ retry: true });

    expect(result.exitCode).toBe(0);
    expect(notifier.getMessages('progress')).toEqual([
      'Waiting for Docker daemon... (retry 1, 5s/120s)',
      'Waiting for Docker daemon... (retry 2, 10s/120s)',
    ]);
    expect(notifier.getMessages('success')).toContain('Docker is ready');
    expect(clock.getDelays()).toEqual([5000, 5000]);
  });

  it('should time out once the maximum wait has elapsed', async () => {
    runner.setCommandConfig('docker info', { exitCode: 1, stderr: 'Cannot connect to the Docker daemon' });

    const result = await run({ retry: true, retryIntervalSeconds: 5, maxWaitSeconds: 10 });

    expect(result.exitCode).toBe(1);
    expect(result.gateFailure).toMatchObject({ status: 'timed_out', retryCount: 2, elapsedMs: 10000 });
    expect(notifier.getMessages('error')).toEqual(['Timed out after 10s waiting for Docker daemon']);
    expect(logger.getEventsByType('run_failed')[0].metadata.reason).toBe('gate_timeout');
    expect(runner.getCommandLines()).not.toContain('docker ps -aq --no-trunc');
  });

  it('should start the remaining containers when one is removed during enumeration', async () => {
    runner.setCommandConfig('docker ps -aq --no-trunc', { stdout: 'id1\nid2\n' });
    runner.setCommandConfig('docker inspect id1 id2', {
      exitCode: 1,
      stdout: '[{"Name":"/web"}]\n',
      stderr: 'Error: No such object: id2\n',
    });
    runner.setCommandConfig(JQ_COMMAND, { stdout: containerLine('web', 'always', false, 0) + '\n' });

    const result = await run();

    expect(result.exitCode).toBe(0);
    expect(result.report?.summary).toEqual({ started: 1, alreadyRunning: 0, skipped: 0, failed: 0 });
    expect(runner.getCommandLines().slice(-2)).toEqual([JQ_COMMAND, 'docker start web']);
  });

  it('should fail when the containers cannot be listed', async () => {
    runner.setCommandConfig('docker ps -aq --no-trunc', { exitCode: 1, stderr: 'permission denied\n' });

    const result = await run();

    expect(result.exitCode).toBe(1);
    expect(notifier.getMessages('error')).toEqual(['Could not list containers: permission denied']);
    expect(logger.getEventsByType('run_failed')[0].metadata.reason).toBe('enumeration_failed');
  });
});
