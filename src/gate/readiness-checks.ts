/**
 * Readiness checks for a dockstart run
 */

import { ProcessRunner, isSpawnSuccess } from '../types/process-runner';
import { RuntimeCommands } from '../types/run-config';
import { ReadinessGroup } from './availability-gate';

/** Upper bound for `docker info` while the daemon is still coming up */
export const DAEMON_PROBE_TIMEOUT_MS = 10_000;

/**
 * Probe that passes when `<command> --version` exits 0
 */
export function commandProbe(runner: ProcessRunner, command: string): () => Promise<boolean> {
  return async () => {
    const result = await runner.spawn(command, { args: ['--version'] });
    return isSpawnSuccess(result);
  };
}

/**
 * Probe that passes when the Docker daemon answers `docker info`
 */
export function daemonProbe(runner: ProcessRunner, docker: string): () => Promise<boolean> {
  return async () => {
    const result = await runner.spawn(docker, {
      args: ['info'],
      timeoutMs: DAEMON_PROBE_TIMEOUT_MS,
    });
    return isSpawnSuccess(result);
  };
}

/**
 * The runtime group (command, then daemon) followed by the JSON-helper group
 */
export function createReadinessGroups(
  runner: ProcessRunner,
  commands: RuntimeCommands
): ReadinessGroup[] {
  return [
    {
      id: 'runtime',
      label: 'Docker',
      checks: [
        { id: 'docker-command', label: 'Docker command', probe: commandProbe(runner, commands.docker) },
        { id: 'docker-daemon', label: 'Docker daemon', probe: daemonProbe(runner, commands.docker) },
      ],
    },
    {
      id: 'json-helper',
      label: 'jq',
      checks: [{ id: 'jq-command', label: 'jq command', probe: commandProbe(runner, commands.jq) }],
    },
  ];
}
