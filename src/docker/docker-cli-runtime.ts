/**
 * Docker CLI runtime
 * Lists containers with `docker ps` + `docker inspect`, projects the fields
 * the restart engine needs with jq, and starts containers with `docker start`
 */

import { ContainerRecord, classifyRestartPolicy } from '../types/container';
import { Logger } from '../types/logger';
import { ProcessRunner, SpawnResult, describeSpawnFailure, isSpawnSuccess } from '../types/process-runner';
import { Result, ok, err } from '../types/result';
import { RuntimeCommands } from '../types/run-config';
import { ContainerLine, parseContainerLine } from '../schemas/validators';
import { ContainerRuntime, RuntimeError, createRuntimeError } from './container-runtime';

/**
 * One compact JSON object per container
 */
export const CONTAINER_PROJECTION =
  '.[] | {name: (.Name | ltrimstr("/")), restartPolicy: .HostConfig.RestartPolicy.Name, ' +
  'running: .State.Running, exitCode: .State.ExitCode}';

const NO_SUCH_OBJECT = /No such (?:object|container): (\S+)/g;

/**
 * Ids `docker inspect` reported as gone
 */
export function findVanishedIds(stderr: string): string[] {
  return Array.from(stderr.matchAll(NO_SUCH_OBJECT), (match) => match[1]);
}

/**
 * Map a validated projection line onto a ContainerRecord
 */
export function toContainerRecord(line: ContainerLine): ContainerRecord {
  const policyName = line.restartPolicy ?? '';
  return {
    name: line.name,
    restartPolicy: classifyRestartPolicy(policyName),
    policyName,
    isRunning: line.running,
    lastExitCode: line.exitCode,
  };
}

/**
 * Parse `jq -c` output into container records
 */
export function parseContainerRecords(output: string): Result<ContainerRecord[], RuntimeError> {
  const records: ContainerRecord[] = [];
  const lines = output.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) {
      continue;
    }
    const parsed = parseContainerLine(line);
    if (!parsed.success || !parsed.data) {
      return err(
        createRuntimeError(
          'INVALID_OUTPUT',
          `Unexpected container data on line ${i + 1}: ${(parsed.errors ?? []).join('; ')}`
        )
      );
    }
    records.push(toContainerRecord(parsed.data));
  }

  return ok(records);
}

export class DockerCliRuntime implements ContainerRuntime {
  private readonly runner: ProcessRunner;
  private readonly commands: RuntimeCommands;
  private readonly logger?: Logger;

  constructor(runner: ProcessRunner, commands: RuntimeCommands, logger?: Logger) {
    this.runner = runner;
    this.commands = commands;
    this.logger = logger;
  }

  async listContainers(): Promise<Result<ContainerRecord[], RuntimeError>> {
    const ids = await this.run(this.commands.docker, ['ps', '-aq', '--no-trunc']);
    if (!ids.ok) {
      return ids;
    }

    const idList = ids.value
      .split('\n')
      .map((id) => id.trim())
      .filter((id) => id.length > 0);
    if (idList.length === 0) {
      return ok([]);
    }

    const inspected = await this.inspect(idList);
    if (!inspected.ok) {
      return inspected;
    }

    const projected = await this.run(this.commands.jq, ['-c', CONTAINER_PROJECTION], inspected.value);
    if (!projected.ok) {
      return projected;
    }

    const records = parseContainerRecords(projected.value);
    if (records.ok) {
      this.logger?.debug(`Inspected ${records.value.length} container(s)`, { ids: idList.length });
    }
    return records;
  }

  async startContainer(name: string): Promise<Result<void, RuntimeError>> {
    const result = await this.run(this.commands.docker, ['start', name]);
    if (!result.ok) {
      return result;
    }
    return ok(undefined);
  }

  /**
   * `docker inspect` the listed ids. Containers removed since `docker ps`
   * (AutoRemove containers are cleaned up while the daemon starts) make it
   * exit 1, but it still prints the array of the ones that remain.
   */
  private async inspect(ids: string[]): Promise<Result<string, RuntimeError>> {
    const spawned = await this.spawn(this.commands.docker, ['inspect', ...ids]);
    if (!spawned.ok) {
      return spawned;
    }

    const result = spawned.value;
    if (isSpawnSuccess(result)) {
      return ok(result.stdout);
    }

    const vanished = findVanishedIds(result.stderr);
    const partial = !result.timedOut && !result.interrupted && result.stdout.trim().startsWith('[');
    if (!partial || vanished.length === 0) {
      return err(
        createRuntimeError('COMMAND_FAILED', describeSpawnFailure(`${this.commands.docker} inspect`, result))
      );
    }

    this.logger?.warn(`Skipping ${vanished.length} container(s) removed during enumeration`, {
      ids: vanished.join(' '),
    });
    return ok(result.stdout);
  }

  /**
   * Run a command to completion and return its stdout
   */
  private async run(
    command: string,
    args: string[],
    input?: string
  ): Promise<Result<string, RuntimeError>> {
    const spawned = await this.spawn(command, args, input);
    if (!spawned.ok) {
      return spawned;
    }
    if (!isSpawnSuccess(spawned.value)) {
      return err(
        createRuntimeError('COMMAND_FAILED', describeSpawnFailure(`${command} ${args[0]}`, spawned.value))
      );
    }
    return ok(spawned.value.stdout);
  }

  private async spawn(
    command: string,
    args: string[],
    input?: string
  ): Promise<Result<SpawnResult, RuntimeError>> {
    try {
      return ok(await this.runner.spawn(command, { args, input }));
    } catch (error) {
      return err(
        createRuntimeError(
          'SPAWN_FAILED',
          `Could not run ${command}: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined
        )
      );
    }
  }
}

export function createDockerCliRuntime(
  runner: ProcessRunner,
  commands: RuntimeCommands,
  logger?: Logger
): ContainerRuntime {
  return new DockerCliRuntime(runner, commands, logger);
}
