/**
 * Tests for the Docker CLI runtime
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DockerCliRuntime, CONTAINER_PROJECTION, parseContainerRecords, findVanishedIds } from './docker-cli-runtime';
import { MockProcessRunner } from '../process/mock-process-runner';
import { BufferLogger } from '../logging/buffer-logger';

const INSPECT_OUTPUT = '[{"Name":"/web"},{"Name":"/db"}]';
const JQ_OUTPUT =
  '{"name":"web","restartPolicy":"always","running":false,"exitCode":0}\n' +
  '{"name":"db","restartPolicy":"unless-stopped","running":true,"exitCode":null}\n';

describe('DockerCliRuntime', () => {
  let runner: MockProcessRunner;
  let runtime: DockerCliRuntime;
  let logger: BufferLogger;

  beforeEach(() => {
    runner = new MockProcessRunner();
    logger = new BufferLogger();
    runtime = new DockerCliRuntime(runner, { docker: 'docker', jq: 'jq' }, logger);
  });

  describe('listContainers', () => {
    it('should inspect every id and project the records through jq', async () => {
      runner.setCommandConfig('docker ps -aq --no-trunc', { stdout: 'aaa111\nbbb222\n' });
      runner.setCommandConfig('docker inspect aaa111 bbb222', { stdout: INSPECT_OUTPUT });
      runner.setPatternConfig(/^jq -c /, { stdout: JQ_OUTPUT });

      const result = await runtime.listContainers();

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toEqual([
          { name: 'web', restartPolicy: 'always', policyName: 'always', isRunning: false, lastExitCode: 0 },
          {
            name: 'db',
            restartPolicy: 'unless-stopped',
            policyName: 'unless-stopped',
            isRunning: true,
            lastExitCode: null,
          },
        ]);
      }

      const jqCall = runner.getCallHistory()[2];
      expect(jqCall.command).toBe('jq');
      expect(jqCall.options.args).toEqual(['-c', CONTAINER_PROJECTION]);
      expect(jqCall.options.input).toBe(INSPECT_OUTPUT);
    });

    it('should return an empty list without inspecting when there are no containers', async () => {
      runner.setCommandConfig('docker ps -aq --no-trunc', { stdout: '\n' });

      const result = await runtime.listContainers();

      expect(result).toEqual({ ok: true, value: [] });
      expect(runner.getCommandLines()).toEqual(['docker ps -aq --no-trunc']);
    });

    it('should keep the containers that remain when one is removed before inspect', async () => {
      runner.setCommandConfig('docker ps -aq --no-trunc', { stdout: 'id1\nid2\n' });
      runner.setCommandConfig('docker inspect id1 id2', {
        exitCode: 1,
        stdout: '[{"Name":"/web"}]\n',
        stderr: 'Error: No such object: id2\n',
      });
      runner.setPatternConfig(/^jq -c /, {
        stdout: '{"name":"web","restartPolicy":"always","running":false,"exitCode":0}\n',
      });

      const result = await runtime.listContainers();

      expect(result).toEqual({
        ok: true,
        value: [{ name: 'web', restartPolicy: 'always', policyName: 'always', isRunning: false, lastExitCode: 0 }],
      });
      expect(runner.getCallHistory()[2].options.input).toBe('[{"Name":"/web"}]\n');
      expect(logger.getEventsByLevel('warn')).toEqual([
        {
          timestamp: expect.any(String),
          level: 'warn',
          eventType: 'warn',
          message: 'Skipping 1 container(s) removed during enumeration',
          metadata: { ids: 'id2' },
        },
      ]);
    });

    it('should fail when docker inspect fails for another reason', async () => {
      runner.setCommandConfig('docker ps -aq --no-trunc', { stdout: 'id1\n' });
      runner.setCommandConfig('docker inspect id1', {
        exitCode: 1,
        stdout: '[]\n',
        stderr: 'permission denied while trying to connect to the Docker daemon socket\n',
      });

      const result = await runtime.listContainers();

      expect(result).toEqual({
        ok: false,
        error: {
          code: 'COMMAND_FAILED',
          message: 'permission denied while trying to connect to the Docker daemon socket',
          cause: undefined,
        },
      });
      expect(runner.getCommandLines()).toEqual(['docker ps -aq --no-trunc', 'docker inspect id1']);
    });

    it('should fail when docker ps fails', async () => {
      runner.setCommandConfig('docker ps -aq --no-trunc', {
        exitCode: 1,
        stderr: 'Cannot connect to the Docker daemon at unix:///var/run/docker.sock\n',
      });

      const result = await runtime.listContainers();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('COMMAND_FAILED');
        expect(result.error.message).toBe(
          'Cannot connect to the Docker daemon at unix:///var/run/docker.sock'
        );
      }
    });

    it('should fail when jq cannot be run', async () => {
      runner.setCommandConfig('docker ps -aq --no-trunc', { stdout: 'aaa111\n' });
      runner.setMissing('jq');

      const result = await runtime.listContainers();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('SPAWN_FAILED');
        expect(result.error.message).toBe('Could not run jq: spawn jq ENOENT');
      }
    });
  });

  describe('startContainer', () => {
    it('should succeed when docker start exits 0', async () => {
      runner.setCommandConfig('docker start web', { stdout: 'web\n' });

      const result = await runtime.startContainer('web');

      expect(result).toEqual({ ok: true, value: undefined });
      expect(runner.getCommandLines()).toEqual(['docker start web']);
    });

    it('should report the daemon error on failure', async () => {
      runner.setCommandConfig('docker start web', {
        exitCode: 1,
        stderr: 'Error response from daemon: driver failed\nError: failed to start containers: web\n',
      });

      const result = await runtime.startContainer('web');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toEqual({
          code: 'COMMAND_FAILED',
          message: 'Error response from daemon: driver failed',
          cause: undefined,
        });
      }
    });

    it('should fall back to the exit code when stderr is empty', async () => {
      runner.setCommandConfig('docker start web', { exitCode: 125 });

      const result = await runtime.startContainer('web');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('docker start exited with code 125');
      }
    });
  });
});

describe('findVanishedIds', () => {
  it('should collect every id docker reported as missing', () => {
    expect(findVanishedIds('Error: No such object: id2\nError: No such object: id5\n')).toEqual(['id2', 'id5']);
    expect(findVanishedIds('Error response from daemon: No such container: abc\n')).toEqual(['abc']);
    expect(findVanishedIds('permission denied\n')).toEqual([]);
  });
});

describe('parseContainerRecords', () => {
  it('should classify unmanaged and missing policies as other', () => {
    const result = parseContainerRecords(
      '{"name":"cache","restartPolicy":"no","running":false,"exitCode":0}\n' +
        '{"name":"tmp","restartPolicy":null,"running":false,"exitCode":1}'
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((r) => [r.restartPolicy, r.policyName])).toEqual([
        ['other', 'no'],
        ['other', ''],
      ]);
    }
  });

  it('should reject a malformed line with its line number', () => {
    const result = parseContainerRecords(
      '{"name":"web","restartPolicy":"always","running":false,"exitCode":0}\n{"name":"db"}'
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_OUTPUT');
      expect(result.error.message).toMatch(/^Unexpected container data on line 2: /);
    }
  });
});
