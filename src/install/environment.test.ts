import { describe, it, expect } from 'vitest';
import { bootCommand, findMissingParams, isRoot, detectWsl, detectSystemd } from './environment';
import { MemoryFileSystem } from '../io/memory-file-system';
import { MockProcessRunner } from '../process/mock-process-runner';

describe('bootCommand', () => {
  it('should append the required parameters', () => {
    expect(bootCommand('/usr/local/bin/dockstart')).toBe('/usr/local/bin/dockstart --retry --force');
  });
});

describe('findMissingParams', () => {
  it('should match parameters as whole words', () => {
    expect(findMissingParams('/usr/local/bin/dockstart --retry-interval 5')).toEqual(['--retry', '--force']);
    expect(findMissingParams('/usr/local/bin/dockstart --force --retry')).toEqual([]);
    expect(findMissingParams('/usr/local/bin/dockstart --retry;')).toEqual(['--force']);
  });
});

describe('isRoot', () => {
  it('should only accept uid 0', () => {
    expect(isRoot(() => 0)).toBe(true);
    expect(isRoot(() => 1000)).toBe(false);
  });
});

describe('detectWsl', () => {
  it('should recognise a WSL kernel', async () => {
    const fs = new MemoryFileSystem();
    fs.setFile('/proc/version', 'Linux version 5.15.90.1-Microsoft-standard-WSL2 (gcc 11.2.0)');

    expect(await detectWsl(fs)).toBe(true);
  });

  it('should reject other kernels and a missing file', async () => {
    const fs = new MemoryFileSystem();
    expect(await detectWsl(fs)).toBe(false);

    fs.setFile('/proc/version', 'Linux version 6.1.0-18-amd64 (gcc 12.2.0)');
    expect(await detectWsl(fs)).toBe(false);
  });
});

describe('detectSystemd', () => {
  it('should succeed when systemctl answers', async () => {
    const runner = new MockProcessRunner();

    expect(await detectSystemd(runner)).toBe(true);
    expect(runner.getCommandLines()).toEqual(['systemctl --version']);
  });

  it('should fail when systemctl is missing', async () => {
    const runner = new MockProcessRunner();
    runner.setMissing('systemctl');

    expect(await detectSystemd(runner)).toBe(false);
  });
});
