/**
 * Tests for Schema Validators
 */

import { describe, it, expect } from 'vitest';
import {
  validateContainerLine,
  parseContainerLine,
  validateConfigFile,
  parseConfigFile,
} from './validators';

describe('validateContainerLine', () => {
  it('should validate a projected container', () => {
    const data = { name: 'web', restartPolicy: 'always', running: false, exitCode: 137 };
    const result = validateContainerLine(data);
    expect(result.success).toBe(true);
    expect(result.data).toEqual(data);
  });

  it('should accept a null restart policy and exit code', () => {
    const result = validateContainerLine({ name: 'web', restartPolicy: null, running: true, exitCode: null });
    expect(result.success).toBe(true);
    expect(result.data?.restartPolicy).toBeNull();
  });

  it('should reject an empty name', () => {
    const result = validateContainerLine({ name: '', restartPolicy: 'no', running: false, exitCode: 0 });
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['name: Container name cannot be empty']);
  });

  it('should reject a missing running flag', () => {
    const result = validateContainerLine({ name: 'db', restartPolicy: 'no', exitCode: 0 });
    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^running: /);
  });
});

describe('parseContainerLine', () => {
  it('should parse a jq output line', () => {
    const result = parseContainerLine(
      '{"name":"db","restartPolicy":"unless-stopped","running":false,"exitCode":0}'
    );
    expect(result.success).toBe(true);
    expect(result.data?.name).toBe('db');
  });

  it('should report invalid JSON', () => {
    const result = parseContainerLine('{not json');
    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^Invalid JSON: /);
  });
});

describe('validateConfigFile', () => {
  it('should accept an empty object', () => {
    expect(validateConfigFile({})).toEqual({ success: true, data: {} });
  });

  it('should accept every known key', () => {
    const data = {
      retry: true,
      retryInterval: 10,
      maxWait: 300,
      force: true,
      logFile: '/tmp/test.log',
      logSize: '512K',
      log: true,
      verbose: false,
      dockerCommand: 'podman',
      jqCommand: '/usr/bin/jq',
      containerPauseMs: 0,
    };
    const result = validateConfigFile(data);
    expect(result.success).toBe(true);
    expect(result.data).toEqual(data);
  });

  it('should accept logSize as a byte count', () => {
    expect(validateConfigFile({ logSize: 2048 }).success).toBe(true);
  });

  it('should reject unknown keys', () => {
    const result = validateConfigFile({ retries: 3 });
    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toContain('retries');
  });

  it('should reject a non-positive retry interval', () => {
    const result = validateConfigFile({ retryInterval: 0 });
    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^retryInterval: /);
  });

  it('should reject a malformed size', () => {
    const result = validateConfigFile({ logSize: '1 MB' });
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['logSize: Expected a size such as 512K, 1M or a byte count']);
  });
});

describe('parseConfigFile', () => {
  it('should parse JSON content', () => {
    const result = parseConfigFile('{"retry": true, "maxWait": 60}');
    expect(result).toEqual({ success: true, data: { retry: true, maxWait: 60 } });
  });

  it('should report invalid JSON', () => {
    const result = parseConfigFile('retry=true');
    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^Invalid JSON: /);
  });
});
