import { describe, it, expect } from 'vitest';
import { planWslConfig } from './wsl-config';

const BIN = '/usr/local/bin/dockstart';
const ENTRY = 'command = /usr/local/bin/dockstart --retry --force';

describe('planWslConfig', () => {
  it('should create the file when it is missing', () => {
    expect(planWslConfig(null, BIN)).toEqual({
      action: 'create',
      content: `[boot]\n${ENTRY}\n`,
      commandLine: ENTRY,
      previous: null,
    });
  });

  it('should leave a complete dockstart command alone', () => {
    const plan = planWslConfig('[boot]\ncommand = /usr/local/bin/dockstart --force --retry\n', BIN);

    expect(plan).toEqual({ action: 'unchanged', commandLine: 'command = /usr/local/bin/dockstart --force --retry' });
  });

  it('should rewrite a dockstart command that lacks parameters', () => {
    const plan = planWslConfig('[boot]\ncommand = /usr/local/bin/dockstart --retry\n', BIN);

    expect(plan).toEqual({
      action: 'update',
      content: `[boot]\n${ENTRY}\n`,
      commandLine: ENTRY,
      previous: 'command = /usr/local/bin/dockstart --retry',
    });
  });

  it('should not take --retry-interval for --retry', () => {
    const plan = planWslConfig('[boot]\ncommand = /usr/local/bin/dockstart --retry-interval 5 --force\n', BIN);

    expect(plan.action).toBe('update');
  });

  it('should ask for a manual change when dockstart sits in a chain', () => {
    const current = 'command = service cron start && /usr/local/bin/dockstart --retry';
    const plan = planWslConfig(`[boot]\n${current}\n`, BIN);

    expect(plan).toEqual({
      action: 'manual',
      reason: 'chained',
      current,
      missing: ['--force'],
      suggestion: null,
    });
  });

  it('should append to a foreign command ending in a semicolon', () => {
    const plan = planWslConfig('[boot]\ncommand = service cron start;\n', BIN);

    expect(plan).toEqual({
      action: 'append',
      content: '[boot]\ncommand = service cron start; /usr/local/bin/dockstart --retry --force\n',
      commandLine: 'command = service cron start; /usr/local/bin/dockstart --retry --force',
      previous: 'command = service cron start;',
    });
  });

  it('should suggest chaining onto any other foreign command', () => {
    const plan = planWslConfig('[boot]\ncommand = service cron start\n', BIN);

    expect(plan).toEqual({
      action: 'manual',
      reason: 'foreign',
      current: 'command = service cron start',
      missing: [],
      suggestion: 'command = service cron start && /usr/local/bin/dockstart --retry --force',
    });
  });

  it('should insert the command right after an existing [boot] header', () => {
    const plan = planWslConfig('[network]\nhostname = dev\n\n[boot]\nsystemd = true\n', BIN);

    expect(plan.action).toBe('insert');
    if (plan.action === 'insert') {
      expect(plan.content).toBe(`[network]\nhostname = dev\n\n[boot]\n${ENTRY}\nsystemd = true\n`);
    }
  });

  it('should append a [boot] section when there is none', () => {
    const expected = `[network]\nhostname = dev\n\n[boot]\n${ENTRY}\n`;

    const withNewline = planWslConfig('[network]\nhostname = dev\n', BIN);
    const withoutNewline = planWslConfig('[network]\nhostname = dev', BIN);

    expect(withNewline.action).toBe('add_section');
    if (withNewline.action === 'add_section') {
      expect(withNewline.content).toBe(expected);
    }
    if (withoutNewline.action === 'add_section') {
      expect(withoutNewline.content).toBe(expected);
    }
  });

  it('should ignore command lines outside the [boot] section', () => {
    const plan = planWslConfig('[user]\ndefault = dev\ncommand = echo hi\n', BIN);

    expect(plan.action).toBe('add_section');
  });

  it('should honour a custom executable path', () => {
    const plan = planWslConfig(null, '/opt/dockstart/bin/dockstart');

    expect(plan.action === 'create' && plan.commandLine).toBe(
      'command = /opt/dockstart/bin/dockstart --retry --force'
    );
  });
});
