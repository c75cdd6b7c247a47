/**
 * systemd unit for running dockstart once at boot
 */

import { bootCommand, findMissingParams } from './environment';

/**
 * Render the dockstart.service unit
 */
export function renderSystemdUnit(binPath: string): string {
  return `[Unit]
Description=Start Docker containers with restart policy
After=docker.service
Requires=docker.service
ConditionPathExists=${binPath}

[Service]
Type=oneshot
ExecStart=${bootCommand(binPath)}
RemainAfterExit=yes
StandardOutput=journal

[Install]
WantedBy=multi-user.target
`;
}

export type SystemdUnitPlan =
  | { action: 'create'; content: string }
  /** Our unit, ExecStart rewritten to add the missing parameters */
  | { action: 'update'; content: string; missing: string[] }
  | { action: 'unchanged' }
  /** Some other unit under our name, replaced wholesale */
  | { action: 'replace'; content: string };

/**
 * Whether applying the plan requires `systemctl daemon-reload`
 */
export function requiresDaemonReload(plan: SystemdUnitPlan): boolean {
  return plan.action === 'update' || plan.action === 'replace';
}

/**
 * Plan the unit file change. `existing` is null when the file does not exist.
 */
export function planSystemdUnit(existing: string | null, binPath: string): SystemdUnitPlan {
  if (existing === null) {
    return { action: 'create', content: renderSystemdUnit(binPath) };
  }

  const lines = existing.split('\n');
  const execIndex = lines.findIndex((line) => line.trim().startsWith(`ExecStart=${binPath}`));
  if (execIndex === -1) {
    return { action: 'replace', content: renderSystemdUnit(binPath) };
  }

  const missing = findMissingParams(lines[execIndex].trim().slice('ExecStart='.length));
  if (missing.length === 0) {
    return { action: 'unchanged' };
  }

  const updated = [...lines];
  updated[execIndex] = `ExecStart=${bootCommand(binPath)}`;
  return { action: 'update', content: updated.join('\n'), missing };
}
