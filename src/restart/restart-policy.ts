/**
 * Restart decision
 * Pure classification of one container snapshot
 */

import { ContainerRecord, OutcomeReason } from '../types/container';

/**
 * What to do with one container
 */
export type RestartDecision =
  | { action: 'start'; reason: Extract<OutcomeReason, 'always_policy' | 'forced' | 'crashed'> }
  | { action: 'none'; reason: Extract<OutcomeReason, 'already_running'> }
  | { action: 'skip'; reason: Extract<OutcomeReason, 'unmanaged_policy' | 'deliberate_stop'> };

/**
 * Decide whether a container should be started.
 *
 * unless-stopped containers are only started when forced or when their last
 * exit code is known and non-zero: a clean exit is read as a deliberate stop.
 */
export function decideRestart(container: ContainerRecord, force: boolean): RestartDecision {
  if (container.restartPolicy === 'other') {
    return { action: 'skip', reason: 'unmanaged_policy' };
  }

  if (container.isRunning) {
    return { action: 'none', reason: 'already_running' };
  }

  if (container.restartPolicy === 'always') {
    return { action: 'start', reason: 'always_policy' };
  }

  if (force) {
    return { action: 'start', reason: 'forced' };
  }

  if (container.lastExitCode !== null && container.lastExitCode !== 0) {
    return { action: 'start', reason: 'crashed' };
  }

  return { action: 'skip', reason: 'deliberate_stop' };
}

/**
 * Short human-readable explanation of a decision
 */
export function describeReason(reason: OutcomeReason, container: ContainerRecord): string {
  switch (reason) {
    case 'unmanaged_policy':
      return `restart policy ${container.policyName || 'none'} is not managed`;
    case 'already_running':
      return 'already running';
    case 'always_policy':
      return 'restart policy always';
    case 'forced':
      return 'unless-stopped, forced';
    case 'crashed':
      return `unless-stopped, exited with code ${container.lastExitCode ?? 'unknown'}`;
    case 'deliberate_stop':
      return container.lastExitCode === null
        ? 'unless-stopped, exit code unknown'
        : 'unless-stopped, exited cleanly';
  }
}
