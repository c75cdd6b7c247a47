/**
 * Gate module - waiting for Docker and jq
 */

export type {
  ReadinessCheck,
  ReadinessGroup,
  GateOptions,
  GateDependencies,
  GateResult,
  GateOutcome,
} from './availability-gate';
export { AvailabilityGate, formatSeconds } from './availability-gate';

export {
  DAEMON_PROBE_TIMEOUT_MS,
  commandProbe,
  daemonProbe,
  createReadinessGroups,
} from './readiness-checks';
