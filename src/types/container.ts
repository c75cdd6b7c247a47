/**
 * Container types
 * Snapshot records read from the container runtime and the outcomes
 * produced for them by the restart engine.
 */

/**
 * Restart policies dockstart distinguishes. Everything that is neither
 * "always" nor "unless-stopped" ("no", "on-failure", empty) is "other".
 */
export type RestartPolicy = 'always' | 'unless-stopped' | 'other';

/**
 * Point-in-time snapshot of one container
 */
export interface ContainerRecord {
  /** Container name, unique per runtime instance */
  readonly name: string;
  /** Classified restart policy */
  readonly restartPolicy: RestartPolicy;
  /** Restart policy name as reported by the runtime, for display */
  readonly policyName: string;
  /** Whether the container is currently running */
  readonly isRunning: boolean;
  /** Exit code of the last run; null when unknown */
  readonly lastExitCode: number | null;
}

/**
 * The four mutually exclusive outcome buckets
 */
export type OutcomeKind = 'started' | 'already_running' | 'skipped' | 'failed';

/**
 * Why a container ended up in its bucket
 */
export type OutcomeReason =
  /** Policy is not managed by dockstart */
  | 'unmanaged_policy'
  /** Container was running already */
  | 'already_running'
  /** unless-stopped container that exited cleanly or with unknown code, not forced */
  | 'deliberate_stop'
  /** always policy */
  | 'always_policy'
  /** unless-stopped under force mode */
  | 'forced'
  /** unless-stopped container whose last exit code was non-zero */
  | 'crashed';

/**
 * Result of processing one container
 */
export interface ContainerOutcome {
  readonly name: string;
  readonly outcome: OutcomeKind;
  readonly reason: OutcomeReason;
  /** Error message when outcome is "failed" */
  readonly error?: string;
}

/**
 * Aggregate counts for a run
 */
export interface RunSummary {
  readonly started: number;
  readonly alreadyRunning: number;
  readonly skipped: number;
  readonly failed: number;
}

/**
 * Classify a raw restart policy name
 */
export function classifyRestartPolicy(policyName: string): RestartPolicy {
  if (policyName === 'always' || policyName === 'unless-stopped') {
    return policyName;
  }
  return 'other';
}
