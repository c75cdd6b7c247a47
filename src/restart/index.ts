/**
 * Restart module - deciding which containers to start
 */

export type { RestartDecision } from './restart-policy';
export { decideRestart, describeReason } from './restart-policy';

export type { RestartEngineOptions, RestartEngineDependencies, RestartReport } from './restart-engine';
export { RestartEngine, NO_ELIGIBLE_CONTAINERS_MESSAGE } from './restart-engine';
