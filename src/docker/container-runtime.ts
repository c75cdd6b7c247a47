/**
 * ContainerRuntime interface
 * What the restart engine and the run command need from Docker
 */

import { ContainerRecord } from '../types/container';
import { Result } from '../types/result';

/**
 * Error types for runtime operations
 */
export type RuntimeErrorCode =
  /** The command ran and exited non-zero (or timed out) */
  | 'COMMAND_FAILED'
  /** The command output could not be understood */
  | 'INVALID_OUTPUT'
  /** The command could not be started at all */
  | 'SPAWN_FAILED';

/**
 * Runtime operation error
 */
export interface RuntimeError {
  code: RuntimeErrorCode;
  message: string;
  cause?: Error;
}

/**
 * Starts a single container by name
 */
export interface ContainerStarter {
  startContainer(name: string): Promise<Result<void, RuntimeError>>;
}

/**
 * Container runtime operations
 */
export interface ContainerRuntime extends ContainerStarter {
  /**
   * Snapshot every container, running or not, in runtime order
   */
  listContainers(): Promise<Result<ContainerRecord[], RuntimeError>>;
}

/**
 * Create a RuntimeError
 */
export function createRuntimeError(
  code: RuntimeErrorCode,
  message: string,
  cause?: Error
): RuntimeError {
  return { code, message, cause };
}
