/**
 * Docker module - container runtime access
 */

export type {
  RuntimeErrorCode,
  RuntimeError,
  ContainerStarter,
  ContainerRuntime,
} from './container-runtime';
export { createRuntimeError } from './container-runtime';

export {
  CONTAINER_PROJECTION,
  DockerCliRuntime,
  createDockerCliRuntime,
  parseContainerRecords,
  toContainerRecord,
} from './docker-cli-runtime';
