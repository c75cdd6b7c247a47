/**
 * IO module - filesystem abstraction for testability
 */

export { RealFileSystem, createRealFileSystem } from './real-file-system';
export { MemoryFileSystem } from './memory-file-system';
