/**
 * tree-conf - Main Entry Point
 * Hierarchical configuration tree with dotted-path access
 */

export * from './services/config';
export type {
  IService,
  ServiceHealthStatus
} from './services/interfaces/CoreServiceInterfaces';
export { ServiceInitializationError } from './services/interfaces/CoreServiceInterfaces';
export { MutexManager, createMutexManager } from './utils/MutexManager';
export type { MutexOptions, MutexStatistics } from './utils/MutexManager';
export { logger } from './utils/logger';
