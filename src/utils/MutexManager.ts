/**
 * Mutex Manager Utility
 *
 * Named async mutex with hold-time statistics. Configuration trees and their
 * pluggable strategies each get one.
 */

import { Mutex } from 'async-mutex';
import { logger } from './logger';

export interface MutexOptions {
  name?: string;
  enableStatistics?: boolean;
  /** Hold time after which a warning is logged on release (ms, 0 disables) */
  slowOperationThreshold?: number;
}

export interface MutexStatistics {
  totalAcquisitions: number;
  totalReleases: number;
  averageHoldTime: number;
  maxHoldTime: number;
  currentlyHeld: number;
}

function emptyStatistics(): MutexStatistics {
  return {
    totalAcquisitions: 0,
    totalReleases: 0,
    averageHoldTime: 0,
    maxHoldTime: 0,
    currentlyHeld: 0
  };
}

/**
 * Mutex wrapper used for every exclusive section in the configuration engine.
 * Not re-entrant: an operation must not call back into the same manager.
 */
export class MutexManager {
  private mutex = new Mutex();
  private name: string;
  private statistics: MutexStatistics = emptyStatistics();
  private enableStatistics: boolean;
  private slowOperationThreshold: number;

  constructor(options: MutexOptions = {}) {
    this.name = options.name || 'MutexManager';
    this.enableStatistics = options.enableStatistics ?? true;
    this.slowOperationThreshold = options.slowOperationThreshold ?? 0;
  }

  /**
   * Execute operation with automatic mutex handling
   */
  async withMutex<T>(
    operation: () => Promise<T> | T,
    options: { operationName?: string } = {}
  ): Promise<T> {
    const release = await this.mutex.acquire();
    const startTime = Date.now();

    if (this.enableStatistics) {
      this.statistics.totalAcquisitions++;
      this.statistics.currentlyHeld++;
    }

    try {
      return await operation();
    } finally {
      // Always release the mutex
      release();
      this.recordRelease(Date.now() - startTime, options.operationName);
    }
  }

  getName(): string {
    return this.name;
  }

  /**
   * Get current mutex statistics
   */
  getStatistics(): MutexStatistics {
    return { ...this.statistics };
  }

  resetStatistics(): void {
    this.statistics = emptyStatistics();
  }

  isLocked(): boolean {
    return this.mutex.isLocked();
  }

  private recordRelease(holdTime: number, operationName?: string): void {
    if (this.slowOperationThreshold > 0 && holdTime > this.slowOperationThreshold) {
      logger.warn(`Slow operation in ${this.name}: '${operationName || 'anonymous'}' held the lock for ${holdTime}ms`);
    }

    if (!this.enableStatistics) {
      return;
    }

    this.statistics.totalReleases++;
    this.statistics.currentlyHeld = Math.max(0, this.statistics.currentlyHeld - 1);

    if (holdTime > this.statistics.maxHoldTime) {
      this.statistics.maxHoldTime = holdTime;
    }

    // Update average hold time
    const totalOperations = this.statistics.totalReleases;
    this.statistics.averageHoldTime =
      (this.statistics.averageHoldTime * (totalOperations - 1) + holdTime) / totalOperations;
  }
}

/**
 * Factory function for creating named mutex managers
 */
export function createMutexManager(name: string, options: Omit<MutexOptions, 'name'> = {}): MutexManager {
  return new MutexManager({ ...options, name });
}
