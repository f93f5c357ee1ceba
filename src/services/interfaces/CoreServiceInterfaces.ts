/**
 * Core Service Interface Definitions
 *
 * Lifecycle and health contracts shared by long-lived services.
 */

// ============================================================================
// Base Service Interface
// ============================================================================

/**
 * Base contract for services that own resources (watchers, open files)
 *
 * ## Lifecycle
 * 1. Construct with options, no I/O happens in the constructor
 * 2. `initialize()` acquires resources
 * 3. `shutdown()` releases them; the service is not reused afterwards
 *
 * @example
 * ```typescript
 * const service = new ConfigurationManager({ configPath: './data/prefs.xml' });
 * await service.initialize();
 * try {
 *   // use service
 * } finally {
 *   await service.shutdown();
 * }
 * ```
 */
export interface IService {
  /**
   * Initializes the service and any required resources
   *
   * Calling it again after a successful initialization is a no-op.
   *
   * @throws {ServiceInitializationError} If the service cannot be brought up
   */
  initialize(): Promise<void>;

  /**
   * Releases every resource held by the service
   */
  shutdown(): Promise<void>;

  /**
   * Current health snapshot, computed synchronously
   */
  getHealthStatus(): ServiceHealthStatus;
}

export interface ServiceHealthStatus {
  /** Whether the service is currently operational and can handle requests */
  healthy: boolean;

  /** Human-readable name of the service for identification */
  name: string;

  /** Array of current error messages (empty if healthy) */
  errors: string[];

  /** Optional performance and operational metrics */
  metrics?: Record<string, unknown>;
}

/**
 * Thrown when a service fails to initialize
 */
export class ServiceInitializationError extends Error {
  /**
   * @param serviceName Name of the service that failed to initialize
   * @param reason Specific reason for the initialization failure
   */
  constructor(serviceName: string, reason: string, public readonly cause?: unknown) {
    super(`Failed to initialize ${serviceName}: ${reason}`);
    this.name = 'ServiceInitializationError';
  }
}
