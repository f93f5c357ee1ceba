import { logger } from '../../utils/logger';
import type {
  ConfigurationChange,
  ConfigurationListener
} from '../interfaces/ConfigurationInterfaces';
import type { ConfigurationEvent } from './ConfigurationEvent';

export interface ConfigurationAuditorOptions {
  /** Oldest entries are dropped beyond this count (default: 1000) */
  maxEntries?: number;
  /** Log every recorded change at debug level (default: false) */
  enableDebugLogging?: boolean;
}

/**
 * ConfigurationAuditor - Keeps a bounded history of configuration changes
 *
 * Register it as a listener on one or more configurations:
 * ```typescript
 * const auditor = new ConfigurationAuditor();
 * configuration.addConfigurationListener(auditor);
 * ```
 */
export class ConfigurationAuditor implements ConfigurationListener {
  private entries: ConfigurationChange[] = [];
  private readonly maxEntries: number;
  private readonly enableDebugLogging: boolean;

  constructor(options: ConfigurationAuditorOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.enableDebugLogging = options.enableDebugLogging ?? false;
  }

  configurationChanged(event: ConfigurationEvent): void {
    const change: ConfigurationChange = event.isRemoval()
      ? { timestamp: new Date().toISOString(), name: event.name, changeType: 'remove' }
      : { timestamp: new Date().toISOString(), name: event.name, value: event.value, changeType: 'set' };

    this.entries.push(change);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    if (this.enableDebugLogging) {
      logger.debug(`Logged configuration change: ${change.changeType} ${change.name}`);
    }
  }

  /**
   * Get audit log entries, newest first
   */
  getAuditLog(limit = 100): ConfigurationChange[] {
    return this.entries.slice(-limit).reverse();
  }

  /**
   * Changes recorded for one variable, newest first
   */
  getHistory(name: string): ConfigurationChange[] {
    return this.entries.filter(change => change.name === name).reverse();
  }

  getEntryCount(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
