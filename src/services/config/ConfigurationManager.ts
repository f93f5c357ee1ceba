import { Mutex } from 'async-mutex';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as chokidar from 'chokidar';
import { EventEmitter } from 'events';
import { logger } from '../../utils/logger';
import {
  ServiceHealthStatus,
  ServiceInitializationError
} from '../interfaces/CoreServiceInterfaces';
import {
  ConfigurationManagerOptions,
  IConfigurationService,
  ReloadOrigin
} from '../interfaces/ConfigurationInterfaces';
import { Configuration } from './Configuration';
import { applyEnvironmentOverrides } from './EnvironmentOverrides';
import { FileConfigurationSource } from './FileConfigurationSource';

/**
 * ConfigurationManager - Owns a configuration persisted to one file
 *
 * Responsibilities:
 * - Loading the file on startup and applying environment overrides
 * - Saving the tree back to the file
 * - Watching the file and merging external edits (hot reload)
 * - Event emission and health reporting
 */
class ConfigurationManager extends EventEmitter implements IConfigurationService {
  private mutex = new Mutex();
  private fileWatcher?: chokidar.FSWatcher;
  private initialized = false;
  private isReloading = false;
  private isSaving = false;
  private reloadCount = 0;
  private lastLoaded?: string;
  private lastSaved?: string;
  /** Modification time of the file as this manager last wrote it */
  private savedMtimeMs?: number;

  private readonly source: FileConfigurationSource;
  private readonly configuration: Configuration;

  constructor(
    private readonly options: ConfigurationManagerOptions,
    configuration?: Configuration
  ) {
    super();
    this.source = new FileConfigurationSource(options.configPath);
    this.configuration = configuration ?? new Configuration({ name: path.basename(options.configPath) });
  }

  /**
   * Initialize the configuration manager
   */
  async initialize(): Promise<void> {
    const release = await this.mutex.acquire();
    try {
      if (this.initialized) {
        logger.warn('ConfigurationManager already initialized');
        return;
      }

      await fs.ensureDir(path.dirname(this.options.configPath));
      await this.configuration.setSource(this.source);

      if (await this.source.exists()) {
        await this.configuration.read();
        this.lastLoaded = new Date().toISOString();
        logger.info(`Configuration loaded from ${this.options.configPath}`);
      } else {
        logger.info(`No configuration file at ${this.options.configPath}, starting empty`);
      }

      if (this.options.environmentOverrides) {
        await applyEnvironmentOverrides(this.configuration, this.options.environmentOverrides, {
          loadDotEnv: this.options.loadDotEnv ?? true
        });
      }

      if (this.options.watch) {
        await this.startFileWatching();
      }

      this.initialized = true;
      logger.info('ConfigurationManager initialized successfully');
    } catch (error) {
      logger.error('Failed to initialize ConfigurationManager:', error);
      throw new ServiceInitializationError(
        'ConfigurationManager',
        error instanceof Error ? error.message : String(error),
        error
      );
    } finally {
      release();
    }
  }

  /**
   * Start file watching for hot reload
   */
  private async startFileWatching(): Promise<void> {
    if (this.fileWatcher) {
      await this.fileWatcher.close();
    }

    this.fileWatcher = chokidar.watch(this.options.configPath, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: this.options.stabilityThreshold ?? 1000,
        pollInterval: 100
      }
    });

    this.fileWatcher.on('change', () => {
      this.handleFileChange().catch((error: unknown) => {
        logger.error('Failed to reload configuration from file change:', error);
        this.emit('config:error', error instanceof Error ? error : new Error(String(error)));
      });
    });

    this.fileWatcher.on('error', (error: unknown) => {
      logger.error('File watcher error:', error);
      this.emit('config:error', error instanceof Error ? error : new Error(String(error)));
    });

    logger.info('Configuration file watching started');
  }

  /**
   * Reloads after a change reported by the watcher, unless the change is this
   * manager's own save. Resolves with whether a reload happened.
   */
  async handleFileChange(): Promise<boolean> {
    if (this.isReloading || this.isSaving) {
      logger.debug('Ignoring file change during reload or save');
      return false;
    }

    if (this.savedMtimeMs !== undefined) {
      const { mtimeMs } = await fs.stat(this.options.configPath);
      if (mtimeMs === this.savedMtimeMs) {
        logger.debug('Ignoring file change from our own save');
        return false;
      }
    }

    logger.info('Configuration file changed, reloading...');
    await this.reloadConfiguration('file-watcher');
    return true;
  }

  /**
   * Merge the file's current content into the tree.
   * Variables missing from the file keep their value.
   */
  async reloadConfiguration(origin: ReloadOrigin = 'command'): Promise<void> {
    const release = await this.mutex.acquire();
    try {
      this.isReloading = true;
      await this.configuration.read();
      this.reloadCount++;
      this.lastLoaded = new Date().toISOString();

      this.emit('config:reloaded', origin);
      logger.info(`Configuration reloaded from ${origin}`);
    } finally {
      this.isReloading = false;
      release();
    }
  }

  /**
   * Save configuration
   */
  async saveConfiguration(): Promise<void> {
    const release = await this.mutex.acquire();
    try {
      this.isSaving = true;
      await this.configuration.write();
      this.savedMtimeMs = (await fs.stat(this.options.configPath)).mtimeMs;
      this.lastSaved = new Date().toISOString();

      this.emit('config:saved', this.options.configPath);
      logger.info(`Configuration saved to ${this.options.configPath}`);
    } finally {
      this.isSaving = false;
      release();
    }
  }

  getConfiguration(): Configuration {
    return this.configuration;
  }

  getConfigPath(): string {
    return this.options.configPath;
  }

  /**
   * Shutdown the configuration manager
   */
  async shutdown(): Promise<void> {
    logger.info('Shutting down ConfigurationManager...');

    if (this.fileWatcher) {
      await this.fileWatcher.close();
      this.fileWatcher = undefined;
    }

    this.removeAllListeners();
    logger.info('ConfigurationManager shutdown completed');
  }

  getName(): string {
    return 'ConfigurationManager';
  }

  /**
   * Get health status
   */
  getHealthStatus(): ServiceHealthStatus {
    const errors: string[] = [];

    if (!this.initialized) {
      errors.push('ConfigurationManager not initialized');
    }
    if (this.options.watch && this.initialized && !this.fileWatcher) {
      errors.push('File watcher is not running');
    }

    return {
      name: this.getName(),
      healthy: errors.length === 0,
      errors,
      metrics: {
        initialized: this.initialized,
        configPath: this.options.configPath,
        fileWatcherActive: !!this.fileWatcher,
        reloadCount: this.reloadCount,
        lastLoaded: this.lastLoaded || 'never',
        lastSaved: this.lastSaved || 'never',
        listenerCount: this.configuration.getListenerRegistry().size,
        treeLock: this.configuration.getTreeLockStatistics()
      }
    };
  }
}

export { ConfigurationManager };
