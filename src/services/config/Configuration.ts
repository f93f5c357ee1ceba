import type { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import { logger } from '../../utils/logger';
import { MutexManager, MutexStatistics, createMutexManager } from '../../utils/MutexManager';
import {
  ConfigurationBuilder,
  ConfigurationListener,
  ConfigurationReader,
  ConfigurationReaderFactory,
  ConfigurationSource,
  ConfigurationSourceError,
  ConfigurationWriter,
  ConfigurationWriterFactory
} from '../interfaces/ConfigurationInterfaces';
import { ConfigurationEvent } from './ConfigurationEvent';
import { ConfigurationExplorer, moveToParent } from './ConfigurationExplorer';
import { ConfigurationListenerRegistry } from './ConfigurationListenerRegistry';
import { ConfigurationLoader } from './ConfigurationLoader';
import { ConfigurationSection } from './ConfigurationSection';
import {
  formatBoolean,
  formatDouble,
  formatFloat,
  formatInteger,
  formatLong,
  parseBoolean,
  parseDouble,
  parseFloat32,
  parseInteger,
  parseLong
} from './ConfigurationValues';
import { XmlConfigurationReader } from './xml/XmlConfigurationReader';
import { XmlConfigurationWriter } from './xml/XmlConfigurationWriter';

export interface ConfigurationOptions {
  /** Used to name locks and log lines (default: 'configuration') */
  name?: string;
  /** Registry to notify; defaults to one owned by this instance */
  listeners?: ConfigurationListenerRegistry;
  source?: ConfigurationSource;
  readerFactory?: ConfigurationReaderFactory;
  writerFactory?: ConfigurationWriterFactory;
}

/**
 * Configuration - Tree of string variables addressed by dotted names
 *
 * `ui.theme.color` names variable `color` in section `theme` of section `ui`.
 * All tree access goes through one mutex per instance; the source and the
 * reader/writer factories each have their own so they can be swapped while a
 * read or write is running (the running call keeps what it already picked up).
 *
 * Listeners are called synchronously while the tree lock is held: they must
 * not await operations on the same configuration.
 */
export class Configuration {
  private readonly root = new ConfigurationSection();
  private readonly listeners: ConfigurationListenerRegistry;
  private readonly name: string;

  private source?: ConfigurationSource;
  private readerFactory?: ConfigurationReaderFactory;
  private writerFactory?: ConfigurationWriterFactory;

  private readonly treeLock: MutexManager;
  private readonly sourceLock: MutexManager;
  private readonly readerLock: MutexManager;
  private readonly writerLock: MutexManager;

  constructor(options: ConfigurationOptions = {}) {
    this.name = options.name ?? 'configuration';
    this.listeners = options.listeners ?? new ConfigurationListenerRegistry();
    this.source = options.source;
    this.readerFactory = options.readerFactory;
    this.writerFactory = options.writerFactory;

    this.treeLock = createMutexManager(`${this.name}:tree`);
    this.sourceLock = createMutexManager(`${this.name}:source`);
    this.readerLock = createMutexManager(`${this.name}:reader`);
    this.writerLock = createMutexManager(`${this.name}:writer`);
  }

  // - Source ------------------------------------------------------------------

  async setSource(source: ConfigurationSource | undefined): Promise<void> {
    await this.sourceLock.withMutex(() => {
      this.source = source;
    });
  }

  async getSource(): Promise<ConfigurationSource | undefined> {
    return this.sourceLock.withMutex(() => this.source);
  }

  // - Reader handling ---------------------------------------------------------

  async setReaderFactory(factory: ConfigurationReaderFactory | undefined): Promise<void> {
    await this.readerLock.withMutex(() => {
      this.readerFactory = factory;
    });
  }

  async getReaderFactory(): Promise<ConfigurationReaderFactory | undefined> {
    return this.readerLock.withMutex(() => this.readerFactory);
  }

  /**
   * New reader from the configured factory, or an XML reader when none is set
   */
  async getReader(): Promise<ConfigurationReader> {
    const factory = await this.getReaderFactory();
    return factory ? factory.getReaderInstance() : new XmlConfigurationReader();
  }

  // - Writer handling ---------------------------------------------------------

  async setWriterFactory(factory: ConfigurationWriterFactory | undefined): Promise<void> {
    await this.writerLock.withMutex(() => {
      this.writerFactory = factory;
    });
  }

  async getWriterFactory(): Promise<ConfigurationWriterFactory | undefined> {
    return this.writerLock.withMutex(() => this.writerFactory);
  }

  /**
   * New writer from the configured factory, or an XML writer when none is set
   */
  async getWriter(): Promise<ConfigurationWriter> {
    const factory = await this.getWriterFactory();
    return factory ? factory.getWriterInstance() : new XmlConfigurationWriter();
  }

  // - Reading -----------------------------------------------------------------

  /**
   * Merges the content of `input` into the tree. The stream is left open.
   */
  async readStream(input: Readable, reader?: ConfigurationReader): Promise<void> {
    const activeReader = reader ?? (await this.getReader());

    await this.treeLock.withMutex(async () => {
      const loader = new ConfigurationLoader(this.root, event => this.listeners.notify(event));
      await activeReader.read(input, loader);
      logger.debug(`Read ${this.name}: ${loader.getChangedCount()} variables changed`);
    }, { operationName: 'read' });
  }

  /**
   * Reads from a stream opened on the configured source, then closes it
   */
  async read(reader?: ConfigurationReader): Promise<void> {
    const source = await this.requireSource('read');
    const input = await source.getInputStream();
    try {
      await this.readStream(input, reader);
    } finally {
      this.closeQuietly(input);
    }
  }

  // - Writing -----------------------------------------------------------------

  /**
   * Serializes the tree to `output`. The stream is left open.
   */
  async writeStream(output: Writable, writer?: ConfigurationWriter): Promise<void> {
    const activeWriter = writer ?? (await this.getWriter());
    activeWriter.setOutputStream(output);
    await this.build(activeWriter);
  }

  /**
   * Writes to a stream opened on the configured source, then closes it.
   * Resolves once the data has been flushed.
   */
  async write(writer?: ConfigurationWriter): Promise<void> {
    const source = await this.requireSource('write');
    const output = await source.getOutputStream();
    try {
      await this.writeStream(output, writer);
    } catch (error) {
      this.closeQuietly(output);
      throw error;
    }
    output.end();
    await finished(output);
    logger.debug(`Wrote ${this.name}`);
  }

  // - Building ----------------------------------------------------------------

  /**
   * Replays the tree as builder calls, depth first. Variables of a section
   * come before its subsections; empty sections are skipped.
   */
  async build(builder: ConfigurationBuilder): Promise<void> {
    await this.treeLock.withMutex(async () => {
      await builder.startConfiguration();
      await this.buildSection(builder, this.root);
      await builder.endConfiguration();
    }, { operationName: 'build' });
  }

  private async buildSection(builder: ConfigurationBuilder, section: ConfigurationSection): Promise<void> {
    for (const name of section.variableNames()) {
      const value = section.getVariable(name);
      if (value !== undefined) {
        await builder.addVariable(name, value);
      }
    }

    for (const name of section.sectionNames()) {
      const child = section.getSection(name);
      if (child && !child.isEmpty()) {
        await builder.startSection(name);
        await this.buildSection(builder, child);
        await builder.endSection(name);
      }
    }
  }

  /**
   * Every set variable keyed by its fully qualified name
   */
  async toRecord(): Promise<Record<string, string>> {
    const collector = new VariableCollector();
    await this.build(collector);
    return Object.fromEntries(collector.variables);
  }

  // - Variable setting --------------------------------------------------------

  /**
   * Sets a variable, creating missing sections.
   * Returns true and notifies listeners when the value changed.
   */
  async setVariable(name: string, value: string): Promise<boolean> {
    return this.treeLock.withMutex(() => {
      const explorer = new ConfigurationExplorer(this.root);
      const variable = moveToParent(explorer, name, true);

      if (explorer.getSection().setVariable(variable, value)) {
        this.listeners.notify(new ConfigurationEvent(name, value));
        return true;
      }
      return false;
    }, { operationName: 'setVariable' });
  }

  async setIntegerVariable(name: string, value: number): Promise<boolean> {
    return this.setVariable(name, formatInteger(value));
  }

  async setLongVariable(name: string, value: bigint): Promise<boolean> {
    return this.setVariable(name, formatLong(value));
  }

  async setFloatVariable(name: string, value: number): Promise<boolean> {
    return this.setVariable(name, formatFloat(value));
  }

  async setDoubleVariable(name: string, value: number): Promise<boolean> {
    return this.setVariable(name, formatDouble(value));
  }

  async setBooleanVariable(name: string, value: boolean): Promise<boolean> {
    return this.setVariable(name, formatBoolean(value));
  }

  /**
   * Moves a value from one name to another.
   *
   * When `fromName` is unset the destination is removed, mirroring
   * `set(to, remove(from))`. Returns the moved value.
   */
  async renameVariable(fromName: string, toName: string): Promise<string | undefined> {
    const value = await this.removeVariable(fromName);
    if (value === undefined) {
      await this.removeVariable(toName);
    } else {
      await this.setVariable(toName, value);
    }
    return value;
  }

  // - Variable retrieval ------------------------------------------------------

  /**
   * Without a default: the value, or undefined when unset (no sections are created).
   * With a default: an unset variable is set to `defaultValue` first.
   */
  async getVariable(name: string): Promise<string | undefined>;
  async getVariable(name: string, defaultValue: string): Promise<string>;
  async getVariable(name: string, defaultValue?: string): Promise<string | undefined> {
    if (defaultValue === undefined) {
      return this.treeLock.withMutex(() => this.lookup(name), { operationName: 'getVariable' });
    }

    return this.treeLock.withMutex(() => {
      const explorer = new ConfigurationExplorer(this.root);
      const variable = moveToParent(explorer, name, true);
      const value = explorer.getSection().getVariable(variable);

      if (value === undefined) {
        explorer.getSection().setVariable(variable, defaultValue);
        this.listeners.notify(new ConfigurationEvent(name, defaultValue));
        return defaultValue;
      }
      return value;
    }, { operationName: 'getVariableWithDefault' });
  }

  async getIntegerVariable(name: string, defaultValue?: number): Promise<number> {
    return parseInteger(await this.getTyped(name, defaultValue === undefined ? undefined : formatInteger(defaultValue)));
  }

  async getLongVariable(name: string, defaultValue?: bigint): Promise<bigint> {
    return parseLong(await this.getTyped(name, defaultValue === undefined ? undefined : formatLong(defaultValue)));
  }

  async getFloatVariable(name: string, defaultValue?: number): Promise<number> {
    return parseFloat32(await this.getTyped(name, defaultValue === undefined ? undefined : formatFloat(defaultValue)));
  }

  async getDoubleVariable(name: string, defaultValue?: number): Promise<number> {
    return parseDouble(await this.getTyped(name, defaultValue === undefined ? undefined : formatDouble(defaultValue)));
  }

  async getBooleanVariable(name: string, defaultValue?: boolean): Promise<boolean> {
    return parseBoolean(await this.getTyped(name, defaultValue === undefined ? undefined : formatBoolean(defaultValue)));
  }

  async isVariableSet(name: string): Promise<boolean> {
    return (await this.getVariable(name)) !== undefined;
  }

  // - Variable removal --------------------------------------------------------

  /**
   * Removes a variable and returns its previous value.
   * Sections on the path are kept, even when left empty.
   */
  async removeVariable(name: string): Promise<string | undefined> {
    return this.treeLock.withMutex(() => {
      const explorer = new ConfigurationExplorer(this.root);
      const variable = moveToParent(explorer, name, false);
      if (variable === undefined) {
        return undefined;
      }

      const previous = explorer.getSection().removeVariable(variable);
      if (previous !== undefined) {
        this.listeners.notify(new ConfigurationEvent(name, undefined));
      }
      return previous;
    }, { operationName: 'removeVariable' });
  }

  async removeIntegerVariable(name: string): Promise<number> {
    return parseInteger(await this.removeVariable(name));
  }

  async removeLongVariable(name: string): Promise<bigint> {
    return parseLong(await this.removeVariable(name));
  }

  async removeFloatVariable(name: string): Promise<number> {
    return parseFloat32(await this.removeVariable(name));
  }

  async removeDoubleVariable(name: string): Promise<number> {
    return parseDouble(await this.removeVariable(name));
  }

  async removeBooleanVariable(name: string): Promise<boolean> {
    return parseBoolean(await this.removeVariable(name));
  }

  // - Tree access -------------------------------------------------------------

  /**
   * Root section, for read access. Changes made directly on sections bypass
   * locking and listeners.
   */
  getRoot(): ConfigurationSection {
    return this.root;
  }

  // - Listeners ---------------------------------------------------------------

  /**
   * Registers a listener. It is held weakly: keep a reference for as long as
   * it should receive events.
   */
  addConfigurationListener(listener: ConfigurationListener): void {
    this.listeners.add(listener);
  }

  removeConfigurationListener(listener: ConfigurationListener): boolean {
    return this.listeners.remove(listener);
  }

  getListenerRegistry(): ConfigurationListenerRegistry {
    return this.listeners;
  }

  getTreeLockStatistics(): MutexStatistics {
    return this.treeLock.getStatistics();
  }

  // - Helpers -----------------------------------------------------------------

  private lookup(name: string): string | undefined {
    const explorer = new ConfigurationExplorer(this.root);
    const variable = moveToParent(explorer, name, false);
    return variable === undefined ? undefined : explorer.getSection().getVariable(variable);
  }

  private async getTyped(name: string, defaultText: string | undefined): Promise<string | undefined> {
    return defaultText === undefined ? this.getVariable(name) : this.getVariable(name, defaultText);
  }

  private async requireSource(operation: 'read' | 'write'): Promise<ConfigurationSource> {
    const source = await this.getSource();
    if (!source) {
      throw new ConfigurationSourceError(`Cannot ${operation} ${this.name}: no configuration source set`);
    }
    return source;
  }

  private closeQuietly(stream: Readable | Writable): void {
    try {
      stream.destroy();
    } catch (error) {
      logger.warn(`Ignoring failure while closing ${this.name} stream:`, error);
    }
  }
}

/**
 * Flattens builder calls into fully qualified name/value pairs
 */
class VariableCollector implements ConfigurationBuilder {
  readonly variables = new Map<string, string>();
  private path: string[] = [];

  startConfiguration(): void {
    this.path = [];
  }

  endConfiguration(): void {}

  startSection(name: string): void {
    this.path.push(name);
  }

  endSection(): void {
    this.path.pop();
  }

  addVariable(name: string, value: string): void {
    this.variables.set([...this.path, name].join('.'), value);
  }
}
