/**
 * Configuration Service Interface Definitions
 *
 * Contracts between the configuration tree, its serialization formats
 * and the code that listens to it.
 */

import type { Readable, Writable } from 'stream';
import type { IService } from './CoreServiceInterfaces';
import type { ConfigurationEvent } from '../config/ConfigurationEvent';

export type Awaitable<T> = T | Promise<T>;

// ============================================================================
// Builder Protocol
// ============================================================================

/**
 * Push-style visitor used both to serialize a tree (writers) and to rebuild
 * one while parsing (the tree loader).
 *
 * Calls arrive in document order: `startConfiguration`, any number of
 * `addVariable` / balanced `startSection`..`endSection`, then
 * `endConfiguration`. Implementations may be asynchronous; callers await each
 * call before issuing the next one.
 */
export interface ConfigurationBuilder {
  startConfiguration(): Awaitable<void>;

  /**
   * @throws {StructuralError} If sections are still open
   */
  endConfiguration(): Awaitable<void>;

  startSection(name: string): Awaitable<void>;

  /**
   * @throws {StructuralError} If `name` is not the innermost open section
   */
  endSection(name: string): Awaitable<void>;

  addVariable(name: string, value: string): Awaitable<void>;
}

/**
 * Parses a stream and replays its content as builder calls
 */
export interface ConfigurationReader {
  read(input: Readable, builder: ConfigurationBuilder): Promise<void>;
}

/**
 * Builder that serializes what it receives to an output stream
 */
export interface ConfigurationWriter extends ConfigurationBuilder {
  setOutputStream(output: Writable): void;
}

export interface ConfigurationReaderFactory {
  getReaderInstance(): ConfigurationReader;
}

export interface ConfigurationWriterFactory {
  getWriterInstance(): ConfigurationWriter;
}

/**
 * Where a configuration is loaded from and saved to.
 * Each call opens a fresh stream; the caller closes it.
 */
export interface ConfigurationSource {
  getInputStream(): Promise<Readable>;
  getOutputStream(): Promise<Writable>;
}

// ============================================================================
// Change Notification
// ============================================================================

export interface ConfigurationListener {
  /**
   * Called synchronously for every effective change.
   * Must not await operations on the configuration that fired the event.
   */
  configurationChanged(event: ConfigurationEvent): void;
}

export type ConfigurationChangeType = 'set' | 'remove';

export interface ConfigurationChange {
  timestamp: string;
  name: string;
  value?: string;
  changeType: ConfigurationChangeType;
}

// ============================================================================
// Typed Values
// ============================================================================

export type ValueType = 'integer' | 'long' | 'float' | 'double' | 'boolean';

// ============================================================================
// Manager Service
// ============================================================================

export type ReloadOrigin = 'file-watcher' | 'command' | 'api';

export interface ConfigurationManagerOptions {
  /** File the configuration is read from and written to */
  configPath: string;

  /** Reload the tree when the file changes on disk (default: false) */
  watch?: boolean;

  /** Environment variable → dotted variable name */
  environmentOverrides?: Record<string, string>;

  /** Load a `.env` file before applying overrides (default: true) */
  loadDotEnv?: boolean;

  /** Milliseconds the file must stay unchanged before a reload (default: 1000) */
  stabilityThreshold?: number;
}

export interface IConfigurationService extends IService {
  reloadConfiguration(origin?: ReloadOrigin): Promise<void>;
  saveConfiguration(): Promise<void>;

  on(event: 'config:reloaded', listener: (origin: ReloadOrigin) => void): this;
  on(event: 'config:saved', listener: (configPath: string) => void): this;
  on(event: 'config:error', listener: (error: Error) => void): this;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Base class for every error raised by the configuration engine
 */
export class ConfigurationError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = 'CONFIGURATION_ERROR',
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;
    this.context = context;
    this.timestamp = Date.now();

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack
    };
  }
}

/**
 * Malformed builder call sequence: unbalanced or misnamed sections
 */
export class StructuralError extends ConfigurationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STRUCTURAL_ERROR', context);
    this.name = 'StructuralError';
  }
}

/**
 * Stored text could not be parsed as the requested type
 */
export class ConversionError extends ConfigurationError {
  constructor(public readonly value: string, public readonly targetType: ValueType) {
    super(`Cannot convert "${value}" to ${targetType}`, 'CONVERSION_ERROR', { value, targetType });
    this.name = 'ConversionError';
  }
}

/**
 * Syntax error in a serialized configuration
 */
export class ConfigurationFormatError extends ConfigurationError {
  constructor(message: string, public readonly line: number, public readonly column: number) {
    super(`${message} (line ${line}, column ${column})`, 'FORMAT_ERROR', { line, column });
    this.name = 'ConfigurationFormatError';
  }
}

/**
 * A source-backed read or write was requested with no source configured
 */
export class ConfigurationSourceError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'SOURCE_ERROR');
    this.name = 'ConfigurationSourceError';
  }
}
