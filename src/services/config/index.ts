/**
 * Configuration Module Index
 *
 * Exports all configuration management components
 */

export { Configuration } from './Configuration';
export type { ConfigurationOptions } from './Configuration';
export { ConfigurationSection } from './ConfigurationSection';
export { ConfigurationExplorer, moveToParent, splitVariableName } from './ConfigurationExplorer';
export { ConfigurationEvent } from './ConfigurationEvent';
export { ConfigurationListenerRegistry, sharedListenerRegistry } from './ConfigurationListenerRegistry';
export { ConfigurationLoader } from './ConfigurationLoader';
export { ConfigurationAuditor } from './ConfigurationAuditor';
export type { ConfigurationAuditorOptions } from './ConfigurationAuditor';
export { ConfigurationManager } from './ConfigurationManager';
export { FileConfigurationSource } from './FileConfigurationSource';
export { applyEnvironmentOverrides } from './EnvironmentOverrides';
export type { EnvironmentOverrideOptions } from './EnvironmentOverrides';
export { XmlConfigurationReader } from './xml/XmlConfigurationReader';
export { XmlConfigurationWriter } from './xml/XmlConfigurationWriter';
export type { XmlWriterOptions } from './xml/XmlConfigurationWriter';
export * from './ConfigurationValues';

// Re-export interfaces for convenience
export type {
  Awaitable,
  ConfigurationBuilder,
  ConfigurationReader,
  ConfigurationWriter,
  ConfigurationReaderFactory,
  ConfigurationWriterFactory,
  ConfigurationSource,
  ConfigurationListener,
  ConfigurationChange,
  ConfigurationChangeType,
  ConfigurationManagerOptions,
  IConfigurationService,
  ReloadOrigin,
  ValueType
} from '../interfaces/ConfigurationInterfaces';
export {
  ConfigurationError,
  StructuralError,
  ConversionError,
  ConfigurationFormatError,
  ConfigurationSourceError
} from '../interfaces/ConfigurationInterfaces';
