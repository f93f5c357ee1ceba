import { config as loadDotEnv } from 'dotenv';
import { logger } from '../../utils/logger';
import type { Configuration } from './Configuration';

export interface EnvironmentOverrideOptions {
  /** Load `.env` into process.env first (default: true) */
  loadDotEnv?: boolean;
  /** Path of the `.env` file (default: dotenv's lookup in the working directory) */
  dotEnvPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Copies environment variables into the configuration.
 *
 * `mappings` maps an environment variable to the dotted name it overrides,
 * e.g. `{ APP_THEME_COLOR: 'ui.theme.color' }`. Only variables present in the
 * environment are applied. Returns the dotted names whose value changed.
 */
export async function applyEnvironmentOverrides(
  configuration: Configuration,
  mappings: Record<string, string>,
  options: EnvironmentOverrideOptions = {}
): Promise<string[]> {
  if (options.loadDotEnv ?? true) {
    const result = loadDotEnv(options.dotEnvPath ? { path: options.dotEnvPath } : undefined);
    if (result.error) {
      logger.debug(`No .env file loaded: ${result.error.message}`);
    }
  }

  const env = options.env ?? process.env;
  const applied: string[] = [];

  for (const [envVar, name] of Object.entries(mappings)) {
    const value = env[envVar];
    if (value === undefined) {
      continue;
    }
    if (await configuration.setVariable(name, value)) {
      applied.push(name);
    }
  }

  if (applied.length > 0) {
    logger.info(`Applied ${applied.length} environment overrides: ${applied.join(', ')}`);
  }
  return applied;
}
