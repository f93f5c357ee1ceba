#!/usr/bin/env node
/**
 * Command-line access to configuration files
 *
 *   tree-conf get <file> <name>
 *   tree-conf set <file> <name> <value>
 *   tree-conf remove <file> <name>
 *   tree-conf list <file>
 */

import { Command, CommanderError } from 'commander';
import { Configuration } from './services/config/Configuration';
import { FileConfigurationSource } from './services/config/FileConfigurationSource';
import { logger } from './utils/logger';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(`${text}\n`),
  stderr: text => process.stderr.write(`${text}\n`)
};

class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

async function openFile(file: string): Promise<Configuration> {
  const source = new FileConfigurationSource(file);
  const configuration = new Configuration({ name: file, source });
  if (await source.exists()) {
    await configuration.read();
  }
  return configuration;
}

/**
 * Builds the command tree. Commander errors are thrown as CommanderError
 * instead of exiting; subcommands inherit that from the program.
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout(text.trimEnd()),
      writeErr: text => io.stderr(text.trimEnd())
    })
    .name('tree-conf')
    .description('Read and edit hierarchical configuration files')
    .version('1.0.0');

  program
    .command('get')
    .description('Print the value of a variable')
    .argument('<file>', 'configuration file')
    .argument('<name>', 'fully qualified variable name, e.g. ui.theme.color')
    .action(async (file: string, name: string) => {
      const configuration = await openFile(file);
      const value = await configuration.getVariable(name);
      if (value === undefined) {
        throw new CliError(`${name} is not set`);
      }
      io.stdout(value);
    });

  program
    .command('set')
    .description('Set a variable, creating the file when needed')
    .argument('<file>', 'configuration file')
    .argument('<name>', 'fully qualified variable name')
    .argument('<value>', 'new value')
    .action(async (file: string, name: string, value: string) => {
      const configuration = await openFile(file);
      if (await configuration.setVariable(name, value)) {
        await configuration.write();
      }
    });

  program
    .command('remove')
    .description('Remove a variable')
    .argument('<file>', 'configuration file')
    .argument('<name>', 'fully qualified variable name')
    .action(async (file: string, name: string) => {
      const configuration = await openFile(file);
      if ((await configuration.removeVariable(name)) === undefined) {
        throw new CliError(`${name} is not set`);
      }
      await configuration.write();
    });

  program
    .command('list')
    .description('Print every variable as name=value')
    .argument('<file>', 'configuration file')
    .action(async (file: string) => {
      const configuration = await openFile(file);
      const variables = await configuration.toRecord();
      for (const name of Object.keys(variables).sort()) {
        io.stdout(`${name}=${variables[name]}`);
      }
    });

  return program;
}

/**
 * Runs the tool and resolves with the process exit code
 */
export async function run(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('tree-conf failed:', error);
      process.exitCode = 1;
    });
}
