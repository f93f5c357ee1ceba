import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs-extra';
import * as path from 'path';
import type { Readable, Writable } from 'stream';
import { text } from 'stream/consumers';
import { Configuration } from '../../src/services/config/Configuration';
import { FileConfigurationSource } from '../../src/services/config/FileConfigurationSource';
import type {
  ConfigurationBuilder,
  ConfigurationReader,
  ConfigurationWriter
} from '../../src/services/interfaces/ConfigurationInterfaces';
import {
  ConfigurationError,
  ConfigurationFormatError
} from '../../src/services/interfaces/ConfigurationInterfaces';
import { cleanupTestFiles, createTempDir, RecordingListener } from '../test-utils';

/**
 * Flat `name=value` lines, root variables only
 */
class LineReader implements ConfigurationReader {
  async read(input: Readable, builder: ConfigurationBuilder): Promise<void> {
    const content = await text(input);
    await builder.startConfiguration();
    for (const line of content.split('\n')) {
      const separator = line.indexOf('=');
      if (separator > 0) {
        await builder.addVariable(line.slice(0, separator), line.slice(separator + 1));
      }
    }
    await builder.endConfiguration();
  }
}

class LineWriter implements ConfigurationWriter {
  private output?: Writable;
  private depth = 0;

  setOutputStream(output: Writable): void {
    this.output = output;
  }

  startConfiguration(): void {
    this.depth = 0;
  }

  endConfiguration(): void {}

  startSection(): void {
    this.depth++;
  }

  endSection(): void {
    this.depth--;
  }

  addVariable(name: string, value: string): void {
    if (this.depth === 0) {
      this.output?.write(`${name}=${value}\n`);
    }
  }
}

describe('Configuration persistence', () => {
  let testDir: string;
  let filePath: string;

  beforeEach(async () => {
    testDir = await createTempDir();
    filePath = path.join(testDir, 'nested', 'prefs.xml');
  });

  afterEach(async () => {
    await cleanupTestFiles(testDir);
  });

  it('should save to a file and load it into another configuration', async () => {
    const saved = new Configuration({ source: new FileConfigurationSource(filePath) });
    await saved.setVariable('ui.theme.color', 'blue');
    await saved.setIntegerVariable('window.width', 1024);
    await saved.setBooleanVariable('window.maximized', true);

    await saved.write();

    const loaded = new Configuration({ source: new FileConfigurationSource(filePath) });
    await loaded.read();
    expect(await loaded.toRecord()).toEqual({
      'ui.theme.color': 'blue',
      'window.width': '1024',
      'window.maximized': 'true'
    });
    expect(await loaded.getIntegerVariable('window.width')).toBe(1024);
  });

  it('should write the XML document to disk', async () => {
    const configuration = new Configuration({ source: new FileConfigurationSource(filePath) });
    await configuration.setVariable('ui.font', 'mono');

    await configuration.write();

    expect(await fs.readFile(filePath, 'utf8')).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n<prefs>\n  <ui>\n    <font>mono</font>\n  </ui>\n</prefs>\n'
    );
  });

  it('should not save an emptied section as a variable', async () => {
    const configuration = new Configuration({ source: new FileConfigurationSource(filePath) });
    await configuration.setVariable('a.b.c', '1');
    await configuration.removeVariable('a.b.c');

    await configuration.write();

    expect(await fs.readFile(filePath, 'utf8')).toBe('<?xml version="1.0" encoding="UTF-8"?>\n<prefs>\n</prefs>\n');
    const loaded = new Configuration({ source: new FileConfigurationSource(filePath) });
    await loaded.read();
    expect(Object.entries(await loaded.toRecord())).toEqual([]);
  });

  it('should keep the previous file when a write fails', async () => {
    const configuration = new Configuration({ source: new FileConfigurationSource(filePath) });
    await configuration.setVariable('ui.color', 'blue');
    await configuration.write();
    const saved = await fs.readFile(filePath, 'utf8');

    await configuration.setVariable('ui.window size', 'wide');
    await expect(configuration.write()).rejects.toThrow(ConfigurationError);

    expect(await fs.readFile(filePath, 'utf8')).toBe(saved);
    const loaded = new Configuration({ source: new FileConfigurationSource(filePath) });
    await loaded.read();
    expect(await loaded.toRecord()).toEqual({ 'ui.color': 'blue' });
  });

  it('should merge a read into the existing tree and notify only the changes', async () => {
    await fs.outputFile(
      filePath,
      '<prefs><ui><font>mono</font><color>red</color></ui></prefs>'
    );
    const configuration = new Configuration({ source: new FileConfigurationSource(filePath) });
    await configuration.setVariable('ui.font', 'mono');
    await configuration.setVariable('ui.size', '12');
    const listener = new RecordingListener();
    configuration.addConfigurationListener(listener);

    await configuration.read();

    expect(listener.events.map(event => [event.name, event.value])).toEqual([['ui.color', 'red']]);
    expect(await configuration.toRecord()).toEqual({
      'ui.font': 'mono',
      'ui.size': '12',
      'ui.color': 'red'
    });
  });

  it('should leave the tree untouched when the file is malformed', async () => {
    await fs.outputFile(filePath, '<prefs><ui><font>mono</font></prefs>');
    const configuration = new Configuration({ source: new FileConfigurationSource(filePath) });
    await configuration.setVariable('ui.font', 'serif');

    await expect(configuration.read()).rejects.toThrow(ConfigurationFormatError);
    expect(await configuration.getVariable('ui.font')).toBe('serif');
  });

  it('should reject reading a file that does not exist', async () => {
    const configuration = new Configuration({ source: new FileConfigurationSource(filePath) });

    await expect(configuration.read()).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should use the configured reader and writer factories', async () => {
    const configuration = new Configuration({ source: new FileConfigurationSource(filePath) });
    await configuration.setReaderFactory({ getReaderInstance: () => new LineReader() });
    await configuration.setWriterFactory({ getWriterInstance: () => new LineWriter() });
    await configuration.setVariable('name', 'tree');
    await configuration.setVariable('ui.font', 'mono');

    await configuration.write();
    expect(await fs.readFile(filePath, 'utf8')).toBe('name=tree\n');

    await fs.outputFile(filePath, 'name=forest\nversion=3\n');
    await configuration.read();
    expect(await configuration.toRecord()).toEqual({
      name: 'forest',
      version: '3',
      'ui.font': 'mono'
    });
  });

  it('should prefer an explicit reader over the factory', async () => {
    await fs.outputFile(filePath, 'name=tree\n');
    const configuration = new Configuration({
      source: new FileConfigurationSource(filePath),
      readerFactory: { getReaderInstance: () => new LineReader() }
    });

    await configuration.setReaderFactory(undefined);
    await configuration.read(new LineReader());

    expect(await configuration.getVariable('name')).toBe('tree');
  });
});
