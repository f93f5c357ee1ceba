import { once } from 'events';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import type { ConfigurationSource } from '../interfaces/ConfigurationInterfaces';

let tempCounter = 0;

/**
 * Writes to a temporary file beside the target and moves it into place when
 * the stream finishes. Destroying the stream removes the temporary file and
 * leaves the target as it was.
 */
class ReplacingFileStream extends Writable {
  constructor(
    private readonly target: string,
    private readonly tempPath: string,
    private readonly temp: fs.WriteStream
  ) {
    super();
    temp.on('error', error => this.destroy(error));
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.temp.write(chunk, callback);
  }

  _final(callback: (error?: Error | null) => void): void {
    this.temp.end();
    finished(this.temp)
      .then(() => fs.move(this.tempPath, this.target, { overwrite: true }))
      .then(() => callback(), callback);
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.temp.destroy();
    fs.remove(this.tempPath).then(
      () => callback(error),
      () => callback(error)
    );
  }
}

/**
 * Configuration source backed by a file on disk.
 * Streams are only returned once the file is open, so open failures
 * (missing file, permissions) reject here rather than later.
 */
export class FileConfigurationSource implements ConfigurationSource {
  constructor(private readonly filePath: string) {}

  getPath(): string {
    return this.filePath;
  }

  async exists(): Promise<boolean> {
    return fs.pathExists(this.filePath);
  }

  async getInputStream(): Promise<Readable> {
    const stream = fs.createReadStream(this.filePath, { encoding: 'utf8' });
    await once(stream, 'open');
    return stream;
  }

  /**
   * The file is only replaced once everything has been written; a write that
   * fails or is destroyed half way keeps the previous content.
   */
  async getOutputStream(): Promise<Writable> {
    await fs.ensureDir(path.dirname(this.filePath));
    const tempPath = `${this.filePath}.${process.pid}.${++tempCounter}.tmp`;
    const temp = fs.createWriteStream(tempPath);
    await once(temp, 'open');
    return new ReplacingFileStream(this.filePath, tempPath, temp);
  }
}
