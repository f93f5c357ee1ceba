import type { Writable } from 'stream';
import {
  ConfigurationError,
  ConfigurationWriter
} from '../../interfaces/ConfigurationInterfaces';
import { DEFAULT_ROOT_ELEMENT, escapeXml, isValidElementName } from './xmlSyntax';

export interface XmlWriterOptions {
  rootElement?: string;
  /** Spaces per nesting level (default: 2) */
  indent?: number;
}

interface OpenSection {
  name: string;
  /** Whether the start tag has been written */
  written: boolean;
}

/**
 * Serializes builder calls as an indented XML document.
 * Sections become elements holding elements, variables become text elements.
 *
 * A start tag is held back until the section gets content, so a section with
 * nothing below it is not written at all. Written empty, it would read back as
 * a variable.
 */
export class XmlConfigurationWriter implements ConfigurationWriter {
  private output?: Writable;
  private sections: OpenSection[] = [];
  private readonly rootElement: string;
  private readonly indentUnit: string;

  constructor(options: XmlWriterOptions = {}) {
    this.rootElement = options.rootElement ?? DEFAULT_ROOT_ELEMENT;
    this.indentUnit = ' '.repeat(options.indent ?? 2);
  }

  setOutputStream(output: Writable): void {
    this.output = output;
  }

  async startConfiguration(): Promise<void> {
    this.sections = [];
    await this.write(`<?xml version="1.0" encoding="UTF-8"?>\n<${this.rootElement}>\n`);
  }

  async endConfiguration(): Promise<void> {
    await this.write(`</${this.rootElement}>\n`);
  }

  startSection(name: string): void {
    this.assertName(name);
    this.sections.push({ name, written: false });
  }

  async endSection(name: string): Promise<void> {
    const section = this.sections.pop();
    if (section?.written) {
      await this.write(`${this.indentation(this.sections.length + 1)}</${name}>\n`);
    }
  }

  async addVariable(name: string, value: string): Promise<void> {
    this.assertName(name);
    await this.writePendingStartTags();
    await this.write(`${this.indentation(this.sections.length + 1)}<${name}>${escapeXml(value)}</${name}>\n`);
  }

  private async writePendingStartTags(): Promise<void> {
    for (const [index, section] of this.sections.entries()) {
      if (!section.written) {
        await this.write(`${this.indentation(index + 1)}<${section.name}>\n`);
        section.written = true;
      }
    }
  }

  private indentation(depth: number): string {
    return this.indentUnit.repeat(depth);
  }

  private assertName(name: string): void {
    if (!isValidElementName(name)) {
      throw new ConfigurationError(`"${name}" cannot be written as an XML element name`, 'INVALID_NAME', { name });
    }
  }

  private write(text: string): Promise<void> {
    const output = this.output;
    if (!output) {
      return Promise.reject(new ConfigurationError('No output stream set on XML writer', 'NO_OUTPUT'));
    }
    return new Promise((resolve, reject) => {
      output.write(text, 'utf8', error => (error ? reject(error) : resolve()));
    });
  }
}
