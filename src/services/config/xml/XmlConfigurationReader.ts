import type { Readable } from 'stream';
import { text } from 'stream/consumers';
import {
  ConfigurationBuilder,
  ConfigurationFormatError,
  ConfigurationReader
} from '../../interfaces/ConfigurationInterfaces';
import { resolveEntity } from './xmlSyntax';

export interface XmlElementNode {
  name: string;
  children: XmlElementNode[];
  text: string;
  /** Offset of the start tag, for error positions */
  offset: number;
}

const START_TAG = /<([^\s<>/=&"'!?]+)((?:\s+[^\s<>/=]+\s*=\s*(?:"[^"]*"|'[^']*'))*)\s*(\/?)>/y;
const END_TAG = /<\/([^\s<>/=&"'!?]+)\s*>/y;

/**
 * Parses the XML tree format and replays it as builder calls.
 *
 * The whole document is parsed before the first builder call, so a syntax
 * error never leaves a partially applied configuration behind.
 */
export class XmlConfigurationReader implements ConfigurationReader {
  private source = '';
  private position = 0;

  async read(input: Readable, builder: ConfigurationBuilder): Promise<void> {
    const root = this.parse(await text(input));

    await builder.startConfiguration();
    await this.emitChildren(root, builder);
    await builder.endConfiguration();
  }

  /**
   * Parses a complete document and returns its root element
   */
  parse(document: string): XmlElementNode {
    this.source = document.charCodeAt(0) === 0xfeff ? document.slice(1) : document;
    this.position = 0;

    this.skipMisc();
    if (this.position >= this.source.length) {
      throw this.error('Document has no root element', this.position);
    }
    const root = this.parseElement();
    this.skipMisc();
    if (this.position < this.source.length) {
      throw this.error('Unexpected content after the root element', this.position);
    }
    return root;
  }

  private async emitChildren(element: XmlElementNode, builder: ConfigurationBuilder): Promise<void> {
    for (const child of element.children) {
      if (child.children.length > 0) {
        await builder.startSection(child.name);
        await this.emitChildren(child, builder);
        await builder.endSection(child.name);
      } else {
        await builder.addVariable(child.name, child.text);
      }
    }
  }

  private parseElement(): XmlElementNode {
    const offset = this.position;
    START_TAG.lastIndex = offset;
    const start = START_TAG.exec(this.source);
    if (!start) {
      throw this.error('Malformed start tag', offset);
    }
    this.position = START_TAG.lastIndex;

    const element: XmlElementNode = { name: start[1], children: [], text: '', offset };
    if (start[3] === '/') {
      return element;
    }

    let textContent = '';
    for (;;) {
      if (this.position >= this.source.length) {
        throw this.error(`Element <${element.name}> is never closed`, offset);
      }

      const next = this.source.indexOf('<', this.position);
      if (next === -1) {
        throw this.error(`Element <${element.name}> is never closed`, offset);
      }
      textContent += this.decodeText(this.position, next);
      this.position = next;

      if (this.source.startsWith('</', next)) {
        this.parseEndTag(element);
        break;
      }
      if (this.source.startsWith('<!--', next)) {
        this.skipPast('-->', 'Unterminated comment');
      } else if (this.source.startsWith('<![CDATA[', next)) {
        const end = this.source.indexOf(']]>', next + 9);
        if (end === -1) {
          throw this.error('Unterminated CDATA section', next);
        }
        textContent += this.source.slice(next + 9, end);
        this.position = end + 3;
      } else if (this.source.startsWith('<?', next)) {
        this.skipPast('?>', 'Unterminated processing instruction');
      } else {
        element.children.push(this.parseElement());
      }
    }

    if (element.children.length > 0) {
      if (textContent.trim().length > 0) {
        throw this.error(`Element <${element.name}> mixes text and child elements`, offset);
      }
    } else {
      element.text = textContent;
    }
    return element;
  }

  private parseEndTag(element: XmlElementNode): void {
    const offset = this.position;
    END_TAG.lastIndex = offset;
    const end = END_TAG.exec(this.source);
    if (!end) {
      throw this.error('Malformed end tag', offset);
    }
    if (end[1] !== element.name) {
      throw this.error(`Expected </${element.name}> but found </${end[1]}>`, offset);
    }
    this.position = END_TAG.lastIndex;
  }

  /**
   * Skips whitespace, comments, processing instructions and doctype outside the root
   */
  private skipMisc(): void {
    for (;;) {
      while (this.position < this.source.length && /\s/.test(this.source[this.position])) {
        this.position++;
      }
      if (this.source.startsWith('<?', this.position)) {
        this.skipPast('?>', 'Unterminated processing instruction');
      } else if (this.source.startsWith('<!--', this.position)) {
        this.skipPast('-->', 'Unterminated comment');
      } else if (this.source.startsWith('<!DOCTYPE', this.position)) {
        this.skipPast('>', 'Unterminated doctype');
      } else {
        return;
      }
    }
  }

  private skipPast(terminator: string, message: string): void {
    const end = this.source.indexOf(terminator, this.position);
    if (end === -1) {
      throw this.error(message, this.position);
    }
    this.position = end + terminator.length;
  }

  private decodeText(from: number, to: number): string {
    const raw = this.source.slice(from, to);
    return raw.replace(/&([^;\s&]*);?/g, (match, entity: string, index: number) => {
      const resolved = match.endsWith(';') ? resolveEntity(entity) : undefined;
      if (resolved === undefined) {
        throw this.error(`Invalid entity reference "${match}"`, from + index);
      }
      return resolved;
    });
  }

  private error(message: string, offset: number): ConfigurationFormatError {
    const before = this.source.slice(0, offset);
    const lines = before.split('\n');
    return new ConfigurationFormatError(message, lines.length, lines[lines.length - 1].length + 1);
  }
}
