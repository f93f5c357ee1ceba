import {
  ConfigurationBuilder,
  StructuralError
} from '../interfaces/ConfigurationInterfaces';
import { ConfigurationEvent } from './ConfigurationEvent';
import { ConfigurationSection } from './ConfigurationSection';

interface OpenSection {
  name: string;
  /** Dotted prefix of variables declared inside, e.g. `ui.theme.` */
  prefix: string;
  parent: ConfigurationSection;
}

/**
 * ConfigurationLoader - Rebuilds a configuration tree from builder calls
 *
 * Used by `Configuration.read`: a reader parses its stream and drives this
 * builder, which merges what it receives into the existing tree and reports
 * every effective change through `onChange`.
 */
export class ConfigurationLoader implements ConfigurationBuilder {
  private stack: OpenSection[] = [];
  private currentSection: ConfigurationSection;
  private started = false;
  private variableCount = 0;

  constructor(
    private root: ConfigurationSection,
    private onChange: (event: ConfigurationEvent) => void
  ) {
    this.currentSection = root;
  }

  startConfiguration(): void {
    this.stack = [];
    this.currentSection = this.root;
    this.started = true;
  }

  endConfiguration(): void {
    if (this.stack.length > 0) {
      throw new StructuralError('Not all sections have been closed.', {
        openSections: this.stack.map(section => section.name)
      });
    }
    this.started = false;
  }

  startSection(name: string): void {
    this.assertStarted('startSection');
    const parentPrefix = this.stack.length > 0 ? this.stack[this.stack.length - 1].prefix : '';
    this.stack.push({ name, prefix: `${parentPrefix}${name}.`, parent: this.currentSection });
    this.currentSection = this.currentSection.addSection(name);
  }

  endSection(name: string): void {
    const open = this.stack.pop();
    if (!open) {
      throw new StructuralError(`Section ${name} was already closed.`, { section: name });
    }
    if (open.parent.getSection(name) !== this.currentSection) {
      throw new StructuralError(`Section ${name} is not the currently opened section.`, {
        section: name,
        openSection: open.name
      });
    }
    this.currentSection = open.parent;
  }

  addVariable(name: string, value: string): void {
    this.assertStarted('addVariable');
    if (this.currentSection.setVariable(name, value)) {
      const prefix = this.stack.length > 0 ? this.stack[this.stack.length - 1].prefix : '';
      this.variableCount++;
      this.onChange(new ConfigurationEvent(`${prefix}${name}`, value));
    }
  }

  /** Number of variables whose value changed during this load */
  getChangedCount(): number {
    return this.variableCount;
  }

  private assertStarted(operation: string): void {
    if (!this.started) {
      throw new StructuralError(`${operation} called outside of startConfiguration/endConfiguration.`);
    }
  }
}
