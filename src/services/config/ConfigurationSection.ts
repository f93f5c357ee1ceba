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

/**
 * ConfigurationSection - Node of the configuration tree
 *
 * Holds string variables and named child sections. Children are only ever
 * created by `addSection`, so the structure stays a tree.
 */
export class ConfigurationSection {
  private variables = new Map<string, string>();
  private sections = new Map<string, ConfigurationSection>();

  // - Variables ---------------------------------------------------------------

  /**
   * Sets a variable, returning true when the stored value changed
   */
  setVariable(name: string, value: string): boolean {
    if (this.variables.get(name) === value) {
      return false;
    }
    this.variables.set(name, value);
    return true;
  }

  getVariable(name: string): string | undefined {
    return this.variables.get(name);
  }

  /**
   * Removes a variable and returns its previous value
   */
  removeVariable(name: string): string | undefined {
    const previous = this.variables.get(name);
    this.variables.delete(name);
    return previous;
  }

  hasVariables(): boolean {
    return this.variables.size > 0;
  }

  /**
   * Snapshot of the current variable names
   */
  variableNames(): string[] {
    return Array.from(this.variables.keys());
  }

  // - Typed variables ---------------------------------------------------------

  setIntegerVariable(name: string, value: number): boolean {
    return this.setVariable(name, formatInteger(value));
  }

  setLongVariable(name: string, value: bigint): boolean {
    return this.setVariable(name, formatLong(value));
  }

  setFloatVariable(name: string, value: number): boolean {
    return this.setVariable(name, formatFloat(value));
  }

  setDoubleVariable(name: string, value: number): boolean {
    return this.setVariable(name, formatDouble(value));
  }

  setBooleanVariable(name: string, value: boolean): boolean {
    return this.setVariable(name, formatBoolean(value));
  }

  getIntegerVariable(name: string): number {
    return parseInteger(this.getVariable(name));
  }

  getLongVariable(name: string): bigint {
    return parseLong(this.getVariable(name));
  }

  getFloatVariable(name: string): number {
    return parseFloat32(this.getVariable(name));
  }

  getDoubleVariable(name: string): number {
    return parseDouble(this.getVariable(name));
  }

  getBooleanVariable(name: string): boolean {
    return parseBoolean(this.getVariable(name));
  }

  // - Sections ----------------------------------------------------------------

  /**
   * Returns the named child, creating an empty one when missing
   */
  addSection(name: string): ConfigurationSection {
    let section = this.sections.get(name);
    if (!section) {
      section = new ConfigurationSection();
      this.sections.set(name, section);
    }
    return section;
  }

  getSection(name: string): ConfigurationSection | undefined {
    return this.sections.get(name);
  }

  /**
   * Detaches a child section and returns it
   */
  removeSection(name: string): ConfigurationSection | undefined {
    const section = this.sections.get(name);
    this.sections.delete(name);
    return section;
  }

  hasSections(): boolean {
    return this.sections.size > 0;
  }

  /**
   * Snapshot of the current child section names
   */
  sectionNames(): string[] {
    return Array.from(this.sections.keys());
  }

  /**
   * True when the section holds nothing worth serializing
   */
  isEmpty(): boolean {
    return !this.hasVariables() && !this.hasSections();
  }
}
