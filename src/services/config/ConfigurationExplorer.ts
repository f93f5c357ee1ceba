import { ConfigurationSection } from './ConfigurationSection';

/**
 * Cursor that walks down a configuration tree one section at a time.
 * Lives for a single path resolution.
 */
export class ConfigurationExplorer {
  private section: ConfigurationSection;

  constructor(root: ConfigurationSection) {
    this.section = root;
  }

  getSection(): ConfigurationSection {
    return this.section;
  }

  /**
   * Moves to the named child of the current section.
   *
   * Returns false when the child is missing and `create` is false; the
   * explorer must not be used after a failed move.
   */
  moveTo(name: string, create: boolean): boolean {
    const next = create ? this.section.addSection(name) : this.section.getSection(name);
    if (!next) {
      return false;
    }
    this.section = next;
    return true;
  }
}

/**
 * Splits a fully qualified name into path segments.
 * Empty segments are dropped, so `a..b` addresses the same variable as `a.b`.
 */
export function splitVariableName(name: string): string[] {
  return name.split('.').filter(segment => segment.length > 0);
}

/**
 * Positions `explorer` on the parent section of `name` and returns the leaf
 * variable name, or undefined when a section is missing and `create` is false.
 */
export function moveToParent(explorer: ConfigurationExplorer, name: string, create: true): string;
export function moveToParent(explorer: ConfigurationExplorer, name: string, create: boolean): string | undefined;
export function moveToParent(
  explorer: ConfigurationExplorer,
  name: string,
  create: boolean
): string | undefined {
  const segments = splitVariableName(name);
  if (segments.length === 0) {
    return '';
  }

  for (let i = 0; i < segments.length - 1; i++) {
    if (!explorer.moveTo(segments[i], create)) {
      return undefined;
    }
  }
  return segments[segments.length - 1];
}
