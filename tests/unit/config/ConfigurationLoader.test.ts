import { describe, it, expect, beforeEach } from '@jest/globals';
import { ConfigurationEvent } from '../../../src/services/config/ConfigurationEvent';
import { ConfigurationLoader } from '../../../src/services/config/ConfigurationLoader';
import { ConfigurationSection } from '../../../src/services/config/ConfigurationSection';
import { StructuralError } from '../../../src/services/interfaces/ConfigurationInterfaces';

describe('ConfigurationLoader', () => {
  let root: ConfigurationSection;
  let events: ConfigurationEvent[];
  let loader: ConfigurationLoader;

  beforeEach(() => {
    root = new ConfigurationSection();
    events = [];
    loader = new ConfigurationLoader(root, event => events.push(event));
  });

  it('should rebuild nested sections', () => {
    loader.startConfiguration();
    loader.addVariable('version', '1');
    loader.startSection('ui');
    loader.startSection('theme');
    loader.addVariable('color', 'blue');
    loader.endSection('theme');
    loader.addVariable('font', 'mono');
    loader.endSection('ui');
    loader.endConfiguration();

    expect(root.getVariable('version')).toBe('1');
    expect(root.getSection('ui')?.getVariable('font')).toBe('mono');
    expect(root.getSection('ui')?.getSection('theme')?.getVariable('color')).toBe('blue');
  });

  it('should fire events with fully qualified names', () => {
    loader.startConfiguration();
    loader.addVariable('version', '1');
    loader.startSection('ui');
    loader.startSection('theme');
    loader.addVariable('color', 'blue');
    loader.endSection('theme');
    loader.endSection('ui');
    loader.endConfiguration();

    expect(events.map(event => [event.name, event.value])).toEqual([
      ['version', '1'],
      ['ui.theme.color', 'blue']
    ]);
    expect(loader.getChangedCount()).toBe(2);
  });

  it('should not fire for values that are already set', () => {
    root.setVariable('version', '1');

    loader.startConfiguration();
    loader.addVariable('version', '1');
    loader.endConfiguration();

    expect(events).toHaveLength(0);
  });

  it('should reject endConfiguration with open sections', () => {
    loader.startConfiguration();
    loader.startSection('ui');

    expect(() => loader.endConfiguration()).toThrow(StructuralError);
    expect(() => loader.endConfiguration()).toThrow('Not all sections have been closed.');
  });

  it('should reject endSection when nothing is open', () => {
    loader.startConfiguration();

    expect(() => loader.endSection('x')).toThrow(StructuralError);
  });

  it('should reject closing a section that is not the innermost one', () => {
    loader.startConfiguration();
    loader.startSection('ui');
    loader.startSection('theme');

    expect(() => loader.endSection('ui')).toThrow('Section ui is not the currently opened section.');
  });

  it('should reject calls outside of a configuration', () => {
    expect(() => loader.addVariable('a', '1')).toThrow(StructuralError);
    expect(() => loader.startSection('ui')).toThrow(StructuralError);
  });
});
