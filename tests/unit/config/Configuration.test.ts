import { describe, it, expect, beforeEach } from '@jest/globals';
import { Configuration } from '../../../src/services/config/Configuration';
import {
  ConfigurationListenerRegistry,
  sharedListenerRegistry
} from '../../../src/services/config/ConfigurationListenerRegistry';
import {
  ConfigurationSourceError,
  ConversionError
} from '../../../src/services/interfaces/ConfigurationInterfaces';
import { RecordingBuilder, RecordingListener } from '../../test-utils';

describe('Configuration', () => {
  let configuration: Configuration;
  let listener: RecordingListener;

  beforeEach(() => {
    configuration = new Configuration();
    listener = new RecordingListener();
    configuration.addConfigurationListener(listener);
  });

  describe('setVariable / getVariable', () => {
    it('should return what was set', async () => {
      await configuration.setVariable('ui.theme.color', 'blue');

      expect(await configuration.getVariable('ui.theme.color')).toBe('blue');
    });

    it('should store variables in nested sections', async () => {
      await configuration.setVariable('ui.theme.color', 'blue');

      const theme = configuration.getRoot().getSection('ui')?.getSection('theme');
      expect(theme?.getVariable('color')).toBe('blue');
    });

    it('should report and notify only effective changes', async () => {
      expect(await configuration.setVariable('k', 'v')).toBe(true);
      expect(await configuration.setVariable('k', 'v')).toBe(false);

      expect(listener.events).toHaveLength(1);
      expect(listener.events[0].name).toBe('k');
      expect(listener.events[0].value).toBe('v');
    });

    it('should not create sections when reading a missing path', async () => {
      expect(await configuration.getVariable('a.b.c')).toBeUndefined();
      expect(configuration.getRoot().hasSections()).toBe(false);
    });

    it('should treat repeated dots as a single separator', async () => {
      await configuration.setVariable('a..b', '1');

      expect(await configuration.getVariable('a.b')).toBe('1');
    });
  });

  describe('toRecord', () => {
    it('should keep variables named like object prototype keys', async () => {
      await configuration.setVariable('__proto__', 'x');
      await configuration.setVariable('constructor.name', 'y');

      expect(Object.entries(await configuration.toRecord())).toEqual([
        ['__proto__', 'x'],
        ['constructor.name', 'y']
      ]);
    });
  });

  describe('getVariable with default', () => {
    it('should set and return the default for unset variables', async () => {
      expect(await configuration.getVariable('ui.font', 'mono')).toBe('mono');
      expect(await configuration.getVariable('ui.font')).toBe('mono');
      expect(listener.events.map(event => event.name)).toEqual(['ui.font']);
    });

    it('should keep the existing value without notifying', async () => {
      await configuration.setVariable('ui.font', 'serif');
      listener.events.length = 0;

      expect(await configuration.getVariable('ui.font', 'mono')).toBe('serif');
      expect(listener.events).toHaveLength(0);
    });

    it('should be idempotent', async () => {
      await configuration.getVariable('ui.font', 'mono');
      await configuration.getVariable('ui.font', 'mono');

      expect(listener.events).toHaveLength(1);
    });
  });

  describe('typed variables', () => {
    it('should store canonical text and read it back', async () => {
      await configuration.setIntegerVariable('window.width', 800);
      await configuration.setLongVariable('cache.size', 5000000000n);
      await configuration.setFloatVariable('ui.scale', 1.5);
      await configuration.setDoubleVariable('ui.ratio', 0.1);
      await configuration.setBooleanVariable('ui.visible', false);

      expect(await configuration.getVariable('window.width')).toBe('800');
      expect(await configuration.getIntegerVariable('window.width')).toBe(800);
      expect(await configuration.getLongVariable('cache.size')).toBe(5000000000n);
      expect(await configuration.getFloatVariable('ui.scale')).toBe(1.5);
      expect(await configuration.getDoubleVariable('ui.ratio')).toBe(0.1);
      expect(await configuration.getBooleanVariable('ui.visible')).toBe(false);
    });

    it('should return zero values for unset variables without defaults', async () => {
      expect(await configuration.getIntegerVariable('missing')).toBe(0);
      expect(await configuration.getLongVariable('missing')).toBe(0n);
      expect(await configuration.getBooleanVariable('missing')).toBe(false);
      expect(await configuration.isVariableSet('missing')).toBe(false);
    });

    it('should apply typed defaults', async () => {
      expect(await configuration.getIntegerVariable('window.height', 600)).toBe(600);
      expect(await configuration.getBooleanVariable('ui.visible', true)).toBe(true);

      expect(await configuration.getVariable('window.height')).toBe('600');
      expect(await configuration.getVariable('ui.visible')).toBe('true');
    });

    it('should raise a conversion error when the stored text does not parse', async () => {
      await configuration.setVariable('window.width', 'wide');

      await expect(configuration.getIntegerVariable('window.width', 800)).rejects.toThrow(ConversionError);
      expect(await configuration.getVariable('window.width')).toBe('wide');
    });

    it('should convert removed values', async () => {
      await configuration.setIntegerVariable('count', 3);

      expect(await configuration.removeIntegerVariable('count')).toBe(3);
      expect(await configuration.removeIntegerVariable('count')).toBe(0);
      expect(await configuration.removeBooleanVariable('flag')).toBe(false);
    });
  });

  describe('removeVariable', () => {
    it('should return the previous value and notify with no value', async () => {
      await configuration.setVariable('a.b', '1');

      expect(await configuration.removeVariable('a.b')).toBe('1');
      expect(await configuration.getVariable('a.b')).toBeUndefined();

      const removal = listener.events[1];
      expect(removal.name).toBe('a.b');
      expect(removal.value).toBeUndefined();
    });

    it('should keep the emptied section but not treat it as a variable', async () => {
      await configuration.setVariable('a.b', '1');
      await configuration.removeVariable('a.b');

      expect(await configuration.getVariable('a')).toBeUndefined();
      expect(configuration.getRoot().getSection('a')).toBeDefined();

      const builder = new RecordingBuilder();
      await configuration.build(builder);
      expect(builder.calls).toEqual(['startConfiguration', 'endConfiguration']);
    });

    it('should do nothing for unset variables', async () => {
      expect(await configuration.removeVariable('x.y')).toBeUndefined();
      expect(listener.events).toHaveLength(0);
      expect(configuration.getRoot().hasSections()).toBe(false);
    });
  });

  describe('renameVariable', () => {
    it('should move the value and fire removal then set', async () => {
      await configuration.setVariable('old.name', 'v');
      listener.events.length = 0;

      expect(await configuration.renameVariable('old.name', 'new.name')).toBe('v');

      expect(await configuration.getVariable('old.name')).toBeUndefined();
      expect(await configuration.getVariable('new.name')).toBe('v');
      expect(listener.events.map(event => [event.name, event.value])).toEqual([
        ['old.name', undefined],
        ['new.name', 'v']
      ]);
    });

    it('should remove the destination when the source is unset', async () => {
      await configuration.setVariable('new.name', 'kept?');

      expect(await configuration.renameVariable('old.name', 'new.name')).toBeUndefined();
      expect(await configuration.getVariable('new.name')).toBeUndefined();
    });
  });

  describe('build', () => {
    it('should emit variables before subsections, depth first', async () => {
      await configuration.setVariable('version', '2');
      await configuration.setVariable('ui.theme.color', 'blue');
      await configuration.setVariable('ui.font', 'mono');

      const builder = new RecordingBuilder();
      await configuration.build(builder);

      expect(builder.calls).toEqual([
        'startConfiguration',
        'addVariable:version=2',
        'startSection:ui',
        'addVariable:font=mono',
        'startSection:theme',
        'addVariable:color=blue',
        'endSection:theme',
        'endSection:ui',
        'endConfiguration'
      ]);
    });

    it('should flatten the tree to fully qualified names', async () => {
      await configuration.setVariable('ui.theme.color', 'blue');
      await configuration.setVariable('version', '2');

      expect(await configuration.toRecord()).toEqual({
        'ui.theme.color': 'blue',
        version: '2'
      });
    });
  });

  describe('listeners', () => {
    it('should notify two listeners exactly once each', async () => {
      const second = new RecordingListener();
      configuration.addConfigurationListener(second);

      await configuration.setVariable('k', 'v');

      for (const recorded of [listener, second]) {
        expect(recorded.events).toHaveLength(1);
        expect(recorded.events[0].name).toBe('k');
        expect(recorded.events[0].value).toBe('v');
      }
    });

    it('should keep registries separate between instances by default', async () => {
      const other = new Configuration();

      await other.setVariable('k', 'v');

      expect(listener.events).toHaveLength(0);
    });

    it('should broadcast through a shared registry', async () => {
      const shared = new ConfigurationListenerRegistry();
      const first = new Configuration({ listeners: shared });
      const second = new Configuration({ listeners: shared });
      const recorder = new RecordingListener();
      shared.add(recorder);

      await first.setVariable('a', '1');
      await second.setVariable('b', '2');

      expect(recorder.events.map(event => event.name)).toEqual(['a', 'b']);
    });

    it('should expose the process-wide registry as a named singleton', () => {
      const configured = new Configuration({ listeners: sharedListenerRegistry });

      expect(configured.getListenerRegistry()).toBe(sharedListenerRegistry);
    });

    it('should stop notifying after removal', async () => {
      expect(configuration.removeConfigurationListener(listener)).toBe(true);

      await configuration.setVariable('k', 'v');

      expect(listener.events).toHaveLength(0);
    });
  });

  describe('serialization without a source', () => {
    it('should reject read and write', async () => {
      await expect(configuration.read()).rejects.toThrow(ConfigurationSourceError);
      await expect(configuration.write()).rejects.toThrow(ConfigurationSourceError);
    });
  });

  describe('locking', () => {
    it('should serialize concurrent mutations', async () => {
      await Promise.all(
        Array.from({ length: 20 }, (_, i) => configuration.setVariable(`items.item${i}`, String(i)))
      );

      expect(Object.keys(await configuration.toRecord())).toHaveLength(20);
      expect(configuration.getTreeLockStatistics().currentlyHeld).toBe(0);
    });
  });
});
