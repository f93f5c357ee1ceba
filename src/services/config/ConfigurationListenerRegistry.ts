import { logger } from '../../utils/logger';
import type { ConfigurationListener } from '../interfaces/ConfigurationInterfaces';
import type { ConfigurationEvent } from './ConfigurationEvent';

/**
 * Weakly-held set of configuration listeners.
 *
 * Registration does not keep a listener alive: once the caller drops its last
 * reference the entry disappears on the next iteration. Callers that want a
 * listener to outlive the registering scope must hold on to it.
 */
export class ConfigurationListenerRegistry {
  private references = new Set<WeakRef<ConfigurationListener>>();

  /**
   * Registers a listener; registering it again has no effect
   */
  add(listener: ConfigurationListener): void {
    if (this.find(listener)) {
      return;
    }
    this.references.add(new WeakRef(listener));
  }

  /**
   * Returns true when the listener was registered
   */
  remove(listener: ConfigurationListener): boolean {
    const reference = this.find(listener);
    if (!reference) {
      return false;
    }
    return this.references.delete(reference);
  }

  has(listener: ConfigurationListener): boolean {
    return this.find(listener) !== undefined;
  }

  /** Number of listeners still reachable */
  get size(): number {
    return this.snapshot().length;
  }

  clear(): void {
    this.references.clear();
  }

  /**
   * Delivers the event to every live listener registered at call time.
   * A throwing listener is logged and does not prevent delivery to the others.
   */
  notify(event: ConfigurationEvent): void {
    for (const listener of this.snapshot()) {
      try {
        listener.configurationChanged(event);
      } catch (error) {
        logger.warn(`Configuration listener failed for ${event.name}:`, error);
      }
    }
  }

  /**
   * Live listeners, pruning entries whose target was collected
   */
  private snapshot(): ConfigurationListener[] {
    const live: ConfigurationListener[] = [];
    for (const reference of this.references) {
      const listener = reference.deref();
      if (listener) {
        live.push(listener);
      } else {
        this.references.delete(reference);
      }
    }
    return live;
  }

  private find(listener: ConfigurationListener): WeakRef<ConfigurationListener> | undefined {
    for (const reference of this.references) {
      if (reference.deref() === listener) {
        return reference;
      }
    }
    return undefined;
  }
}

/**
 * Registry shared by every configuration constructed with it, for listeners
 * that must hear about changes in all of them
 */
export const sharedListenerRegistry = new ConfigurationListenerRegistry();
