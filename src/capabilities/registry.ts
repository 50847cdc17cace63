import type { CapabilityName } from '../types/index.js';
import {
  DuplicateCapabilityError,
  MissingFallbackError,
  RegistrySealedError,
} from '../kernel/errors.js';
import { createLogger } from '../utils/logger.js';
import type { CapabilityDefinition, CapabilityDescriptor } from './types.js';

const log = createLogger('trackwise:registry');

/**
 * CapabilityRegistry
 *
 * Static catalog of capabilities. Populated once at startup, then sealed;
 * registration order is the router's tie-break order.
 */
export class CapabilityRegistry {
  private capabilities: Map<CapabilityName, CapabilityDescriptor> = new Map();
  private sealed: boolean = false;

  /**
   * Register a capability. Descriptor and trigger list are frozen.
   */
  register(definition: CapabilityDefinition): CapabilityDescriptor {
    if (this.sealed) {
      throw new RegistrySealedError(definition.name);
    }
    if (this.capabilities.has(definition.name)) {
      throw new DuplicateCapabilityError(definition.name);
    }

    const descriptor: CapabilityDescriptor = Object.freeze({
      ...definition,
      fallback: definition.fallback ?? false,
      triggers: Object.freeze(definition.triggers.map((trigger) => Object.freeze({ ...trigger }))),
    });

    this.capabilities.set(descriptor.name, descriptor);
    log.debug({ capability: descriptor.name, triggers: descriptor.triggers.length }, 'Capability registered');

    return descriptor;
  }

  /**
   * Make the registry read-only
   */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get(name: CapabilityName): CapabilityDescriptor | null {
    return this.capabilities.get(name) ?? null;
  }

  has(name: CapabilityName): boolean {
    return this.capabilities.has(name);
  }

  /**
   * All descriptors in registration order
   */
  list(): CapabilityDescriptor[] {
    return Array.from(this.capabilities.values());
  }

  /**
   * The designated fallback capability
   */
  getFallback(): CapabilityDescriptor {
    for (const descriptor of this.capabilities.values()) {
      if (descriptor.fallback) return descriptor;
    }
    throw new MissingFallbackError();
  }

  get count(): number {
    return this.capabilities.size;
  }
}
