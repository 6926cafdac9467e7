/**
 * Registry of the transforms a run configuration can name.
 * Names are matched case-insensitively.
 */
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import type { Transform } from './types.js';

/**
 * Builds a transform from the options given in a run configuration.
 * Throws a RegistryError when the options are invalid.
 */
export type TransformFactory = (options: unknown) => Transform;

export interface TransformInfo {
  name: string;
  description: string;
}

interface TransformRegistration extends TransformInfo {
  factory: TransformFactory;
}

export class TransformRegistry {
  private registrations = new Map<string, TransformRegistration>();

  /**
   * Register a transform. A later registration under the same name replaces
   * the earlier one.
   */
  register(name: string, factory: TransformFactory, description = ''): void {
    this.registrations.set(name.toLowerCase(), { name, factory, description });
  }

  has(name: string): boolean {
    return this.registrations.has(name.toLowerCase());
  }

  /**
   * Create a configured transform instance.
   */
  create(name: string, options: unknown): Transform {
    const registration = this.registrations.get(name.toLowerCase());
    if (!registration) {
      throw new RegistryError(
        ErrorCodes.UNKNOWN_TRANSFORM,
        `Unknown transform '${name}'. Available: ${this.names().join(', ') || '(none)'}`,
        { name, available: this.names() }
      );
    }
    return registration.factory(options);
  }

  list(): TransformInfo[] {
    return Array.from(this.registrations.values(), ({ name, description }) => ({ name, description }));
  }

  names(): string[] {
    return this.list().map((info) => info.name);
  }

  clear(): void {
    this.registrations.clear();
  }
}

export function createTransformRegistry(): TransformRegistry {
  return new TransformRegistry();
}
