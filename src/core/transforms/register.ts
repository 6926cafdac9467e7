/**
 * Registers the built-in transforms.
 */
import { createAccessorsTransform } from '../accessors/transform.js';
import type { TransformRegistry } from './registry.js';

export function registerBuiltinTransforms(registry: TransformRegistry): TransformRegistry {
  registry.register(
    'accessors',
    createAccessorsTransform,
    'Encapsulate fields behind synthesized getters and setters'
  );
  return registry;
}
