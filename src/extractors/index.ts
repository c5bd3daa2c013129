import { asuraScans } from './asura-scans.js';
import { ScanlatorRegistry } from './registry.js';
import { madaraScans, ravenScans } from './template-scanlator.js';
import type { ScanlatorRegistration } from './types.js';

/** Every plugin shipped with the worker. Add new sources here. */
export function builtinScanlators(): ScanlatorRegistration[] {
  return [asuraScans, madaraScans(), ravenScans()];
}

export function createRegistry(
  registrations: readonly ScanlatorRegistration[] = builtinScanlators(),
): ScanlatorRegistry {
  return new ScanlatorRegistry(registrations);
}
