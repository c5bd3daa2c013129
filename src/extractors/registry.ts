import type { ScanlatorRegistration } from './types.js';

/**
 * Immutable lookup from implementation identifier to plugin registration.
 * Built once at startup; lookups are exact string matches.
 */
export class ScanlatorRegistry {
  private readonly entries: ReadonlyMap<string, ScanlatorRegistration>;

  constructor(registrations: readonly ScanlatorRegistration[]) {
    const entries = new Map<string, ScanlatorRegistration>();

    for (const registration of registrations) {
      if (entries.has(registration.id)) {
        throw new Error(`Duplicate scanlator identifier "${registration.id}"`);
      }
      entries.set(registration.id, Object.freeze({ ...registration }));
    }

    this.entries = entries;
  }

  resolve(id: string): ScanlatorRegistration | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  displayNameFor(id: string): string {
    return this.entries.get(id)?.displayName ?? id;
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  list(): ScanlatorRegistration[] {
    return [...this.entries.values()];
  }
}
