import type {
  InsertOutcome,
  MappingScope,
  NewChapterRecord,
  ScrapingErrorEntry,
  TrackedMapping,
  TrackingStore,
} from '../../services/store.js';

export interface StoredMapping extends TrackedMapping {
  verified: boolean;
}

export function mapping(
  id: number,
  pluginId: string,
  overrides: { workId?: number; title?: string; sourceId?: number; active?: boolean; verified?: boolean } = {},
): StoredMapping {
  return {
    id,
    url: `https://example.com/series/${id}`,
    verified: overrides.verified ?? true,
    work: { id: overrides.workId ?? id, title: overrides.title ?? `Work ${id}` },
    source: {
      id: overrides.sourceId ?? 1,
      pluginId,
      baseUrl: 'https://example.com',
      active: overrides.active ?? true,
    },
  };
}

/** In-process TrackingStore that enforces (mappingId, number) uniqueness. */
export class InMemoryTrackingStore implements TrackingStore {
  readonly chapters: NewChapterRecord[] = [];
  readonly checked: Array<{ workId: number; checkedAt: Date }> = [];
  readonly scrapingErrors: ScrapingErrorEntry[] = [];
  listingError: Error | null = null;
  recordErrorFailure: Error | null = null;

  constructor(private readonly mappings: StoredMapping[] = []) {}

  async listEligibleMappings(scope: MappingScope): Promise<TrackedMapping[]> {
    if (this.listingError) {
      throw this.listingError;
    }

    const eligible = this.mappings
      .filter((m) => m.verified && m.source.active)
      .filter((m) => scope.workId === undefined || m.work.id === scope.workId)
      .filter((m) => scope.sourceId === undefined || m.source.id === scope.sourceId)
      .sort((a, b) => a.id - b.id);

    return scope.limit === undefined ? eligible : eligible.slice(0, scope.limit);
  }

  async listChapterNumbers(mappingId: number): Promise<Set<string>> {
    return new Set(this.chapters.filter((c) => c.mappingId === mappingId).map((c) => c.number));
  }

  async insertChapter(record: NewChapterRecord): Promise<InsertOutcome> {
    if (this.chapters.some((c) => c.mappingId === record.mappingId && c.number === record.number)) {
      return 'conflict';
    }
    this.chapters.push(record);
    return 'inserted';
  }

  async touchWorkChecked(workId: number, checkedAt: Date): Promise<void> {
    this.checked.push({ workId, checkedAt });
  }

  async recordScrapingError(entry: ScrapingErrorEntry): Promise<void> {
    if (this.recordErrorFailure) {
      throw this.recordErrorFailure;
    }
    this.scrapingErrors.push(entry);
  }
}
