export interface TrackedWork {
  id: number;
  title: string;
}

export interface TrackedSource {
  id: number;
  /** Canonical implementation identifier, resolved through the plugin registry. */
  pluginId: string;
  baseUrl: string | null;
  active: boolean;
}

/** A verified work/source mapping joined with both sides. */
export interface TrackedMapping {
  id: number;
  url: string;
  work: TrackedWork;
  source: TrackedSource;
}

export interface MappingScope {
  workId?: number;
  sourceId?: number;
  limit?: number;
}

export interface NewChapterRecord {
  mappingId: number;
  number: string;
  title: string | null;
  url: string;
  publishedAt: Date | null;
  detectedAt: Date;
}

export type InsertOutcome = 'inserted' | 'conflict';

export interface ScrapingErrorEntry {
  mappingId: number;
  errorType: string;
  message: string;
  occurredAt: Date;
}

/**
 * Persistence consumed by the tracker. Implementations must enforce
 * uniqueness of (mappingId, number) and report a violation as 'conflict'.
 */
export interface TrackingStore {
  /** Verified mappings whose source is active, narrowed by the scope. */
  listEligibleMappings(scope: MappingScope): Promise<TrackedMapping[]>;
  listChapterNumbers(mappingId: number): Promise<Set<string>>;
  insertChapter(record: NewChapterRecord): Promise<InsertOutcome>;
  touchWorkChecked(workId: number, checkedAt: Date): Promise<void>;
  recordScrapingError(entry: ScrapingErrorEntry): Promise<void>;
}
