import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { getEnv } from '../config/env.js';
import { StoreError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type {
  InsertOutcome,
  MappingScope,
  NewChapterRecord,
  ScrapingErrorEntry,
  TrackedMapping,
  TrackingStore,
} from './store.js';

const UNIQUE_VIOLATION = '23505';
const PAGE_SIZE = 1000;

let supabaseClient: SupabaseClient | null = null;

export function getSupabase(): SupabaseClient {
  if (supabaseClient) {
    return supabaseClient;
  }

  const env = getEnv();
  supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY);
  return supabaseClient;
}

const workRowSchema = z.object({
  id: z.number(),
  title: z.string(),
});

const sourceRowSchema = z.object({
  id: z.number(),
  plugin_id: z.string(),
  base_url: z.string().nullable(),
  active: z.boolean(),
});

// PostgREST returns to-one embeds as an object, or as a one-element array on some joins.
const workEmbedSchema = z
  .union([workRowSchema, z.array(workRowSchema).nonempty()])
  .transform((value) => (Array.isArray(value) ? value[0] : value));

const sourceEmbedSchema = z
  .union([sourceRowSchema, z.array(sourceRowSchema).nonempty()])
  .transform((value) => (Array.isArray(value) ? value[0] : value));

export const mappingRowSchema = z.object({
  id: z.number(),
  url: z.string(),
  work: workEmbedSchema,
  source: sourceEmbedSchema,
});

export function toTrackedMapping(row: unknown): TrackedMapping {
  const parsed = mappingRowSchema.parse(row);
  return {
    id: parsed.id,
    url: parsed.url,
    work: { id: parsed.work.id, title: parsed.work.title },
    source: {
      id: parsed.source.id,
      pluginId: parsed.source.plugin_id,
      baseUrl: parsed.source.base_url,
      active: parsed.source.active,
    },
  };
}

const chapterNumberRowSchema = z.object({ chapter_number: z.string() });

export class SupabaseTrackingStore implements TrackingStore {
  constructor(private readonly supabase: SupabaseClient = getSupabase()) {}

  async listEligibleMappings(scope: MappingScope): Promise<TrackedMapping[]> {
    let query = this.supabase
      .from('mappings')
      .select('id, url, work:works!inner(id, title), source:sources!inner(id, plugin_id, base_url, active)')
      .eq('verified', true)
      .eq('source.active', true);

    if (scope.workId !== undefined) {
      query = query.eq('work_id', scope.workId);
    }
    if (scope.sourceId !== undefined) {
      query = query.eq('source_id', scope.sourceId);
    }

    query = query.order('id', { ascending: true });
    if (scope.limit !== undefined) {
      query = query.limit(scope.limit);
    }

    const { data, error } = await query;

    if (error) {
      logger.error({ error, scope }, 'Failed to list eligible mappings');
      throw new StoreError(`Failed to list eligible mappings: ${error.message}`, { scope });
    }

    return (data ?? []).map((row) => toTrackedMapping(row));
  }

  async listChapterNumbers(mappingId: number): Promise<Set<string>> {
    const numbers = new Set<string>();

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.supabase
        .from('chapters')
        .select('chapter_number')
        .eq('mapping_id', mappingId)
        .order('id', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) {
        logger.error({ error, mappingId }, 'Failed to list chapter numbers');
        throw new StoreError(`Failed to list chapter numbers: ${error.message}`, { mappingId });
      }

      const rows = z.array(chapterNumberRowSchema).parse(data ?? []);
      for (const row of rows) {
        numbers.add(row.chapter_number);
      }

      if (rows.length < PAGE_SIZE) {
        return numbers;
      }
    }
  }

  async insertChapter(record: NewChapterRecord): Promise<InsertOutcome> {
    const { error } = await this.supabase.from('chapters').insert({
      mapping_id: record.mappingId,
      chapter_number: record.number,
      chapter_title: record.title,
      chapter_url: record.url,
      published_at: record.publishedAt ? record.publishedAt.toISOString() : null,
      detected_at: record.detectedAt.toISOString(),
      read: false,
    });

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        logger.debug({ mappingId: record.mappingId, number: record.number }, 'Chapter already stored');
        return 'conflict';
      }

      logger.error({ error, mappingId: record.mappingId, number: record.number }, 'Failed to insert chapter');
      throw new StoreError(`Failed to insert chapter: ${error.message}`, {
        mappingId: record.mappingId,
        number: record.number,
      });
    }

    return 'inserted';
  }

  async touchWorkChecked(workId: number, checkedAt: Date): Promise<void> {
    const { error } = await this.supabase
      .from('works')
      .update({ last_checked: checkedAt.toISOString() })
      .eq('id', workId);

    if (error) {
      logger.error({ error, workId }, 'Failed to update work last_checked');
      throw new StoreError(`Failed to update work last_checked: ${error.message}`, { workId });
    }
  }

  async recordScrapingError(entry: ScrapingErrorEntry): Promise<void> {
    const { error } = await this.supabase.from('scraping_errors').insert({
      mapping_id: entry.mappingId,
      error_type: entry.errorType,
      error_message: entry.message,
      occurred_at: entry.occurredAt.toISOString(),
      resolved: false,
    });

    if (error) {
      throw new StoreError(`Failed to record scraping error: ${error.message}`, { mappingId: entry.mappingId });
    }
  }
}
