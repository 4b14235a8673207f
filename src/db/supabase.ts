import { createClient, type PostgrestError, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { InfrastructureError } from '../errors.js';
import type {
  DailySnapshot,
  Keyword,
  KeywordType,
  MomentumStore,
  SnapshotWithKeyword,
  TrendsCacheEntry,
} from './types.js';

const UNIQUE_VIOLATION = '23505';

const KeywordTypeSchema = z.enum(['keyword', 'hashtag', 'sound']);

const KeywordRow = z.object({
  id: z.number().int(),
  keyword: z.string(),
  keyword_type: KeywordTypeSchema,
  first_seen: z.string(),
  last_seen: z.string(),
});

const CacheRow = z.object({
  keyword_id: z.number().int(),
  geo: z.string(),
  timeframe: z.string(),
  weekly_series: z.array(z.number()),
  fetched_at: z.string(),
});

const SnapshotRow = z.object({
  keyword_id: z.number().int(),
  snapshot_date: z.string(),
  momentum_score: z.number().int(),
  raw_score: z.number(),
  lift: z.number(),
  acceleration: z.number(),
  novelty: z.number(),
  noise: z.number(),
  keywords: z.object({ keyword: z.string(), keyword_type: KeywordTypeSchema }),
});

export function createSupabaseClient(url: string | undefined, key: string | undefined): SupabaseClient {
  if (!url || !key) {
    throw new InfrastructureError('Missing SUPABASE_URL or SUPABASE_SERVICE_KEY in environment');
  }
  return createClient(url, key, { auth: { persistSession: false } });
}

function fail(what: string, error: PostgrestError): InfrastructureError {
  return new InfrastructureError(`${what}: ${error.message}`, { cause: error });
}

function parseRow<T>(schema: z.ZodType<T>, row: unknown, what: string): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new InfrastructureError(`${what}: unexpected row shape (${parsed.error.issues[0]?.message ?? 'invalid'})`);
  }
  return parsed.data;
}

/**
 * MomentumStore backed by the tables in supabase/migrations.
 * The client is passed in; nothing here holds module-level state.
 */
export class SupabaseStore implements MomentumStore {
  constructor(private readonly db: SupabaseClient) {}

  async findKeyword(keyword: string): Promise<Keyword | null> {
    const { data, error } = await this.db.from('keywords').select('*').eq('keyword', keyword).maybeSingle();
    if (error) throw fail(`Lookup keyword "${keyword}"`, error);
    return data ? parseRow(KeywordRow, data, 'keywords') : null;
  }

  async upsertKeyword(keyword: string, type: KeywordType, seenOn: string): Promise<Keyword> {
    const existing = await this.findKeyword(keyword);

    if (!existing) {
      const { data, error } = await this.db
        .from('keywords')
        .insert({ keyword, keyword_type: type, first_seen: seenOn, last_seen: seenOn })
        .select('*')
        .single();

      if (!error) return parseRow(KeywordRow, data, 'keywords');
      if (error.code !== UNIQUE_VIOLATION) throw fail(`Insert keyword "${keyword}"`, error);

      // Inserted concurrently by someone else; fall through to the update path.
      const raced = await this.findKeyword(keyword);
      if (!raced) throw fail(`Insert keyword "${keyword}"`, error);
      return this.touch(raced, seenOn);
    }

    return this.touch(existing, seenOn);
  }

  private async touch(row: Keyword, seenOn: string): Promise<Keyword> {
    if (row.last_seen >= seenOn) return row;

    const { data, error } = await this.db
      .from('keywords')
      .update({ last_seen: seenOn })
      .eq('id', row.id)
      .select('*')
      .single();

    if (error) throw fail(`Update keyword "${row.keyword}"`, error);
    return parseRow(KeywordRow, data, 'keywords');
  }

  async insertSnapshot(snapshot: DailySnapshot): Promise<'inserted' | 'skipped'> {
    // ON CONFLICT DO NOTHING returns no row for an existing (keyword_id, snapshot_date)
    const { data, error } = await this.db
      .from('daily_snapshots')
      .upsert(snapshot, { onConflict: 'keyword_id,snapshot_date', ignoreDuplicates: true })
      .select('keyword_id');

    if (error) throw fail(`Insert snapshot for keyword_id=${snapshot.keyword_id}`, error);
    return data && data.length > 0 ? 'inserted' : 'skipped';
  }

  async listSnapshotsForDate(date: string): Promise<SnapshotWithKeyword[]> {
    const { data, error } = await this.db
      .from('daily_snapshots')
      .select('keyword_id, snapshot_date, momentum_score, raw_score, lift, acceleration, novelty, noise, keywords!inner(keyword, keyword_type)')
      .eq('snapshot_date', date)
      .order('momentum_score', { ascending: false });

    if (error) throw fail(`List snapshots for ${date}`, error);

    return (data ?? []).map((raw) => {
      const { keywords, ...snapshot } = parseRow(SnapshotRow, raw, 'daily_snapshots');
      return { ...snapshot, keyword: keywords.keyword, keyword_type: keywords.keyword_type };
    });
  }

  async getCacheEntry(keywordId: number, geo: string, timeframe: string): Promise<TrendsCacheEntry | null> {
    const { data, error } = await this.db
      .from('trends_cache')
      .select('keyword_id, geo, timeframe, weekly_series, fetched_at')
      .eq('keyword_id', keywordId)
      .eq('geo', geo)
      .eq('timeframe', timeframe)
      .maybeSingle();

    if (error) throw fail(`Read trends cache for keyword_id=${keywordId}`, error);
    return data ? parseRow(CacheRow, data, 'trends_cache') : null;
  }

  async replaceCacheEntry(entry: TrendsCacheEntry): Promise<void> {
    const { error } = await this.db
      .from('trends_cache')
      .upsert(entry, { onConflict: 'keyword_id,geo,timeframe' });

    if (error) throw fail(`Replace trends cache for keyword_id=${entry.keyword_id}`, error);
  }

  async deleteCacheEntries(keywordId: number): Promise<number> {
    const { data, error } = await this.db
      .from('trends_cache')
      .delete()
      .eq('keyword_id', keywordId)
      .select('keyword_id');

    if (error) throw fail(`Invalidate trends cache for keyword_id=${keywordId}`, error);
    return data?.length ?? 0;
  }
}
