export type KeywordType = 'keyword' | 'hashtag' | 'sound';

export interface Keyword {
  id: number;
  keyword: string; // normalized, unique
  keyword_type: KeywordType;
  first_seen: string; // YYYY-MM-DD
  last_seen: string; // YYYY-MM-DD
}

export interface TrendsCacheEntry {
  keyword_id: number;
  geo: string;
  timeframe: string;
  weekly_series: number[]; // oldest first, newest last
  fetched_at: string; // ISO 8601
}

export interface DailySnapshot {
  keyword_id: number;
  snapshot_date: string; // YYYY-MM-DD
  momentum_score: number;
  raw_score: number;
  lift: number;
  acceleration: number;
  novelty: number;
  noise: number;
}

export interface SnapshotWithKeyword extends DailySnapshot {
  keyword: string;
  keyword_type: KeywordType;
}

/**
 * Persistence used by the cache and the pipeline. Implementations raise
 * InfrastructureError when the backing store cannot be reached.
 */
export interface MomentumStore {
  /** Insert on first sighting, otherwise advance last_seen. */
  upsertKeyword(keyword: string, type: KeywordType, seenOn: string): Promise<Keyword>;
  findKeyword(keyword: string): Promise<Keyword | null>;
  /** Insert-or-skip keyed by (keyword_id, snapshot_date). Never updates. */
  insertSnapshot(snapshot: DailySnapshot): Promise<'inserted' | 'skipped'>;
  listSnapshotsForDate(date: string): Promise<SnapshotWithKeyword[]>;
  getCacheEntry(keywordId: number, geo: string, timeframe: string): Promise<TrendsCacheEntry | null>;
  /** Replace the entry for (keyword_id, geo, timeframe) wholesale. */
  replaceCacheEntry(entry: TrendsCacheEntry): Promise<void>;
  deleteCacheEntries(keywordId: number): Promise<number>;
}
