/**
 * Supplies raw candidate keyword strings. Results may contain duplicates and
 * case variants; normalization happens in the pipeline.
 */
export interface KeywordSource {
  readonly name: string;
  fetchCandidates(limit?: number): Promise<string[]>;
}
