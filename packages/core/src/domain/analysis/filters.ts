import type { AnalysisResult, Candidate, CandidateStatus, WindowScore } from './analysis-result.js';

export interface ResultFilter {
  search?: string;
  onlyRfi?: boolean;
  onlyInteresting?: boolean;
}

function matches(fields: string[], search: string): boolean {
  const needle = search.trim().toLowerCase();
  if (!needle) return true;
  return fields.some((field) => field.toLowerCase().includes(needle));
}

export function filterWindowScores(rows: readonly WindowScore[], search = ''): WindowScore[] {
  return rows.filter((row) => matches([row.windowId, row.score, row.cluster], search));
}

// With both status flags (or neither) every status passes.
export function filterCandidates(rows: readonly Candidate[], filter: ResultFilter = {}): Candidate[] {
  const statuses = new Set<CandidateStatus>();
  if (filter.onlyRfi) statuses.add('RFI');
  if (filter.onlyInteresting) statuses.add('Interesting');

  return rows.filter((row) => {
    if (statuses.size === 1 && !statuses.has(row.status)) return false;
    return matches([row.id, row.frequency, row.status], filter.search ?? '');
  });
}

export function hasActiveFilter(filter: ResultFilter): boolean {
  return Boolean(filter.search?.trim() || filter.onlyRfi || filter.onlyInteresting);
}

/** Copy of `result` with both tables narrowed by `filter`. */
export function filterResult(result: AnalysisResult, filter: ResultFilter): AnalysisResult {
  if (!hasActiveFilter(filter)) return result;
  return {
    ...result,
    windowScores: filterWindowScores(result.windowScores, filter.search),
    candidates: filterCandidates(result.candidates, filter),
  };
}
