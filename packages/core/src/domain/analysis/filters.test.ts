import { describe, expect, it } from 'vitest';
import { succeededResult } from './analysis-result.js';
import { filterCandidates, filterResult, filterWindowScores, hasActiveFilter } from './filters.js';
import { buildStubPayload } from './stub-payload.js';

const payload = buildStubPayload({ inputPath: '/data/sample.dat', preset: 'DBSCAN (fast)' });

describe('filterCandidates', () => {
  it('should keep every row without a filter', () => {
    expect(filterCandidates(payload.candidates)).toHaveLength(8);
  });

  it('should keep only RFI rows', () => {
    const rows = filterCandidates(payload.candidates, { onlyRfi: true });
    expect(rows.map((r) => r.id)).toEqual(['C-00', 'C-02', 'C-04', 'C-06']);
  });

  it('should keep only interesting rows', () => {
    const rows = filterCandidates(payload.candidates, { onlyInteresting: true });
    expect(rows.map((r) => r.id)).toEqual(['C-01', 'C-03', 'C-05', 'C-07']);
  });

  it('should treat both status flags as no status restriction', () => {
    expect(filterCandidates(payload.candidates, { onlyRfi: true, onlyInteresting: true })).toHaveLength(8);
  });

  it('should search id, frequency and status case-insensitively', () => {
    expect(filterCandidates(payload.candidates, { search: '1421.' }).map((r) => r.id)).toEqual(['C-02', 'C-03']);
    expect(filterCandidates(payload.candidates, { search: 'c-07' }).map((r) => r.id)).toEqual(['C-07']);
    expect(filterCandidates(payload.candidates, { search: 'interest', onlyRfi: true })).toEqual([]);
  });
});

describe('filterWindowScores', () => {
  it('should match window id or score', () => {
    expect(filterWindowScores(payload.windowScores, '003').map((w) => w.windowId)).toEqual(['003']);
    expect(filterWindowScores(payload.windowScores, '88%').map((w) => w.windowId)).toEqual(['002']);
    expect(filterWindowScores(payload.windowScores, '  ')).toHaveLength(5);
  });
});

describe('filterResult', () => {
  const identity = { id: 'r1', createdAt: '2026-01-01T00:00:00.000Z', inputPath: 'sample.dat', preset: 'A' };
  const result = succeededResult(identity, payload, {
    waterfall: null,
    activity: null,
    windowPreview: null,
    candidatePreview: null,
  });

  it('should return the same record when no filter is active', () => {
    expect(hasActiveFilter({ search: ' ' })).toBe(false);
    expect(filterResult(result, {})).toBe(result);
  });

  it('should narrow both tables and keep the rest', () => {
    const filtered = filterResult(result, { search: 'e' });
    expect(filtered.windowScores).toEqual([]);
    expect(filtered.candidates.map((c) => c.id)).toEqual(['C-01', 'C-03', 'C-05', 'C-07']);
    expect(filtered.metadata).toBe(result.metadata);
  });
});
