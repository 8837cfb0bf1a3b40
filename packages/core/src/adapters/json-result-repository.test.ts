import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { emptyArtifacts, failedResult, succeededResult } from '../domain/analysis/analysis-result.js';
import { buildStubPayload } from '../domain/analysis/stub-payload.js';
import { JsonResultRepository } from './json-result-repository.js';

function makeResult(id: string, createdAt: string) {
  const identity = { id, createdAt, inputPath: `/data/${id}.h5`, preset: 'dbscan-fast' };
  return succeededResult(identity, buildStubPayload(identity), emptyArtifacts());
}

describe('JsonResultRepository', () => {
  let dir: string;
  let repo: JsonResultRepository;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seti-results-'));
    repo = new JsonResultRepository(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should save under runs/<id>.json and load the same record back', async () => {
    const result = makeResult('run-1', '2026-02-01T10:00:00.000Z');

    const filePath = await repo.save(result);

    expect(filePath).toBe(join(dir, 'runs', 'run-1.json'));
    expect(await repo.load('run-1')).toEqual(result);
  });

  it('should list summaries newest first', async () => {
    await repo.save(makeResult('older', '2026-02-01T10:00:00.000Z'));
    await repo.save(makeResult('newer', '2026-02-02T10:00:00.000Z'));
    await repo.save(
      failedResult({ id: 'broken', createdAt: '2026-01-01T00:00:00.000Z', inputPath: 'x.h5', preset: 'spectral' }, 'boom'),
    );

    expect(await repo.list()).toEqual([
      { id: 'newer', createdAt: '2026-02-02T10:00:00.000Z', inputPath: '/data/newer.h5', preset: 'dbscan-fast', status: 'succeeded', candidateCount: 8 },
      { id: 'older', createdAt: '2026-02-01T10:00:00.000Z', inputPath: '/data/older.h5', preset: 'dbscan-fast', status: 'succeeded', candidateCount: 8 },
      { id: 'broken', createdAt: '2026-01-01T00:00:00.000Z', inputPath: 'x.h5', preset: 'spectral', status: 'failed', candidateCount: 0 },
    ]);
  });

  it('should skip unreadable files when listing', async () => {
    await repo.save(makeResult('good', '2026-02-01T10:00:00.000Z'));
    await mkdir(join(dir, 'runs'), { recursive: true });
    await writeFile(join(dir, 'runs', 'bad.json'), '{', 'utf-8');
    await writeFile(join(dir, 'runs', 'other.json'), JSON.stringify({ id: 'other' }), 'utf-8');
    await writeFile(join(dir, 'runs', 'notes.txt'), 'ignore me', 'utf-8');

    expect((await repo.list()).map((s) => s.id)).toEqual(['good']);
  });

  it('should report missing and malformed results by code', async () => {
    await mkdir(join(dir, 'runs'), { recursive: true });
    await writeFile(join(dir, 'runs', 'other.json'), JSON.stringify({ id: 'other' }), 'utf-8');

    await expect(repo.load('absent')).rejects.toMatchObject({ code: 'RESULT_NOT_FOUND' });
    await expect(repo.load('other')).rejects.toMatchObject({ code: 'RESULT_MALFORMED' });
  });

  it('should refuse ids that would escape the runs directory', async () => {
    await expect(repo.load('../settings')).rejects.toThrow('Invalid result id: ../settings');
  });
});
