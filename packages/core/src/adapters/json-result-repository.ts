import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isAnalysisResult, type AnalysisResult } from '../domain/analysis/analysis-result.js';
import type { ResultRepository, ResultSummary } from '../ports/result-repository.js';
import { SetiAnalyzerError } from '../shared/errors.js';

const RUN_ID_PATTERN = /^[A-Za-z0-9-]+$/;

export class JsonResultRepository implements ResultRepository {
  constructor(private readonly resultsDir: string) {}

  private get runsDir(): string {
    return join(this.resultsDir, 'runs');
  }

  private async ensureRunsDir(): Promise<string> {
    const dir = this.runsDir;
    await mkdir(dir, { recursive: true });
    return dir;
  }

  private async readResult(filePath: string): Promise<AnalysisResult> {
    const data: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    if (!isAnalysisResult(data)) {
      throw new SetiAnalyzerError(`Malformed result file: ${filePath}`, 'RESULT_MALFORMED');
    }
    return data;
  }

  async save(result: AnalysisResult): Promise<string> {
    const dir = await this.ensureRunsDir();
    const filePath = join(dir, `${result.id}.json`);
    await writeFile(filePath, JSON.stringify(result, null, 2), 'utf-8');
    return filePath;
  }

  async load(id: string): Promise<AnalysisResult> {
    if (!RUN_ID_PATTERN.test(id)) {
      throw new SetiAnalyzerError(`Invalid result id: ${id}`, 'RESULT_NOT_FOUND');
    }
    const dir = await this.ensureRunsDir();
    try {
      return await this.readResult(join(dir, `${id}.json`));
    } catch (err) {
      if (err instanceof SetiAnalyzerError) throw err;
      throw new SetiAnalyzerError(`Result not found: ${id}`, 'RESULT_NOT_FOUND');
    }
  }

  async list(): Promise<ResultSummary[]> {
    const dir = await this.ensureRunsDir();
    const files = (await readdir(dir)).filter((f) => f.endsWith('.json')).sort();

    const settled = await Promise.allSettled(files.map((file) => this.readResult(join(dir, file))));
    const summaries: ResultSummary[] = [];
    for (const entry of settled) {
      if (entry.status !== 'fulfilled') continue;
      const result = entry.value;
      summaries.push({
        id: result.id,
        createdAt: result.createdAt,
        inputPath: result.inputPath,
        preset: result.preset,
        status: result.status,
        candidateCount: result.candidates.length,
      });
    }

    summaries.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return summaries;
  }
}
