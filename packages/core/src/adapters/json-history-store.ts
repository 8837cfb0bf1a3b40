import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { HISTORY_LIMIT, isPathList, pushRecentPath } from '../domain/history/recent-paths.js';
import type { HistoryStore } from '../ports/history-store.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('history-store');

export class JsonHistoryStore implements HistoryStore {
  constructor(
    private readonly configDir: string,
    private readonly limit = HISTORY_LIMIT,
  ) {}

  get historyPath(): string {
    return join(this.configDir, 'history.json');
  }

  async list(): Promise<string[]> {
    let data: string;
    try {
      data = await readFile(this.historyPath, 'utf-8');
    } catch {
      return [];
    }
    try {
      const parsed: unknown = JSON.parse(data);
      if (isPathList(parsed)) return parsed.slice(0, this.limit);
      log.warn(`list: ${this.historyPath} is not a list of paths, ignoring it`);
    } catch {
      log.warn(`list: ${this.historyPath} holds malformed JSON, ignoring it`);
    }
    return [];
  }

  async add(path: string): Promise<string[]> {
    const paths = pushRecentPath(await this.list(), path, this.limit);
    await this.write(paths);
    return paths;
  }

  async clear(): Promise<void> {
    await this.write([]);
  }

  private async write(paths: string[]): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.historyPath, JSON.stringify(paths, null, 2), 'utf-8');
  }
}
