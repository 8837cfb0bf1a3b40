export interface HistoryStore {
  /** Most recently used input paths, newest first. */
  list(): Promise<string[]>;
  add(path: string): Promise<string[]>;
  clear(): Promise<void>;
}
