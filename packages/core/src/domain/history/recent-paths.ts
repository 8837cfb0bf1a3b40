export const HISTORY_LIMIT = 10;

/** Moves `path` to the front, dropping duplicates and anything past `limit`. */
export function pushRecentPath(paths: readonly string[], path: string, limit = HISTORY_LIMIT): string[] {
  return [path, ...paths.filter((existing) => existing !== path)].slice(0, limit);
}

export function isPathList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
