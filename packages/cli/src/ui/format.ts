/** Fixed-width bar such as `██████░░░░  60%`. */
export function formatProgressBar(percent: number, width = 24): string {
  const clamped = Math.min(100, Math.max(0, Math.trunc(percent)));
  const filled = Math.round((clamped / 100) * width);
  return `${'█'.repeat(filled)}${'░'.repeat(width - filled)} ${String(clamped).padStart(3)}%`;
}

/** Left-aligned text table with a dashed rule under the header. */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((header, i) => Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)));
  const line = (cells: readonly string[]) =>
    widths
      .map((width, i) => (cells[i] ?? '').padEnd(width))
      .join('  ')
      .trimEnd();
  return [line(headers), widths.map((width) => '-'.repeat(width)).join('  '), ...rows.map(line)];
}

export function formatDate(iso: string): string {
  return new Date(iso).toLocaleString();
}
