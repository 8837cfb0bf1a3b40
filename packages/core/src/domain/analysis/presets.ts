import { ConfigError } from '../../shared/errors.js';

export interface AnalysisPreset {
  id: string;
  label: string;
  description: string;
}

export const ANALYSIS_PRESETS: readonly AnalysisPreset[] = [
  { id: 'dbscan-fast', label: 'DBSCAN (fast)', description: 'Coarse window clustering for a quick first pass' },
  { id: 'dbscan-precise', label: 'DBSCAN (precise)', description: 'Fine-grained clustering with stricter density limits' },
  { id: 'local-search', label: 'Local search', description: 'Narrow-band search around known candidates' },
  { id: 'spectral', label: 'Spectral analysis', description: 'Full-band spectrum scan for narrowband peaks' },
];

export const DEFAULT_PRESET_ID = 'dbscan-fast';

/** Looks a preset up by id or label, ignoring case and surrounding spaces. */
export function resolvePreset(value: string): AnalysisPreset {
  const needle = value.trim().toLowerCase();
  const preset = ANALYSIS_PRESETS.find(
    (p) => p.id === needle || p.label.toLowerCase() === needle,
  );
  if (!preset) {
    const known = ANALYSIS_PRESETS.map((p) => p.id).join(', ');
    throw new ConfigError(`Unknown preset "${value}". Valid presets: ${known}`);
  }
  return preset;
}
