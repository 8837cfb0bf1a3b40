import type { ArtifactKind } from './analysis-result.js';
import { gaussian, type RandomSource } from './random.js';

export interface ArtifactContext {
  inputPath: string;
  preset: string;
  random: RandomSource;
}

/** Produces a complete SVG document for one preview. */
export type ArtifactRenderer = (context: ArtifactContext) => string;

export const ARTIFACT_FILE_NAMES: Record<ArtifactKind, string> = {
  waterfall: 'waterfall.svg',
  activity: 'activity-map.svg',
  windowPreview: 'window-clusters.svg',
  candidatePreview: 'candidate-spectrum.svg',
};

const WIDTH = 640;
const HEIGHT = 320;
const CLUSTER_COLORS = ['#e4572e', '#29335c', '#f3a712', '#669bbc'];

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function svgDocument(title: string, body: string[]): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}">`,
    `<title>${escapeXml(title)}</title>`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#0b0c10"/>`,
    ...body,
    '</svg>',
    '',
  ].join('\n');
}

/** Maps 0..1 onto a blue-to-red hue ramp. */
export function heatColor(value: number): string {
  const clamped = Math.min(1, Math.max(0, value));
  return `hsl(${Math.round(240 - 240 * clamped)},85%,${Math.round(20 + 35 * clamped)}%)`;
}

function heatmap(random: RandomSource, rows: number, cols: number): string[] {
  const cellWidth = WIDTH / cols;
  const cellHeight = HEIGHT / rows;
  const cells: string[] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      cells.push(
        `<rect x="${(col * cellWidth).toFixed(2)}" y="${(row * cellHeight).toFixed(2)}" ` +
          `width="${cellWidth.toFixed(2)}" height="${cellHeight.toFixed(2)}" fill="${heatColor(random())}"/>`,
      );
    }
  }
  return cells;
}

export const renderWaterfall: ArtifactRenderer = ({ inputPath, random }) =>
  svgDocument(`Waterfall: ${inputPath}`, heatmap(random, 48, 64));

export const renderActivityMap: ArtifactRenderer = ({ inputPath, random }) =>
  svgDocument(`Activity map: ${inputPath}`, heatmap(random, 16, 32));

export const SPECTRUM_BINS = 256;
export const SPECTRUM_PEAKS: readonly { bin: number; amplitude: number }[] = [
  { bin: 40, amplitude: 0.55 },
  { bin: 97, amplitude: 0.8 },
  { bin: 171, amplitude: 0.45 },
  { bin: 222, amplitude: 0.7 },
];

/** Noise floor plus narrow Gaussian peaks at {@link SPECTRUM_PEAKS}. */
export function spectrumLevels(random: RandomSource, bins = SPECTRUM_BINS): number[] {
  return Array.from({ length: bins }, (_, bin) => {
    const floor = 0.08 + 0.04 * random();
    const peaks = SPECTRUM_PEAKS.reduce(
      (sum, peak) => sum + peak.amplitude * Math.exp(-((bin - peak.bin) ** 2) / 8),
      0,
    );
    return Math.min(1, floor + peaks);
  });
}

export const renderCandidateSpectrum: ArtifactRenderer = ({ inputPath, random }) => {
  const levels = spectrumLevels(random);
  const step = WIDTH / (levels.length - 1);
  const points = levels
    .map((level, i) => `${(i * step).toFixed(2)},${(HEIGHT - level * (HEIGHT - 20)).toFixed(2)}`)
    .join(' ');
  return svgDocument(`Candidate spectrum: ${inputPath}`, [
    `<polyline points="${points}" fill="none" stroke="#66fcf1" stroke-width="1.5"/>`,
  ]);
};

export const renderWindowClusters: ArtifactRenderer = ({ inputPath, random }) => {
  const points: string[] = [];
  CLUSTER_COLORS.forEach((color, cluster) => {
    const centerX = WIDTH * (0.2 + 0.2 * cluster);
    const centerY = HEIGHT * (0.3 + 0.4 * random());
    for (let i = 0; i < 40; i++) {
      const x = gaussian(random, centerX, 28);
      const y = gaussian(random, centerY, 22);
      points.push(`<circle cx="${x.toFixed(2)}" cy="${y.toFixed(2)}" r="3" fill="${color}" fill-opacity="0.8"/>`);
    }
  });
  return svgDocument(`Window clusters: ${inputPath}`, points);
};

export const DEFAULT_ARTIFACT_RENDERERS: Record<ArtifactKind, ArtifactRenderer> = {
  waterfall: renderWaterfall,
  activity: renderActivityMap,
  windowPreview: renderWindowClusters,
  candidatePreview: renderCandidateSpectrum,
};
