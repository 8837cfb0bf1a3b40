import { existsSync } from 'node:fs';
import { ARTIFACT_KINDS, type ArtifactKind, type ArtifactSet } from '@seti-analyzer/core';

export const ARTIFACT_LABELS: Record<ArtifactKind, { title: string; fallback: string }> = {
  waterfall: { title: 'Waterfall', fallback: 'No waterfall preview' },
  activity: { title: 'Activity map', fallback: 'No activity map' },
  windowPreview: { title: 'Window preview', fallback: 'No window preview' },
  candidatePreview: { title: 'Candidate preview', fallback: 'No candidate preview' },
};

export interface ArtifactLine {
  kind: ArtifactKind;
  title: string;
  /** The file path, or the fallback text when the preview is absent. */
  text: string;
  present: boolean;
}

/**
 * One line per preview in display order. A path that no longer exists on
 * disk reads the same as an absent preview.
 */
export function describeArtifacts(
  artifacts: Readonly<ArtifactSet>,
  exists: (path: string) => boolean = existsSync,
): ArtifactLine[] {
  return ARTIFACT_KINDS.map((kind) => {
    const { title, fallback } = ARTIFACT_LABELS[kind];
    const path = artifacts[kind];
    const present = path !== null && exists(path);
    return { kind, title, text: present ? path : fallback, present };
  });
}
