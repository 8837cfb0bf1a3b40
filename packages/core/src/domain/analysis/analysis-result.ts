export type RunStatus = 'succeeded' | 'failed' | 'cancelled';

export type CandidateStatus = 'RFI' | 'Interesting';

export const CANDIDATE_STATUSES: readonly CandidateStatus[] = ['RFI', 'Interesting'];

export interface MetadataEntry {
  label: string;
  value: string;
}

export interface WindowScore {
  windowId: string;
  score: string;
  cluster: string;
}

export interface Candidate {
  id: string;
  frequency: string;
  status: CandidateStatus;
}

export type ArtifactKind = 'waterfall' | 'activity' | 'windowPreview' | 'candidatePreview';

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ['waterfall', 'activity', 'windowPreview', 'candidatePreview'];

/** Path of each generated preview, or `null` when it was not produced. */
export type ArtifactSet = Record<ArtifactKind, string | null>;

export interface RunIdentity {
  id: string;
  createdAt: string;
  inputPath: string;
  preset: string;
}

export interface ResultPayload {
  metadata: MetadataEntry[];
  windowScores: WindowScore[];
  candidates: Candidate[];
}

export interface AnalysisResult extends Readonly<RunIdentity> {
  readonly status: RunStatus;
  readonly metadata: readonly MetadataEntry[];
  readonly artifacts: Readonly<ArtifactSet>;
  readonly windowScores: readonly WindowScore[];
  readonly candidates: readonly Candidate[];
  /** Set only on failed runs; every payload field is empty when present. */
  readonly errorMessage: string | null;
}

export function emptyArtifacts(): ArtifactSet {
  return { waterfall: null, activity: null, windowPreview: null, candidatePreview: null };
}

function freezeRows<T extends object>(rows: readonly T[]): readonly T[] {
  return Object.freeze(rows.map((row) => Object.freeze({ ...row })));
}

function freezeResult(result: AnalysisResult): AnalysisResult {
  return Object.freeze({
    ...result,
    metadata: freezeRows(result.metadata),
    artifacts: Object.freeze({ ...result.artifacts }),
    windowScores: freezeRows(result.windowScores),
    candidates: freezeRows(result.candidates),
  });
}

export function succeededResult(identity: RunIdentity, payload: ResultPayload, artifacts: ArtifactSet): AnalysisResult {
  return freezeResult({
    ...identity,
    status: 'succeeded',
    metadata: payload.metadata,
    artifacts,
    windowScores: payload.windowScores,
    candidates: payload.candidates,
    errorMessage: null,
  });
}

export function failedResult(identity: RunIdentity, errorMessage: string): AnalysisResult {
  return freezeResult({
    ...identity,
    status: 'failed',
    metadata: [],
    artifacts: emptyArtifacts(),
    windowScores: [],
    candidates: [],
    errorMessage: errorMessage || 'Unknown error',
  });
}

export function cancelledResult(identity: RunIdentity): AnalysisResult {
  return freezeResult({
    ...identity,
    status: 'cancelled',
    metadata: [],
    artifacts: emptyArtifacts(),
    windowScores: [],
    candidates: [],
    errorMessage: null,
  });
}

export function isFailedResult(result: AnalysisResult): boolean {
  return Boolean(result.errorMessage);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringFields(value: unknown, keys: readonly string[]): value is Record<string, string> {
  return isRecord(value) && keys.every((key) => typeof value[key] === 'string');
}

function isArrayOf<T>(value: unknown, guard: (item: unknown) => item is T): value is T[] {
  return Array.isArray(value) && value.every(guard);
}

const isMetadataEntry = (item: unknown): item is MetadataEntry => isStringFields(item, ['label', 'value']);
const isWindowScore = (item: unknown): item is WindowScore =>
  isStringFields(item, ['windowId', 'score', 'cluster']);
const isCandidate = (item: unknown): item is Candidate =>
  isStringFields(item, ['id', 'frequency', 'status']) && (CANDIDATE_STATUSES as readonly string[]).includes(item.status);

function isArtifactSet(value: unknown): value is ArtifactSet {
  return (
    isRecord(value) &&
    ARTIFACT_KINDS.every((kind) => value[kind] === null || typeof value[kind] === 'string')
  );
}

/** Structural check for records read back from disk. */
export function isAnalysisResult(value: unknown): value is AnalysisResult {
  return (
    isStringFields(value, ['id', 'createdAt', 'inputPath', 'preset', 'status']) &&
    ['succeeded', 'failed', 'cancelled'].includes(value.status) &&
    (value.errorMessage === null || typeof value.errorMessage === 'string') &&
    isArrayOf(value.metadata, isMetadataEntry) &&
    isArtifactSet(value.artifacts) &&
    isArrayOf(value.windowScores, isWindowScore) &&
    isArrayOf(value.candidates, isCandidate)
  );
}
