// Domain types
export type {
  AnalysisResult,
  ArtifactKind,
  ArtifactSet,
  Candidate,
  CandidateStatus,
  MetadataEntry,
  ResultPayload,
  RunIdentity,
  RunStatus,
  WindowScore,
} from './domain/analysis/analysis-result.js';
export {
  ARTIFACT_KINDS,
  CANDIDATE_STATUSES,
  cancelledResult,
  emptyArtifacts,
  failedResult,
  isAnalysisResult,
  isFailedResult,
  succeededResult,
} from './domain/analysis/analysis-result.js';
export type { ArtifactContext, ArtifactRenderer } from './domain/analysis/artifacts.js';
export { ARTIFACT_FILE_NAMES, DEFAULT_ARTIFACT_RENDERERS } from './domain/analysis/artifacts.js';
export type { ResultFilter } from './domain/analysis/filters.js';
export { filterCandidates, filterResult, filterWindowScores, hasActiveFilter } from './domain/analysis/filters.js';
export type { AnalysisPreset } from './domain/analysis/presets.js';
export { ANALYSIS_PRESETS, DEFAULT_PRESET_ID, resolvePreset } from './domain/analysis/presets.js';
export type { RunRequest } from './domain/analysis/run-request.js';
export { validateRunRequest } from './domain/analysis/run-request.js';
export type { StageDefinition } from './domain/analysis/stages.js';
export {
  ANALYSIS_STAGES,
  DEFAULT_STAGE_DELAY_MS,
  DEFAULT_SUB_STEPS,
  DONE_STAGE,
  stageBounds,
  stageProgressSteps,
} from './domain/analysis/stages.js';
export { buildStubPayload } from './domain/analysis/stub-payload.js';
export { HISTORY_LIMIT, pushRecentPath } from './domain/history/recent-paths.js';
export type { AnalysisSettings, SettingKey, Theme } from './domain/settings/analysis-settings.js';
export { DEFAULT_SETTINGS, SETTING_KEYS, THEMES, applySetting, normalizeSettings } from './domain/settings/analysis-settings.js';
export { AnalysisRunner, pacedStageWork } from './domain/runner/analysis-runner.js';
export type { AnalysisRunnerOptions, RunHandle, RunnerState, StageWork, StageWorkContext } from './domain/runner/analysis-runner.js';
export { RunEventChannel } from './domain/runner/event-channel.js';

// Port interfaces
export type { AnalysisEvents } from './ports/analysis-events.js';
export type { HistoryStore } from './ports/history-store.js';
export type { ResultRepository, ResultSummary } from './ports/result-repository.js';
export type { SettingsStore } from './ports/settings-store.js';

// Adapters
export { JsonHistoryStore } from './adapters/json-history-store.js';
export { JsonResultRepository } from './adapters/json-result-repository.js';
export { JsonSettingsStore } from './adapters/json-settings-store.js';

// Application services
export { AnalysisService } from './services/analysis-service.js';
export type { AnalysisDeps } from './services/analysis-service.js';
export { ConfigService, LOG_FILE_NAME } from './services/config-service.js';
export type { AnalysisConfig } from './services/config-service.js';

// Shared
export { consoleSink, createFileSink, createLogger, formatLogLine, getLogLevel, isLogLevel, setLogLevel } from './shared/logger.js';
export type { LogLevel, LogSink, Logger, LoggerOptions } from './shared/logger.js';
export {
  ArtifactError,
  ConfigError,
  InputValidationError,
  RunnerBusyError,
  SetiAnalyzerError,
} from './shared/errors.js';
