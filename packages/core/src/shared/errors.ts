export class SetiAnalyzerError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'SetiAnalyzerError';
  }
}

export class ConfigError extends SetiAnalyzerError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class InputValidationError extends SetiAnalyzerError {
  constructor(message: string) {
    super(message, 'INPUT_VALIDATION_ERROR');
    this.name = 'InputValidationError';
  }
}

export class RunnerBusyError extends SetiAnalyzerError {
  constructor(public readonly activeRunId: string) {
    super(`Runner is busy with run ${activeRunId}`, 'RUNNER_BUSY');
    this.name = 'RunnerBusyError';
  }
}

export class ArtifactError extends SetiAnalyzerError {
  constructor(message: string, public readonly artifact?: string) {
    super(message, 'ARTIFACT_ERROR');
    this.name = 'ArtifactError';
  }
}
