import { InputValidationError } from '../../shared/errors.js';

export interface RunRequest {
  inputPath: string;
  preset: string;
}

export function validateRunRequest(request: RunRequest): RunRequest {
  const inputPath = request.inputPath.trim();
  const preset = request.preset.trim();
  if (!inputPath) {
    throw new InputValidationError('No input file selected. Provide a path to the file to analyze.');
  }
  if (!preset) {
    throw new InputValidationError('No analysis preset selected.');
  }
  return { inputPath, preset };
}
