import { ProcessLaunchError } from '../errors/custom-errors.js';

/**
 * Fields execa sets on the error of a failed subprocess
 */
export type SubprocessFailure = Error & {
  exitCode?: number;
  isCanceled?: boolean;
  isTerminated?: boolean;
  code?: string;
  stderr?: unknown;
  shortMessage?: string;
};

const LAUNCH_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'ENOTDIR']);

export function isSubprocessFailure(error: unknown): error is SubprocessFailure {
  return error instanceof Error && ('exitCode' in error || 'isCanceled' in error || 'code' in error);
}

/**
 * The binary could not be started at all
 */
export function isLaunchFailure(error: SubprocessFailure): boolean {
  return error.exitCode === undefined && error.code !== undefined && LAUNCH_ERROR_CODES.has(error.code);
}

export function toLaunchError(binary: string, error: SubprocessFailure): ProcessLaunchError {
  const reason = error.code === 'ENOENT' ? 'not found' : 'not executable';
  return new ProcessLaunchError(`Cannot start "${binary}": ${reason} (${error.code})`, binary, { cause: error });
}

/**
 * Last `ERROR:` line of the tool's output, without the prefix
 */
export function lastErrorLine(output: unknown): string | undefined {
  if (typeof output !== 'string') {
    return undefined;
  }

  const lines = output.split(/\r?\n/).filter((line) => line.startsWith('ERROR:'));
  return lines.at(-1)?.slice('ERROR:'.length).trim();
}
