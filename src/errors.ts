export type CtxtermErrorCode =
  | 'ACCESS_DENIED'
  | 'NOT_FOUND'
  | 'WRONG_TYPE'
  | 'READ_FAILURE'
  | 'REMOTE_CALL_FAILURE'
  | 'CONFIG';

type CtxtermErrorInput = {
  code: CtxtermErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
};

export class CtxtermError extends Error {
  readonly code: CtxtermErrorCode;
  readonly path?: string;

  constructor({ code, message, path, cause }: CtxtermErrorInput) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CtxtermError';
    this.code = code;
    this.path = path;
  }
}

export function isCtxtermError(error: unknown): error is CtxtermError {
  return error instanceof CtxtermError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const accessDenied = (path: string): CtxtermError =>
  new CtxtermError({
    code: 'ACCESS_DENIED',
    message: 'Access denied: outside home directory',
    path,
  });

export const notFound = (path: string, what = 'Path'): CtxtermError =>
  new CtxtermError({ code: 'NOT_FOUND', message: `${what} not found: ${path}`, path });

export const wrongType = (path: string, expected: 'file' | 'directory'): CtxtermError =>
  new CtxtermError({
    code: 'WRONG_TYPE',
    message: `Not a ${expected}: ${path}`,
    path,
  });

export const readFailure = (path: string, cause: unknown): CtxtermError =>
  new CtxtermError({
    code: 'READ_FAILURE',
    message: `Failed to read ${path}: ${errorMessage(cause)}`,
    path,
    cause,
  });

export const remoteCallFailure = (message: string, cause?: unknown): CtxtermError =>
  new CtxtermError({ code: 'REMOTE_CALL_FAILURE', message, cause });

export const configError = (message: string): CtxtermError =>
  new CtxtermError({ code: 'CONFIG', message });
