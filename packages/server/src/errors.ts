import type { ZodError } from 'zod';
import { type BinderyErrorCode, BinderyError } from '@bindery/shared';

export type ErrorStatus = 400 | 401 | 404 | 409 | 422 | 500 | 502;

export const ERROR_STATUS: Record<BinderyErrorCode, ErrorStatus> = {
  NotFound: 404,
  NotFoundInIndex: 404,
  AlreadyInstalled: 409,
  NoNewVersion: 409,
  IncompatibleVersion: 422,
  VersionParseError: 422,
  RepoUnreachable: 502,
  MalformedIndex: 502,
  ExecutionError: 502,
  ProtocolError: 502,
  ConfigError: 500,
};

export interface RequestIssue {
  path: string;
  message: string;
}

/** A request whose params, query or body failed validation. */
export class RequestValidationError extends Error {
  constructor(readonly issues: RequestIssue[]) {
    super(`Invalid request: ${issues.map(i => `${i.path}: ${i.message}`).join(', ')}`);
    this.name = 'RequestValidationError';
  }

  static fromZod(error: ZodError): RequestValidationError {
    return new RequestValidationError(
      error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
}

export type ErrorBody =
  | { error: BinderyErrorCode | 'Internal'; message: string }
  | { error: 'InvalidRequest'; issues: RequestIssue[] };

export function toErrorResponse(err: unknown): { status: ErrorStatus; body: ErrorBody } {
  if (err instanceof RequestValidationError) {
    return { status: 400, body: { error: 'InvalidRequest', issues: err.issues } };
  }
  if (err instanceof BinderyError) {
    return { status: ERROR_STATUS[err.code], body: { error: err.code, message: err.message } };
  }
  return { status: 500, body: { error: 'Internal', message: 'Internal server error' } };
}
