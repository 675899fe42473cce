export { createApp, startServer, apiKeyMiddleware } from './app.js';
export { ERROR_STATUS, RequestValidationError, toErrorResponse } from './errors.js';
export type { ErrorBody, ErrorStatus, RequestIssue } from './errors.js';
