export { isoNow } from './clock.js';
export {
  BinderyError,
  RepoUnreachableError,
  MalformedIndexError,
  NotFoundInIndexError,
  SourceNotFoundError,
  AlreadyInstalledError,
  IncompatibleVersionError,
  NoNewVersionError,
  VersionParseError,
  ExecutionError,
  ProtocolError,
  ConfigError,
  errorMessage,
} from './errors.js';
export type { BinderyErrorCode } from './errors.js';
