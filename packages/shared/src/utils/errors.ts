export type BinderyErrorCode =
  | 'RepoUnreachable'
  | 'MalformedIndex'
  | 'NotFoundInIndex'
  | 'NotFound'
  | 'AlreadyInstalled'
  | 'IncompatibleVersion'
  | 'NoNewVersion'
  | 'VersionParseError'
  | 'ExecutionError'
  | 'ProtocolError'
  | 'ConfigError';

export class BinderyError extends Error {
  constructor(
    public readonly code: BinderyErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BinderyError';
  }
}

export class RepoUnreachableError extends BinderyError {
  constructor(
    public readonly repoUrl: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super('RepoUnreachable', `repository unreachable: ${reason}`, options);
    this.name = 'RepoUnreachableError';
  }
}

export class MalformedIndexError extends BinderyError {
  constructor(
    public readonly repoUrl: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super('MalformedIndex', `malformed repository index: ${reason}`, options);
    this.name = 'MalformedIndexError';
  }
}

export class NotFoundInIndexError extends BinderyError {
  constructor(public readonly sourceId: number) {
    super('NotFoundInIndex', `source ${sourceId} not found in repository index`);
    this.name = 'NotFoundInIndexError';
  }
}

export class SourceNotFoundError extends BinderyError {
  constructor(public readonly sourceId: number) {
    super('NotFound', `source ${sourceId} not found`);
    this.name = 'SourceNotFoundError';
  }
}

export class AlreadyInstalledError extends BinderyError {
  constructor(public readonly sourceId: number) {
    super('AlreadyInstalled', 'source installed, use update to update');
    this.name = 'AlreadyInstalledError';
  }
}

export class IncompatibleVersionError extends BinderyError {
  constructor(
    public readonly sourceId: number,
    public readonly abiTag: string,
    public readonly contractVersion: string,
  ) {
    super('IncompatibleVersion', 'incompatible version, update the server');
    this.name = 'IncompatibleVersionError';
  }
}

export class NoNewVersionError extends BinderyError {
  constructor(
    public readonly sourceId: number,
    public readonly installedVersion: string,
    public readonly remoteVersion: string,
  ) {
    super('NoNewVersion', 'no new version');
    this.name = 'NoNewVersionError';
  }
}

export class VersionParseError extends BinderyError {
  constructor(public readonly input: string) {
    super('VersionParseError', `invalid version: ${input}`);
    this.name = 'VersionParseError';
  }
}

export class ExecutionError extends BinderyError {
  constructor(
    public readonly sourceId: number,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super('ExecutionError', `extension error: ${reason}`, options);
    this.name = 'ExecutionError';
  }
}

export class ProtocolError extends BinderyError {
  constructor(
    public readonly sourceId: number,
    reason: string,
  ) {
    super('ProtocolError', `extension returned malformed data: ${reason}`);
    this.name = 'ProtocolError';
  }
}

export class ConfigError extends BinderyError {
  constructor(message: string) {
    super('ConfigError', `Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
