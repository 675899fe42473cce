/** Metadata of one source package, as loaded into the registry. */
export interface SourceInfo {
  id: number;
  name: string;
  url: string;
  version: string;
  abiTag: string;
  contractVersion: string;
  icon: string;
}

/** Installed or available source as reported to callers. `hasUpdate` is never stored. */
export interface Source extends SourceInfo {
  hasUpdate: boolean;
}

/**
 * Entry of a repository manifest. Same shape as {@link SourceInfo}, but
 * untrusted and never persisted by the core.
 */
export type RemoteSourceDescriptor = SourceInfo;

/** Host identity a package must match exactly to be loadable. */
export interface HostCompatibility {
  abiTag: string;
  contractVersion: string;
}

export type UpdateStrategy = 'replace' | 'stage';
