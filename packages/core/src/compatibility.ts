import semver from 'semver';
import type { SemVer } from 'semver';
import {
  type HostCompatibility,
  type RemoteSourceDescriptor,
  HOST_COMPATIBILITY,
  VersionParseError,
} from '@bindery/shared';

/**
 * Parse a dotted `major.minor.patch[-prerelease][+build]` version.
 * Partial forms such as `1.2` are rejected.
 */
export function parseVersion(input: string): SemVer {
  try {
    return new semver.SemVer(input);
  } catch {
    throw new VersionParseError(input);
  }
}

/**
 * A package is loadable only when both tags match the host exactly.
 * No range matching: a different ABI or contract revision is never close enough.
 */
export function isCompatible(
  descriptor: Pick<RemoteSourceDescriptor, 'abiTag' | 'contractVersion'>,
  host: HostCompatibility = HOST_COMPATIBILITY,
): boolean {
  return descriptor.abiTag === host.abiTag && descriptor.contractVersion === host.contractVersion;
}

/** True iff `remote` is strictly greater than `installed`. */
export function hasNewer(installed: string, remote: string): boolean {
  const installedVersion = parseVersion(installed);
  const remoteVersion = parseVersion(remote);
  return remoteVersion.compare(installedVersion) > 0;
}
