import type { BinderyConfig } from './types/config.js';
import type { HostCompatibility } from './types/source.js';

/** Native module ABI of the running Node.js build. */
export const HOST_ABI_TAG = `node-abi-${process.versions.modules}`;

/** Revision of the extension interface this host implements. */
export const HOST_CONTRACT_VERSION = '1.0.0';

export const HOST_COMPATIBILITY: HostCompatibility = {
  abiTag: HOST_ABI_TAG,
  contractVersion: HOST_CONTRACT_VERSION,
};

export const INDEX_FILE = 'index.json';
export const LIBRARY_DIR = 'library';

export const BINDERY_VERSION = '0.3.0';

export const DEFAULT_CONFIG: BinderyConfig = {
  extensions: {
    dir: '.bindery/extensions',
    indexTimeoutMs: 30_000,
    updateStrategy: 'replace',
  },
  server: {
    port: 4646,
    host: '127.0.0.1',
  },
  logging: {
    level: 'info',
  },
};
