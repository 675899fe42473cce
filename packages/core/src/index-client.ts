import {
  type RemoteSourceDescriptor,
  INDEX_FILE,
  sourceIndexSchema,
  descriptorFromManifest,
  RepoUnreachableError,
  MalformedIndexError,
  NotFoundInIndexError,
  errorMessage,
} from '@bindery/shared';

export interface RemoteIndexClientOptions {
  /** Abort the manifest request after this many ms. Unset means no limit. */
  timeoutMs?: number;
}

export function indexUrl(repoUrl: string): string {
  return `${repoUrl.replace(/\/+$/, '')}/${INDEX_FILE}`;
}

/**
 * Reads a repository's `index.json`. Every call is a fresh request:
 * nothing is cached and nothing is retried.
 */
export class RemoteIndexClient {
  private timeoutMs?: number;

  constructor(options: RemoteIndexClientOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  async fetchIndex(repoUrl: string): Promise<RemoteSourceDescriptor[]> {
    const url = indexUrl(repoUrl);

    let res: Response;
    try {
      res = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
    } catch (err) {
      throw new RepoUnreachableError(repoUrl, errorMessage(err), { cause: err });
    }

    if (!res.ok) {
      throw new RepoUnreachableError(repoUrl, `GET ${url} returned ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new MalformedIndexError(repoUrl, `invalid JSON: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = sourceIndexSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      throw new MalformedIndexError(repoUrl, `${where}: ${issue.message}`);
    }

    return parsed.data.map(descriptorFromManifest);
  }
}

export function findDescriptor(index: RemoteSourceDescriptor[], id: number): RemoteSourceDescriptor {
  const descriptor = index.find(d => d.id === id);
  if (!descriptor) {
    throw new NotFoundInIndexError(id);
  }
  return descriptor;
}
