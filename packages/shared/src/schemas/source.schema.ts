import { z } from 'zod';
import type { RemoteSourceDescriptor } from '../types/source.js';

/** One entry of a repository `index.json`, in its wire (snake_case) form. */
export const manifestEntrySchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  url: z.string(),
  version: z.string(),
  abi_tag: z.string(),
  contract_version: z.string(),
  icon: z.string(),
});

export const sourceIndexSchema = z.array(manifestEntrySchema);

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;

export function descriptorFromManifest(entry: ManifestEntry): RemoteSourceDescriptor {
  return {
    id: entry.id,
    name: entry.name,
    url: entry.url,
    version: entry.version,
    abiTag: entry.abi_tag,
    contractVersion: entry.contract_version,
    icon: entry.icon,
  };
}

export function descriptorToManifest(descriptor: RemoteSourceDescriptor): ManifestEntry {
  return {
    id: descriptor.id,
    name: descriptor.name,
    url: descriptor.url,
    version: descriptor.version,
    abi_tag: descriptor.abiTag,
    contract_version: descriptor.contractVersion,
    icon: descriptor.icon,
  };
}
