import { capitalize } from '../../text';

import {
  bbbProfile,
  chamberOfCommerceProfile,
  foursquareProfile,
  mantaProfile,
  superpagesProfile,
  yellowPagesProfile,
  yelpProfile,
} from './profiles';
import type { CitationFields, ConfiguredDirectory, DirectoryProfile } from './types';

export type { CitationFields, ConfiguredDirectory, DirectoryProfile } from './types';

const profiles: DirectoryProfile[] = [
  yelpProfile,
  yellowPagesProfile,
  bbbProfile,
  foursquareProfile,
  mantaProfile,
  superpagesProfile,
  chamberOfCommerceProfile,
];

const profilesById = new Map(profiles.map((p) => [p.id, p]));

function defaultProfile(id: string): DirectoryProfile {
  const name = capitalize(id);
  return {
    id,
    name,
    searchParam: 'q',
    formatCitation: ({ name: business, address, phone }: CitationFields) =>
      `${business}\n${address}\n${phone}\n\nDirectory: ${name}`,
  };
}

/**
 * Profiles are keyed by the short id; a host-qualified id such as "yelp.ca"
 * reuses the "yelp" profile under its own id and a name that tells it apart.
 */
export function getDirectoryProfile(id: string): DirectoryProfile {
  const known = profilesById.get(id) ?? profilesById.get(id.split('.')[0]);
  if (!known) return defaultProfile(id);
  if (known.id === id) return known;
  return { ...known, id, name: `${known.name} (${id})` };
}

function directoryHost(baseUrl: string): string {
  return new URL(baseUrl).hostname.toLowerCase().replace(/^www\./, '');
}

/**
 * "https://www.yelp.com" -> "yelp", "https://tupalo.com/" -> "tupalo".
 */
export function directoryIdFromUrl(baseUrl: string): string {
  return directoryHost(baseUrl).split('.')[0];
}

/**
 * One directory per configured URL, each with a distinct id. The short id is
 * kept unless another URL shares it; those fall back to the host without
 * "www.", and a repeated host gets "-2", "-3", ...
 */
export function resolveDirectories(baseUrls: string[]): ConfiguredDirectory[] {
  const shortIds = baseUrls.map(directoryIdFromUrl);
  const taken = new Set<string>();

  return baseUrls.map((baseUrl, i) => {
    const shared = shortIds.filter((id) => id === shortIds[i]).length > 1;
    const base = shared ? directoryHost(baseUrl) : shortIds[i];
    let id = base;
    for (let n = 2; taken.has(id); n += 1) id = `${base}-${n}`;
    taken.add(id);
    return { id, name: getDirectoryProfile(id).name, baseUrl };
  });
}

export function buildSearchUrl(directory: ConfiguredDirectory, query: string): string {
  const base = directory.baseUrl.replace(/\/+$/, '');
  const params = new URLSearchParams({ [getDirectoryProfile(directory.id).searchParam]: query });
  return `${base}/search?${params.toString()}`;
}

export function directoryName(id: string): string {
  return getDirectoryProfile(id).name;
}
