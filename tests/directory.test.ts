import { describe, expect, it } from 'vitest';

import {
  buildSearchUrl,
  directoryIdFromUrl,
  directoryName,
  getDirectoryProfile,
  resolveDirectories,
} from '../src/agents/directory';

describe('directory profiles', () => {
  it('derives ids from base URLs', () => {
    expect(directoryIdFromUrl('https://www.yelp.com')).toBe('yelp');
    expect(directoryIdFromUrl('https://www.chamberofcommerce.com')).toBe('chamberofcommerce');
    expect(directoryIdFromUrl('https://tupalo.com/')).toBe('tupalo');
    expect(directoryIdFromUrl('https://www.hotfrog.in')).toBe('hotfrog');
  });

  it('resolves display names, falling back to the capitalised id', () => {
    expect(resolveDirectories(['https://www.bbb.org', 'https://www.mapquest.com'])).toEqual([
      { id: 'bbb', name: 'Better Business Bureau', baseUrl: 'https://www.bbb.org' },
      { id: 'mapquest', name: 'Mapquest', baseUrl: 'https://www.mapquest.com' },
    ]);
    expect(directoryName('yellowpages')).toBe('Yellow Pages');
  });

  it('keeps ids distinct when URLs share a first label', () => {
    const directories = resolveDirectories([
      'https://www.yelp.com',
      'https://www.yelp.ca',
      'https://tupalo.com/',
      'https://tupalo.com/',
      'https://www.bbb.org',
    ]);

    expect(directories.map((d) => d.id)).toEqual(['yelp.com', 'yelp.ca', 'tupalo.com', 'tupalo.com-2', 'bbb']);
    expect(directories.map((d) => d.name)).toEqual([
      'Yelp (yelp.com)',
      'Yelp (yelp.ca)',
      'Tupalo.com',
      'Tupalo.com-2',
      'Better Business Bureau',
    ]);
    expect(buildSearchUrl(directories[1], 'Acme')).toBe('https://www.yelp.ca/search?find_desc=Acme');
  });

  it('builds search URLs with each directory parameter', () => {
    const [yelp, seek] = resolveDirectories(['https://www.yelp.com', 'https://www.businessseek.biz/']);
    expect(buildSearchUrl(yelp, "Joe's Cafe 123 Harbor View Road")).toBe(
      'https://www.yelp.com/search?find_desc=Joe%27s+Cafe+123+Harbor+View+Road'
    );
    expect(buildSearchUrl(seek, 'Acme')).toBe('https://www.businessseek.biz/search?q=Acme');
  });

  it('formats the generic citation for unknown directories', () => {
    const citation = getDirectoryProfile('tupalo').formatCitation({
      name: 'Acme',
      address: '1 Main St',
      phone: '(555) 000-1111',
    });
    expect(citation).toBe('Acme\n1 Main St\n(555) 000-1111\n\nDirectory: Tupalo');
  });
});
