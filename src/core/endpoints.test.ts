import { describe, expect, it } from 'vitest';
import { endpoints, isSearchKind, searchEndpoints } from './endpoints.js';

describe('endpoints', () => {
  it('maps search kinds to their search endpoints', () => {
    expect(endpoints[searchEndpoints.capa].path).toBe('/api/traceix/v1/capa/search');
    expect(endpoints[searchEndpoints.exif].path).toBe('/api/traceix/v1/exif/search');
  });

  it('uploads files only to the analysis endpoints', () => {
    const fileEndpoints = Object.entries(endpoints)
      .filter(([, definition]) => definition.payload === 'file')
      .map(([name]) => name);

    expect(fileEndpoints).toEqual(['upload', 'capa', 'exif']);
  });
});

describe('isSearchKind', () => {
  it('accepts capa and exif only', () => {
    expect(isSearchKind('capa')).toBe(true);
    expect(isSearchKind('exif')).toBe(true);
    expect(isSearchKind('CAPA')).toBe(false);
    expect(isSearchKind('toString')).toBe(false);
    expect(isSearchKind('')).toBe(false);
    expect(isSearchKind(undefined)).toBe(false);
  });
});
