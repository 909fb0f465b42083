import type { Payload } from '../types/request.js';

/** Payload kind an endpoint accepts. */
export type PayloadKind = Payload['kind'];

/** Definition of a single service endpoint. */
export interface EndpointDefinition {
  path: string;
  payload: PayloadKind;
}

/**
 * Every endpoint of the Traceix service. All are called with POST.
 */
export const endpoints = {
  upload: { path: '/api/traceix/v1/upload', payload: 'file' },
  status: { path: '/api/v1/traceix/status', payload: 'json' },
  capaSearch: { path: '/api/traceix/v1/capa/search', payload: 'json' },
  exifSearch: { path: '/api/traceix/v1/exif/search', payload: 'json' },
  capa: { path: '/api/traceix/v1/capa', payload: 'file' },
  exif: { path: '/api/traceix/v1/exif', payload: 'file' },
  ipfsList: { path: '/api/traceix/v1/ipfs/listall', payload: 'none' },
  ipfsSearch: { path: '/api/traceix/v1/ipfs/search', payload: 'json' },
  ipfsFind: { path: '/api/traceix/v1/ipfs/find', payload: 'json' },
} as const satisfies Record<string, EndpointDefinition>;

/** Name of an endpoint in {@link endpoints}. */
export type EndpointName = keyof typeof endpoints;

/** Payload accepted by a given endpoint. */
export type PayloadFor<Endpoint extends EndpointName> = Extract<
  Payload,
  { kind: (typeof endpoints)[Endpoint]['payload'] }
>;

/** Search types indexed by hash search, mapped to their endpoint. */
export const searchEndpoints = {
  capa: 'capaSearch',
  exif: 'exifSearch',
} as const satisfies Record<string, EndpointName>;

/** Search type accepted by hash search. */
export type SearchKind = keyof typeof searchEndpoints;

/** Narrows an arbitrary value to a {@link SearchKind}. */
export function isSearchKind(value: unknown): value is SearchKind {
  return typeof value === 'string' && Object.hasOwn(searchEndpoints, value);
}
