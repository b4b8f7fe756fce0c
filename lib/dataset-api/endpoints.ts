/**
 * Endpoint catalog
 *
 * Every operation discovers the deployment's API shape by trying an ordered
 * list of candidates. The lists live here as data and are interpreted by
 * `probe` (see http/probe.ts).
 */

import type { HttpMethod } from './types';

export interface EndpointCandidate {
  method: HttpMethod;
  /** Path template; `{id}` is replaced with the URL-encoded dataset identifier */
  path: string;
  /** Statuses that count as success for this candidate */
  accept: readonly number[];
}

export interface EndpointCatalog {
  auth: readonly EndpointCandidate[];
  list: readonly EndpointCandidate[];
  fetch: readonly EndpointCandidate[];
  upsert: readonly EndpointCandidate[];
  delete: EndpointCandidate;
}

export const DEFAULT_ENDPOINTS: EndpointCatalog = {
  auth: [
    { method: 'POST', path: '/auth/login', accept: [200, 201] },
    { method: 'POST', path: '/authenticate', accept: [200, 201] },
    { method: 'POST', path: '/auth', accept: [200, 201] },
  ],
  list: [
    { method: 'POST', path: '/dataset/list', accept: [200] },
    { method: 'GET', path: '/datasets', accept: [200] },
    { method: 'GET', path: '/data/datasets', accept: [200] },
    { method: 'GET', path: '/api/datasets', accept: [200] },
  ],
  fetch: [
    { method: 'GET', path: '/dataset/get/{id}', accept: [200] },
    { method: 'GET', path: '/datasets/{id}', accept: [200] },
    { method: 'GET', path: '/data/datasets/{id}', accept: [200] },
    { method: 'GET', path: '/api/datasets/{id}', accept: [200] },
  ],
  upsert: [
    { method: 'PUT', path: '/datasets/{id}', accept: [200, 201] },
    { method: 'POST', path: '/datasets', accept: [200, 201] },
    { method: 'POST', path: '/datasets/{id}/upsert', accept: [200, 201] },
  ],
  delete: { method: 'DELETE', path: '/datasets/{id}', accept: [200, 204] },
};

/**
 * Fill the `{id}` placeholder of a path template
 */
export function resolvePath(template: string, identifier?: string): string {
  if (identifier === undefined) {
    return template;
  }
  return template.split('{id}').join(encodeURIComponent(identifier));
}
