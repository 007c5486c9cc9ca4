/**
 * Public hostname discovery for a route when none was configured
 */

import type { ClusterClient } from '../kubernetes/cluster-client.js';
import { getComponentLogger } from '../logging/index.js';
import { isRecord } from '../types/kubernetes.js';
import { errorMessage } from '../utils/error-helpers.js';

const logger = getComponentLogger('hostname');

export const ROUTE_API_VERSION = 'route.openshift.io/v1';

function routeHost(object: unknown): string | undefined {
  if (isRecord(object) && isRecord(object.spec) && typeof object.spec.host === 'string') {
    return object.spec.host || undefined;
  }
  return undefined;
}

/**
 * Find the wildcard apps domain of the cluster: the ingress config domain
 * when readable, else the domain of any existing route.
 */
export async function detectAppsDomain(client: ClusterClient): Promise<string | undefined> {
  try {
    const ingress = await client.read({
      apiVersion: 'config.openshift.io/v1',
      kind: 'Ingress',
      name: 'cluster',
    });
    if (ingress && isRecord(ingress.spec) && typeof ingress.spec.domain === 'string' && ingress.spec.domain) {
      return ingress.spec.domain;
    }
  } catch (error) {
    logger.debug('Cluster ingress config not readable', { error: errorMessage(error) });
  }

  const routes = await client.list(ROUTE_API_VERSION, 'Route');
  for (const route of routes) {
    const host = routeHost(route);
    const dot = host?.indexOf('.') ?? -1;
    if (host && dot > 0) {
      return host.slice(dot + 1);
    }
  }
  return undefined;
}

/**
 * Resolve the hostname for `routeName` in `namespace`.
 *
 * An explicit hostname wins; otherwise the host of the existing route is
 * kept, and a new route gets `<hostPrefix>-<namespace>.<apps domain>`.
 */
export async function resolveHostname(
  client: ClusterClient,
  namespace: string,
  routeName: string,
  explicit?: string,
  hostPrefix: string = routeName
): Promise<string | undefined> {
  if (explicit) {
    return explicit;
  }

  const existing = routeHost(
    await client.read({ apiVersion: ROUTE_API_VERSION, kind: 'Route', name: routeName, namespace })
  );
  if (existing) {
    logger.info('Using hostname of existing route', { route: routeName, hostname: existing });
    return existing;
  }

  const domain = await detectAppsDomain(client);
  if (!domain) {
    logger.warn('Could not detect the cluster apps domain', { route: routeName, namespace });
    return undefined;
  }

  const hostname = `${hostPrefix}-${namespace}.${domain}`;
  logger.info('Derived hostname from the cluster apps domain', { hostname });
  return hostname;
}
