/**
 * Deployment Spec Schemas
 *
 * arktype schemas for the declarative deployment description. The exported
 * spec types are inferred from these schemas so the runtime validator and
 * the compile-time types cannot drift apart.
 */

import { type } from 'arktype';

export const COMPONENT_KINDS = [
  'stateless-app',
  'stateful-db',
  'cache',
  'object-store',
  'route',
] as const;

export const WORKLOAD_KINDS = ['stateless-app', 'stateful-db', 'cache', 'object-store'] as const;

const port = type('1 <= number.integer <= 65535');

export const envBindingSchema = type({
  name: 'string > 0',
  value: 'string',
}).or({
  name: 'string > 0',
  secret: {
    name: 'string > 0',
    key: 'string > 0',
  },
});

const quantities = type({
  'cpu?': 'string',
  'memory?': 'string',
});

export const resourceRequirementsSchema = type({
  'requests?': quantities,
  'limits?': quantities,
});

export const storageSchema = type({
  size: 'string > 0',
  mountPath: 'string > 0',
  'storageClass?': 'string',
  'accessMode?': "'ReadWriteOnce' | 'ReadWriteMany' | 'ReadOnlyMany' | 'ReadWriteOncePod'",
  /** Sidecars that mount the data volume at the same path */
  'sharedWith?': 'string[]',
});

export const portSchema = type({
  name: 'string > 0',
  port,
});

/**
 * Container probe, passed through to the pod spec
 */
export const probeSchema = type({
  'httpGet?': { path: 'string', port, 'headers?': { '[string]': 'string' } },
  'tcpSocket?': { port },
  'exec?': { command: 'string[]' },
  'initialDelaySeconds?': 'number.integer >= 0',
  'periodSeconds?': 'number.integer >= 1',
  'timeoutSeconds?': 'number.integer >= 1',
  'failureThreshold?': 'number.integer >= 1',
});

export const probesSchema = type({
  'liveness?': probeSchema,
  'readiness?': probeSchema,
  'startup?': probeSchema,
});

export const healthCheckSchema = type({ type: "'rollout'" })
  .or({
    type: "'tcp'",
    port,
    'host?': 'string',
  })
  .or({
    type: "'http'",
    path: 'string',
    'port?': port,
    'host?': 'string',
    'scheme?': "'http' | 'https'",
    'expectStatus?': '100 <= number.integer <= 599',
  });

export const execReadySchema = type({
  command: 'string[]',
  'expect?': 'string',
  'container?': 'string',
});

export const containerSchema = type({
  name: 'string > 0',
  image: 'string > 0',
  'command?': 'string[]',
  'args?': 'string[]',
  'ports?': portSchema.array(),
  'env?': envBindingSchema.array(),
  'resources?': resourceRequirementsSchema,
  'probes?': probesSchema,
});

export const configFileSchema = type({
  name: 'string > 0',
  mountPath: 'string > 0',
  files: { '[string]': 'string' },
  'container?': 'string',
});

export const emptyDirSchema = type({
  name: 'string > 0',
  mountPath: 'string > 0',
});

export const routeSchema = type({
  host: 'string > 0',
  target: 'string > 0',
  port: 'string | number',
  'timeout?': 'string',
});

export const componentSchema = type({
  name: 'string > 0',
  kind: type.enumerated(...COMPONENT_KINDS),
  'dependsOn?': 'string[]',
  'image?': 'string',
  'replicas?': 'number.integer >= 0 | string',
  'command?': 'string[]',
  'args?': 'string[]',
  'ports?': portSchema.array(),
  'env?': envBindingSchema.array(),
  'resources?': resourceRequirementsSchema,
  'storage?': storageSchema,
  'healthCheck?': healthCheckSchema,
  'probes?': probesSchema,
  'execReady?': execReadySchema,
  'container?': 'string',
  'sidecars?': containerSchema.array(),
  'initContainers?': containerSchema.array(),
  'configFiles?': configFileSchema.array(),
  'emptyDirs?': emptyDirSchema.array(),
  'route?': routeSchema,
});

export const secretFieldSchema = type({
  'value?': 'string',
  'length?': '8 <= number.integer <= 256',
});

export const secretSpecSchema = type({
  name: 'string > 0',
  'component?': 'string',
  fields: { '[string]': secretFieldSchema },
  'displayInReport?': 'boolean',
});

export const configStepSchema = type({
  id: 'string > 0',
  target: 'string > 0',
  command: 'string[]',
  fatal: 'boolean',
  'container?': 'string',
  'always?': 'boolean',
  'description?': 'string',
});

export const deploymentSpecSchema = type({
  name: 'string > 0',
  components: componentSchema.array(),
  'secrets?': secretSpecSchema.array(),
  'configuration?': configStepSchema.array(),
});
