/**
 * Manifest Renderer
 *
 * Pure translation of a resolved deployment spec into resource documents.
 * Pod and container security contexts are fixed so every workload is
 * admitted under OpenShift's restricted-v2 SCC without a custom UID.
 */

import type { RunContext } from '../config/run-context.js';
import { TemplateError } from '../errors.js';
import { ROUTE_API_VERSION } from '../config/hostname.js';
import type { ClusterObject } from '../types/kubernetes.js';
import type {
  ComponentKind,
  ComponentSpec,
  ContainerSpec,
  DeploymentSpec,
  EnvBinding,
  ProbeSpec,
  ResourceRequirements,
} from '../types/spec.js';
import { isWorkloadComponent, servicePorts } from '../validation/spec-validation.js';
import { CONFIG_HASH_ANNOTATION, computeConfigHash, stampSpecHash } from './hash.js';
import { deploymentLabels, podSelectorLabels } from './labels.js';
import { resolveDeploymentSpec } from './template.js';

export const ROUTE_TIMEOUT_ANNOTATION = 'haproxy.router.openshift.io/timeout';

export interface RenderedComponent {
  component: string;
  kind: ComponentKind;
  resources: ClusterObject[];
}

export const POD_SECURITY_CONTEXT = {
  runAsNonRoot: true,
  seccompProfile: { type: 'RuntimeDefault' },
} as const;

export const CONTAINER_SECURITY_CONTEXT = {
  allowPrivilegeEscalation: false,
  runAsNonRoot: true,
  capabilities: { drop: ['ALL'] },
  seccompProfile: { type: 'RuntimeDefault' },
} as const;

export function dataClaimName(component: string): string {
  return `${component}-data`;
}

export function configMapName(component: string, fileSet: string): string {
  return `${component}-${fileSet}`;
}

function renderEnv(env: EnvBinding[] | undefined): Record<string, unknown>[] | undefined {
  if (!env || env.length === 0) {
    return undefined;
  }
  return env.map((binding) =>
    'secret' in binding
      ? {
          name: binding.name,
          valueFrom: { secretKeyRef: { name: binding.secret.name, key: binding.secret.key } },
        }
      : { name: binding.name, value: binding.value }
  );
}

function renderProbe(probe: ProbeSpec | undefined): Record<string, unknown> | undefined {
  if (!probe) {
    return undefined;
  }
  const { httpGet, ...rest } = probe;
  return {
    ...rest,
    ...(httpGet && {
      httpGet: {
        path: httpGet.path,
        port: httpGet.port,
        ...(httpGet.headers && {
          httpHeaders: Object.entries(httpGet.headers)
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([name, value]) => ({ name, value })),
        }),
      },
    }),
  };
}

function renderResources(resources: ResourceRequirements | undefined): ResourceRequirements | undefined {
  if (!resources || (!resources.requests && !resources.limits)) {
    return undefined;
  }
  return resources;
}

function renderContainer(
  container: ContainerSpec,
  volumeMounts: Record<string, unknown>[]
): Record<string, unknown> {
  return {
    name: container.name,
    image: container.image,
    command: container.command,
    args: container.args,
    ports: container.ports?.map((p) => ({ name: p.name, containerPort: p.port, protocol: 'TCP' })),
    env: renderEnv(container.env),
    resources: renderResources(container.resources),
    livenessProbe: renderProbe(container.probes?.liveness),
    readinessProbe: renderProbe(container.probes?.readiness),
    startupProbe: renderProbe(container.probes?.startup),
    volumeMounts: volumeMounts.length > 0 ? volumeMounts : undefined,
    securityContext: CONTAINER_SECURITY_CONTEXT,
  };
}

/**
 * Replicas may be a placeholder; after substitution it must be a
 * non-negative integer.
 */
export function resolveReplicas(component: ComponentSpec): number {
  const { replicas } = component;
  if (replicas === undefined) {
    return 1;
  }
  if (typeof replicas === 'number') {
    return replicas;
  }
  if (/^\d+$/.test(replicas.trim())) {
    return Number.parseInt(replicas, 10);
  }
  throw new TemplateError(
    `replicas of '${component.name}' must resolve to a non-negative integer, got '${replicas}'`,
    'replicas',
    `components.${component.name}.replicas`
  );
}

function metadata(
  name: string,
  deploymentName: string,
  component: string,
  context: RunContext,
  annotations?: Record<string, string>
): ClusterObject['metadata'] {
  return {
    name,
    namespace: context.namespace,
    labels: deploymentLabels(deploymentName, component),
    ...(annotations && { annotations }),
  };
}

function renderWorkload(
  component: ComponentSpec,
  deploymentName: string,
  context: RunContext
): ClusterObject[] {
  const resources: ClusterObject[] = [];
  const name = component.name;
  const image = component.image ?? '';

  for (const fileSet of component.configFiles ?? []) {
    resources.push({
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: metadata(configMapName(name, fileSet.name), deploymentName, name, context),
      data: fileSet.files,
    });
  }

  const { storage } = component;
  if (storage) {
    const storageClassName = storage.storageClass ?? context.storageClass;
    resources.push({
      apiVersion: 'v1',
      kind: 'PersistentVolumeClaim',
      metadata: metadata(dataClaimName(name), deploymentName, name, context),
      spec: {
        accessModes: [storage.accessMode ?? 'ReadWriteOnce'],
        resources: { requests: { storage: storage.size } },
        ...(storageClassName && { storageClassName }),
      },
    });
  }

  const mountsFor = (containerName: string): Record<string, unknown>[] => {
    const mounts: Record<string, unknown>[] = [];
    if (storage && (containerName === name || storage.sharedWith?.includes(containerName))) {
      mounts.push({ name: 'data', mountPath: storage.mountPath });
    }
    for (const fileSet of component.configFiles ?? []) {
      if ((fileSet.container ?? name) !== containerName) {
        continue;
      }
      for (const file of Object.keys(fileSet.files).sort()) {
        mounts.push({
          name: `config-${fileSet.name}`,
          mountPath: `${fileSet.mountPath.replace(/\/+$/, '')}/${file}`,
          subPath: file,
        });
      }
    }
    for (const dir of component.emptyDirs ?? []) {
      mounts.push({ name: dir.name, mountPath: dir.mountPath });
    }
    return mounts;
  };

  const mainContainer: ContainerSpec = {
    name,
    image,
    ...(component.command && { command: component.command }),
    ...(component.args && { args: component.args }),
    ...(component.ports && { ports: component.ports }),
    ...(component.env && { env: component.env }),
    ...(component.resources && { resources: component.resources }),
    ...(component.probes && { probes: component.probes }),
  };

  const volumes: Record<string, unknown>[] = [
    ...(storage ? [{ name: 'data', persistentVolumeClaim: { claimName: dataClaimName(name) } }] : []),
    ...(component.configFiles ?? []).map((fileSet) => ({
      name: `config-${fileSet.name}`,
      configMap: { name: configMapName(name, fileSet.name) },
    })),
    ...(component.emptyDirs ?? []).map((dir) => ({ name: dir.name, emptyDir: {} })),
  ];

  const selector = podSelectorLabels(deploymentName, name);
  const configFiles = component.configFiles ?? [];
  resources.push({
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: metadata(name, deploymentName, name, context),
    spec: {
      replicas: resolveReplicas(component),
      selector: { matchLabels: selector },
      // A ReadWriteOnce volume cannot be attached to old and new pods at once
      strategy: storage ? { type: 'Recreate' } : { type: 'RollingUpdate' },
      template: {
        metadata: {
          labels: { ...deploymentLabels(deploymentName, name), ...selector },
          ...(configFiles.length > 0 && {
            annotations: { [CONFIG_HASH_ANNOTATION]: computeConfigHash(configFiles) },
          }),
        },
        spec: {
          securityContext: POD_SECURITY_CONTEXT,
          initContainers: component.initContainers?.map((c) => renderContainer(c, mountsFor(c.name))),
          containers: [
            renderContainer(mainContainer, mountsFor(name)),
            ...(component.sidecars ?? []).map((c) => renderContainer(c, mountsFor(c.name))),
          ],
          volumes: volumes.length > 0 ? volumes : undefined,
        },
      },
    },
  });

  const ports = servicePorts(component);
  if (ports.length > 0) {
    resources.push({
      apiVersion: 'v1',
      kind: 'Service',
      metadata: metadata(name, deploymentName, name, context),
      spec: {
        type: 'ClusterIP',
        selector,
        ports: ports.map((p) => ({ name: p.name, port: p.port, targetPort: p.port, protocol: 'TCP' })),
      },
    });
  }

  return resources;
}

function renderRoute(
  component: ComponentSpec,
  deploymentName: string,
  context: RunContext
): ClusterObject[] {
  const { route } = component;
  if (!route) {
    throw new TemplateError(
      `route component '${component.name}' has no route section`,
      'route',
      `components.${component.name}.route`
    );
  }

  return [
    {
      apiVersion: ROUTE_API_VERSION,
      kind: 'Route',
      metadata: metadata(
        component.name,
        deploymentName,
        component.name,
        context,
        route.timeout ? { [ROUTE_TIMEOUT_ANNOTATION]: route.timeout } : undefined
      ),
      spec: {
        host: route.host,
        to: { kind: 'Service', name: route.target, weight: 100 },
        port: { targetPort: route.port },
        tls: { termination: 'edge', insecureEdgeTerminationPolicy: 'Redirect' },
        wildcardPolicy: 'None',
      },
    },
  ];
}

/**
 * Render one component of an already resolved spec
 */
export function renderComponent(
  component: ComponentSpec,
  deploymentName: string,
  context: RunContext
): RenderedComponent {
  const documents = isWorkloadComponent(component)
    ? renderWorkload(component, deploymentName, context)
    : renderRoute(component, deploymentName, context);

  return {
    component: component.name,
    kind: component.kind,
    resources: documents.map(stampSpecHash),
  };
}

/**
 * Resolve placeholders and render every component, in declaration order
 *
 * @throws TemplateError for a missing parameter or an invalid replica count
 */
export function renderDeployment(
  spec: DeploymentSpec,
  context: RunContext
): { spec: DeploymentSpec; components: Map<string, RenderedComponent> } {
  const resolved = resolveDeploymentSpec(spec, context.parameters);
  const components = new Map<string, RenderedComponent>();
  for (const component of resolved.components) {
    components.set(component.name, renderComponent(component, resolved.name, context));
  }
  return { spec: resolved, components };
}
