/**
 * Deployment spec parsing and semantic validation
 */

import { readFile } from 'node:fs/promises';
import { type } from 'arktype';
import * as yaml from 'js-yaml';
import { formatArktypeError, SpecValidationError, ValidationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { ComponentSpec, DeploymentSpec } from '../types/spec.js';
import { errorMessage } from '../utils/error-helpers.js';
import { deploymentSpecSchema, WORKLOAD_KINDS } from './spec-schema.js';

const logger = getComponentLogger('spec-validation');

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const MAX_NAME_LENGTH = 63;

export function isWorkloadComponent(component: ComponentSpec): boolean {
  return (WORKLOAD_KINDS as readonly string[]).includes(component.kind);
}

/**
 * Ports published by the component's Service: its own plus its sidecars'
 */
export function servicePorts(component: ComponentSpec): { name: string; port: number }[] {
  return [...(component.ports ?? []), ...(component.sidecars ?? []).flatMap((c) => c.ports ?? [])];
}

/**
 * Validate an untyped value (parsed YAML/JSON or a literal) as a DeploymentSpec
 *
 * @throws ValidationError when the shape is wrong
 * @throws SpecValidationError when the shape is right but the content is inconsistent
 */
export function parseDeploymentSpec(input: unknown): DeploymentSpec {
  const result = deploymentSpecSchema(input);
  if (result instanceof type.errors) {
    throw formatArktypeError(result, 'deployment spec');
  }

  const problems = findSpecProblems(result);
  if (problems.length > 0) {
    throw new SpecValidationError(problems, result.name);
  }

  return result;
}

/**
 * Collect semantic problems: naming, references between components and
 * kind-specific required fields. Cycles are reported by the dependency resolver.
 */
export function findSpecProblems(spec: DeploymentSpec): string[] {
  const problems: string[] = [];
  const names = new Set<string>();

  if (!DNS_LABEL.test(spec.name) || spec.name.length > MAX_NAME_LENGTH) {
    problems.push(`deployment name '${spec.name}' must be a DNS-1123 label`);
  }

  for (const component of spec.components) {
    if (names.has(component.name)) {
      problems.push(`component '${component.name}' is declared more than once`);
    }
    names.add(component.name);

    if (!DNS_LABEL.test(component.name) || component.name.length > MAX_NAME_LENGTH) {
      problems.push(`component name '${component.name}' must be a DNS-1123 label`);
    }
  }

  for (const component of spec.components) {
    for (const dependency of component.dependsOn ?? []) {
      if (!names.has(dependency)) {
        problems.push(`component '${component.name}' depends on unknown component '${dependency}'`);
      }
      if (dependency === component.name) {
        problems.push(`component '${component.name}' depends on itself`);
      }
    }

    if (isWorkloadComponent(component)) {
      if (!component.image) {
        problems.push(`component '${component.name}' of kind ${component.kind} requires an image`);
      }
      if (component.route) {
        problems.push(`component '${component.name}' declares a route but is not of kind route`);
      }
      if (component.execReady && component.execReady.command.length === 0) {
        problems.push(`component '${component.name}' has an empty execReady command`);
      }
      const containerNames = [
        component.name,
        ...(component.sidecars ?? []).map((c) => c.name),
      ];
      const containerSet = new Set(containerNames);
      if (containerSet.size !== containerNames.length) {
        problems.push(`component '${component.name}' has duplicate container names`);
      }
      for (const sidecar of component.storage?.sharedWith ?? []) {
        if (!containerSet.has(sidecar)) {
          problems.push(
            `storage of '${component.name}' is shared with unknown container '${sidecar}'`
          );
        }
      }
      if (component.container && !containerSet.has(component.container)) {
        problems.push(
          `component '${component.name}' sends commands to unknown container '${component.container}'`
        );
      }
      for (const file of component.configFiles ?? []) {
        if (file.container && !containerSet.has(file.container)) {
          problems.push(
            `config file set '${file.name}' of '${component.name}' targets unknown container '${file.container}'`
          );
        }
      }
    } else {
      if (!component.route) {
        problems.push(`route component '${component.name}' requires a route section`);
      } else if (!names.has(component.route.target)) {
        problems.push(
          `route '${component.name}' targets unknown component '${component.route.target}'`
        );
      } else if (
        spec.components.find((c) => c.name === component.route?.target)?.kind === 'route'
      ) {
        problems.push(`route '${component.name}' cannot target another route`);
      } else {
        const target = spec.components.find((c) => c.name === component.route?.target);
        const port = component.route.port;
        const exposed = target ? servicePorts(target) : [];
        if (!exposed.some((p) => p.name === port || p.port === port)) {
          problems.push(
            `route '${component.name}' targets port '${port}' that '${component.route.target}' does not expose`
          );
        }
      }
      if (component.image || component.storage) {
        problems.push(`route component '${component.name}' cannot declare an image or storage`);
      }
    }
  }

  const secretNames = new Set<string>();
  for (const secret of spec.secrets ?? []) {
    if (secretNames.has(secret.name)) {
      problems.push(`secret '${secret.name}' is declared more than once`);
    }
    secretNames.add(secret.name);
    if (Object.keys(secret.fields).length === 0) {
      problems.push(`secret '${secret.name}' declares no fields`);
    }
    if (secret.component && !names.has(secret.component)) {
      problems.push(`secret '${secret.name}' belongs to unknown component '${secret.component}'`);
    }
  }

  const stepIds = new Set<string>();
  for (const step of spec.configuration ?? []) {
    if (stepIds.has(step.id)) {
      problems.push(`configuration step '${step.id}' is declared more than once`);
    }
    stepIds.add(step.id);
    if (!names.has(step.target)) {
      problems.push(`configuration step '${step.id}' targets unknown component '${step.target}'`);
    }
    if (step.command.length === 0) {
      problems.push(`configuration step '${step.id}' has an empty command`);
    }
  }

  return problems;
}

/**
 * Load a deployment spec from a YAML or JSON file
 */
export async function loadDeploymentSpec(path: string): Promise<DeploymentSpec> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ValidationError(
      `Cannot read deployment spec file '${path}': ${errorMessage(error)}`,
      path
    );
  }

  let document: unknown;
  try {
    document = yaml.load(text, { filename: path });
  } catch (error) {
    throw new ValidationError(
      `Deployment spec file '${path}' is not valid YAML: ${errorMessage(error)}`,
      path
    );
  }

  logger.debug('Loaded deployment spec file', { path });
  return parseDeploymentSpec(document);
}
