/**
 * Placeholder substitution
 *
 * `${name}` is replaced by the parameter `name`; `$${name}` is the literal
 * text `${name}`. Substitution runs once, so an escaped placeholder is
 * never expanded later.
 */

import { type } from 'arktype';
import { formatArktypeError, TemplateError } from '../errors.js';
import type { DeploymentParameters, DeploymentSpec } from '../types/spec.js';
import { deploymentSpecSchema } from '../validation/spec-schema.js';

const PLACEHOLDER = /\$(\$?)\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Names of the parameters a string refers to, escaped placeholders excluded
 */
export function findPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const [, escape, name] of template.matchAll(PLACEHOLDER)) {
    if (!escape && name) {
      names.add(name);
    }
  }
  return [...names];
}

/**
 * @throws TemplateError when a referenced parameter is missing
 */
export function substitute(template: string, parameters: DeploymentParameters, path: string): string {
  return template.replace(PLACEHOLDER, (match: string, escape: string, name: string) => {
    if (escape) {
      return match.slice(1);
    }
    const value = parameters[name];
    if (value === undefined) {
      throw new TemplateError(
        `Missing parameter '${name}' referenced at ${path}`,
        name,
        path
      );
    }
    return String(value);
  });
}

/**
 * Substitute placeholders in every string of a JSON-like tree. Object keys
 * are left as they are.
 */
export function substituteDeep(value: unknown, parameters: DeploymentParameters, path: string): unknown {
  if (typeof value === 'string') {
    return substitute(value, parameters, path);
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => substituteDeep(item, parameters, `${path}[${index}]`));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        substituteDeep(item, parameters, path ? `${path}.${key}` : key),
      ])
    );
  }
  return value;
}

/**
 * Resolve every placeholder in a deployment spec. Paths in errors use the
 * component name rather than its index, e.g. `components.web.env[0].value`.
 */
export function resolveDeploymentSpec(
  spec: DeploymentSpec,
  parameters: DeploymentParameters
): DeploymentSpec {
  const resolved = {
    ...spec,
    components: spec.components.map((component) =>
      substituteDeep(component, parameters, `components.${component.name}`)
    ),
    ...(spec.secrets && {
      secrets: spec.secrets.map((secret) =>
        substituteDeep(secret, parameters, `secrets.${secret.name}`)
      ),
    }),
    ...(spec.configuration && {
      configuration: spec.configuration.map((step) =>
        substituteDeep(step, parameters, `configuration.${step.id}`)
      ),
    }),
  };

  const result = deploymentSpecSchema(resolved);
  if (result instanceof type.errors) {
    throw formatArktypeError(result, 'resolved deployment spec');
  }
  return result;
}
