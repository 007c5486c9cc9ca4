/**
 * Observed component state, kept per reconciler instance
 *
 * Entries are created on first apply and updated on every pass; only
 * cleanup removes them. The durable record across processes is the
 * spec-hash annotation on the applied objects, not this store.
 */

import { canonicalJson, readSpecHash, sha256 } from '../rendering/hash.js';
import type { RenderedComponent } from '../rendering/renderer.js';
import { type ReadinessStatus, resourceKey } from '../types/kubernetes.js';
import type { AppliedResourceResult, ComponentState } from '../types/state.js';

/**
 * Hash over the spec hashes of a component's rendered resources
 */
export function componentSpecHash(rendered: RenderedComponent): string {
  return sha256(canonicalJson(rendered.resources.map((r) => readSpecHash(r) ?? '')));
}

export interface ComponentStateUpdate {
  rendered: RenderedComponent;
  resources: readonly AppliedResourceResult[];
  readiness?: ReadinessStatus;
  error?: Error;
}

export class ComponentStateStore {
  private readonly states = new Map<string, Map<string, ComponentState>>();

  get(deploymentName: string, component: string): ComponentState | undefined {
    return this.states.get(deploymentName)?.get(component);
  }

  list(deploymentName: string): ComponentState[] {
    return Array.from(this.states.get(deploymentName)?.values() ?? []);
  }

  record(deploymentName: string, update: ComponentStateUpdate): ComponentState {
    let components = this.states.get(deploymentName);
    if (!components) {
      components = new Map();
      this.states.set(deploymentName, components);
    }

    const name = update.rendered.component;
    const previous = components.get(name);
    const appliedVersions = { ...previous?.appliedVersions };
    for (const result of update.resources) {
      if (result.resourceVersion) {
        appliedVersions[resourceKey(result.ref)] = result.resourceVersion;
      }
    }

    const now = new Date();
    const state: ComponentState = {
      name,
      specHash: componentSpecHash(update.rendered),
      appliedVersions,
      ...(update.readiness
        ? {
            lastReadiness: {
              ready: update.readiness.ready,
              message: update.readiness.message,
              checkedAt: now,
            },
          }
        : previous?.lastReadiness && { lastReadiness: previous.lastReadiness }),
      ...(update.error && { lastError: update.error.message }),
      updatedAt: now,
    };
    components.set(name, state);
    return state;
  }

  /**
   * Drop every entry of a deployment; returns how many there were
   */
  deleteDeployment(deploymentName: string): number {
    const count = this.states.get(deploymentName)?.size ?? 0;
    this.states.delete(deploymentName);
    return count;
  }
}
