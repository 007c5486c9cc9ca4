/**
 * Dependency-related types
 */

import type { ComponentSpec } from './spec.js';

/**
 * Represents a component in the dependency graph
 */
export interface DependencyNode {
  id: string;
  component: ComponentSpec;
  dependencies: Set<string>; // Components this node depends on
  dependents: Set<string>; // Components that depend on this node
}

export interface DeploymentPlan {
  levels: string[][]; // Components grouped by dependency level
  totalComponents: number;
  maxParallelism: number;
}
