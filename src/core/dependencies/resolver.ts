/**
 * Dependency Resolution Engine
 *
 * Builds the component dependency graph from a deployment spec and groups
 * components into levels that can be reconciled in parallel.
 */

import { getComponentLogger } from '../logging/index.js';
import type { DeploymentPlan } from '../types/dependencies.js';
import type { ComponentSpec } from '../types/spec.js';
import { DependencyGraph } from './graph.js';

export class DependencyResolver {
  private logger = getComponentLogger('dependency-resolver');

  /**
   * Build a dependency graph from the declared components.
   *
   * Edges come from `dependsOn` and, for routes, from the route target.
   */
  buildDependencyGraph(components: readonly ComponentSpec[]): DependencyGraph {
    const graph = new DependencyGraph();

    for (const component of components) {
      graph.addNode(component.name, component);
    }

    for (const component of components) {
      const dependencies = new Set(component.dependsOn ?? []);
      if (component.route) {
        dependencies.add(component.route.target);
      }

      for (const dependency of dependencies) {
        if (!graph.getNode(dependency)) {
          this.logger.warn('Dependency on unknown component ignored', {
            component: component.name,
            dependency,
          });
          continue;
        }
        graph.addEdge(component.name, dependency);
      }
    }

    return graph;
  }

  /**
   * Validate that the dependency graph has no cycles
   *
   * @throws CircularDependencyError naming the first cycle found
   */
  validateNoCycles(graph: DependencyGraph): void {
    graph.getTopologicalOrder();
  }

  /**
   * Group components by dependency level. Every component in a level has
   * all of its dependencies in earlier levels.
   */
  analyzeDeploymentOrder(graph: DependencyGraph): DeploymentPlan {
    const topologicalOrder = graph.getTopologicalOrder();
    const levels: string[][] = [];
    const processed = new Set<string>();

    while (processed.size < topologicalOrder.length) {
      const currentLevel: string[] = [];

      for (const componentId of topologicalOrder) {
        if (processed.has(componentId)) {
          continue;
        }

        const dependencies = graph.getDependencies(componentId);
        if (dependencies.every((dep) => processed.has(dep))) {
          currentLevel.push(componentId);
        }
      }

      if (currentLevel.length === 0) {
        throw new Error('Unable to determine deployment order - possible circular dependency');
      }

      levels.push(currentLevel);
      currentLevel.forEach((id) => processed.add(id));
    }

    return {
      levels,
      totalComponents: topologicalOrder.length,
      maxParallelism: levels.length > 0 ? Math.max(...levels.map((level) => level.length)) : 0,
    };
  }
}
