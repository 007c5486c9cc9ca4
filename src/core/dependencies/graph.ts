/**
 * Dependency Graph Data Structure
 *
 * Represents dependencies between deployment components and provides
 * traversal and topological sorting.
 */

import { formatCircularDependencyError } from '../errors.js';
import type { DependencyNode } from '../types/dependencies.js';
import type { ComponentSpec } from '../types/spec.js';

export class DependencyGraph {
  private nodes = new Map<string, DependencyNode>();

  /**
   * Add a node to the dependency graph
   */
  addNode(id: string, component: ComponentSpec): void {
    if (this.nodes.has(id)) {
      throw new Error(`Node with id '${id}' already exists in dependency graph`);
    }

    this.nodes.set(id, {
      id,
      component,
      dependencies: new Set(),
      dependents: new Set(),
    });
  }

  /**
   * Add a dependency edge from dependent to dependency
   * @param dependentId - The component that depends on another
   * @param dependencyId - The component being depended upon
   */
  addEdge(dependentId: string, dependencyId: string): void {
    const dependent = this.nodes.get(dependentId);
    const dependency = this.nodes.get(dependencyId);

    if (!dependent) {
      throw new Error(`Dependent node '${dependentId}' not found in graph`);
    }
    if (!dependency) {
      throw new Error(`Dependency node '${dependencyId}' not found in graph`);
    }

    dependent.dependencies.add(dependencyId);
    dependency.dependents.add(dependentId);
  }

  /**
   * Get a specific node by ID
   */
  getNode(id: string): DependencyNode | undefined {
    return this.nodes.get(id);
  }

  /**
   * Get all dependencies of a node
   */
  getDependencies(id: string): string[] {
    const node = this.nodes.get(id);
    return node ? Array.from(node.dependencies) : [];
  }

  /**
   * Find cycles in the graph
   */
  findCycles(): string[][] {
    const visited = new Set<string>();
    const recursionStack = new Set<string>();
    const cycles: string[][] = [];

    const dfs = (nodeId: string, path: string[]): void => {
      if (recursionStack.has(nodeId)) {
        // Found a cycle
        const cycleStart = path.indexOf(nodeId);
        cycles.push(path.slice(cycleStart).concat(nodeId));
        return;
      }

      if (visited.has(nodeId)) {
        return;
      }

      visited.add(nodeId);
      recursionStack.add(nodeId);
      path.push(nodeId);

      const node = this.nodes.get(nodeId);
      if (node) {
        for (const dependencyId of node.dependencies) {
          dfs(dependencyId, [...path]);
        }
      }

      recursionStack.delete(nodeId);
      path.pop();
    };

    for (const nodeId of this.nodes.keys()) {
      if (!visited.has(nodeId)) {
        dfs(nodeId, []);
      }
    }

    return cycles;
  }

  /**
   * Get topological ordering of nodes
   * Throws CircularDependencyError if cycles are detected
   */
  getTopologicalOrder(): string[] {
    const inDegree = new Map<string, number>();
    const queue: string[] = [];
    const result: string[] = [];

    // Initialize in-degree count
    for (const [nodeId, node] of this.nodes) {
      inDegree.set(nodeId, node.dependencies.size);
      if (node.dependencies.size === 0) {
        queue.push(nodeId);
      }
    }

    // Process nodes with no dependencies
    while (queue.length > 0) {
      const nodeId = queue.shift();
      if (!nodeId) break;
      result.push(nodeId);

      const node = this.nodes.get(nodeId);
      if (!node) continue;
      for (const dependentId of node.dependents) {
        const currentInDegree = inDegree.get(dependentId);
        if (currentInDegree === undefined) continue;
        const newInDegree = currentInDegree - 1;
        inDegree.set(dependentId, newInDegree);

        if (newInDegree === 0) {
          queue.push(dependentId);
        }
      }
    }

    // Check for cycles
    if (result.length !== this.nodes.size) {
      const cycles = this.findCycles();
      throw formatCircularDependencyError(cycles[0] ?? []);
    }

    return result;
  }
}
