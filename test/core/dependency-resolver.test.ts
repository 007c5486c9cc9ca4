/**
 * Unit tests for dependency resolution
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { DependencyResolver } from '../../src/core/dependencies/resolver.js';
import { CircularDependencyError } from '../../src/core/errors.js';
import type { ComponentSpec } from '../../src/core/types/spec.js';
import { shopSpec } from '../utils/specs.js';

function cache(name: string, dependsOn?: string[]): ComponentSpec {
  return { name, kind: 'cache', image: 'redis:7', ...(dependsOn && { dependsOn }) };
}

describe('DependencyResolver', () => {
  let resolver: DependencyResolver;

  beforeEach(() => {
    resolver = new DependencyResolver();
  });

  describe('buildDependencyGraph', () => {
    it('creates a node per component', () => {
      const graph = resolver.buildDependencyGraph(shopSpec().components);
      expect(['db', 'cache', 'web', 'web-route'].map((id) => graph.getNode(id)?.component.name)).toEqual([
        'db',
        'cache',
        'web',
        'web-route',
      ]);
    });

    it('adds edges for dependsOn and for the route target', () => {
      const graph = resolver.buildDependencyGraph(shopSpec().components);
      expect(graph.getDependencies('web')).toEqual(['db', 'cache']);
      expect(graph.getDependencies('web-route')).toEqual(['web']);
    });

    it('ignores dependencies on unknown components', () => {
      const graph = resolver.buildDependencyGraph([cache('a', ['ghost'])]);
      expect(graph.getDependencies('a')).toEqual([]);
    });
  });

  describe('analyzeDeploymentOrder', () => {
    it('groups independent components into the same level', () => {
      const graph = resolver.buildDependencyGraph(shopSpec().components);
      expect(resolver.analyzeDeploymentOrder(graph)).toEqual({
        levels: [['db', 'cache'], ['web'], ['web-route']],
        totalComponents: 4,
        maxParallelism: 2,
      });
    });

    it('handles an empty deployment', () => {
      const graph = resolver.buildDependencyGraph([]);
      expect(resolver.analyzeDeploymentOrder(graph)).toEqual({ levels: [], totalComponents: 0, maxParallelism: 0 });
    });
  });

  describe('validateNoCycles', () => {
    it('accepts an acyclic graph', () => {
      const graph = resolver.buildDependencyGraph(shopSpec().components);
      expect(() => resolver.validateNoCycles(graph)).not.toThrow();
    });

    it('names the cycle', () => {
      const graph = resolver.buildDependencyGraph([cache('a', ['b']), cache('b', ['a']), cache('c')]);

      let caught: unknown;
      try {
        resolver.validateNoCycles(graph);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(CircularDependencyError);
      expect(caught instanceof CircularDependencyError && caught.cycle).toEqual(['a', 'b', 'a']);
      expect(caught instanceof Error && caught.message).toBe(
        'Circular dependency detected between components: a → b → a'
      );
    });
  });
});
