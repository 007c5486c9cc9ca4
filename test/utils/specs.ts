import { createRunContext, type RunContext, type RunOptions } from '../../src/core/config/run-context.js';
import type { DeploymentSpec } from '../../src/core/types/spec.js';

/**
 * Fast polling and no retry delays, so fake-timer-free tests finish quickly
 */
export function testContext(overrides: Partial<RunOptions> = {}): RunContext {
  return createRunContext({
    namespace: 'demo',
    hostname: 'shop.apps.example.test',
    readinessPolicy: { interval: 1, increment: 0, maxInterval: 1, timeout: 50 },
    execReadyPolicy: { interval: 1, increment: 0, maxInterval: 1, timeout: 50 },
    retry: { maxAttempts: 1, baseDelay: 0, maxDelay: 0 },
    ...overrides,
  });
}

/**
 * db and cache at the first level, web on top of both, a route in front
 */
export function shopSpec(): DeploymentSpec {
  return {
    name: 'shop',
    components: [
      {
        name: 'db',
        kind: 'stateful-db',
        image: 'registry.example.test/postgres:16',
        ports: [{ name: 'pg', port: 5432 }],
        env: [{ name: 'POSTGRES_PASSWORD', secret: { name: 'db-secret', key: 'password' } }],
        storage: { size: '1Gi', mountPath: '/var/lib/postgresql/data' },
      },
      {
        name: 'cache',
        kind: 'cache',
        image: 'registry.example.test/redis:7',
        ports: [{ name: 'redis', port: 6379 }],
      },
      {
        name: 'web',
        kind: 'stateless-app',
        dependsOn: ['db', 'cache'],
        image: 'registry.example.test/web:1.0',
        replicas: 2,
        ports: [{ name: 'http', port: 8080 }],
        env: [
          { name: 'PUBLIC_HOST', value: '${hostname}' },
          { name: 'DB_PASSWORD', secret: { name: 'db-secret', key: 'password' } },
        ],
      },
      {
        name: 'web-route',
        kind: 'route',
        route: { host: '${hostname}', target: 'web', port: 'http' },
      },
    ],
    secrets: [
      {
        name: 'db-secret',
        component: 'db',
        fields: { user: { value: 'shop' }, password: { length: 12 } },
      },
    ],
    configuration: [
      { id: 'migrate', target: 'web', command: ['bin/migrate'], fatal: true },
      { id: 'warm-cache', target: 'web', command: ['bin/warm'], fatal: false },
    ],
  };
}
