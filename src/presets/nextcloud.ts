/**
 * Nextcloud stack preset
 *
 * MinIO object storage, MariaDB, Redis and Nextcloud FPM behind an
 * unprivileged nginx sidecar, exposed through an edge-terminated Route.
 * A cron sidecar runs background jobs every five minutes.
 * Every workload runs under OpenShift's restricted-v2 SCC.
 */

import { readFileSync } from 'node:fs';
import { getComponentLogger } from '../core/logging/index.js';
import type { ComponentSpec, ConfigStepSpec, DeploymentSpec, EnvBinding, SecretSpec } from '../core/types/spec.js';

const logger = getComponentLogger('nextcloud-preset');

export const NEXTCLOUD_IMAGES = {
  minio: 'quay.io/minio/minio:latest',
  mariadb: 'quay.io/sclorg/mariadb-1011-c9s:latest',
  redis: 'docker.io/library/redis:7-alpine',
  nextcloud: 'docker.io/library/nextcloud:32-fpm',
  nginx: 'docker.io/nginxinc/nginx-unprivileged:alpine',
} as const;

export const NEXTCLOUD_BUCKET = 'nextcloud';

export const NEXTCLOUD_ROUTE = 'nextcloud-route';

const NGINX_CONFIG_URL = new URL('../../assets/nginx-nextcloud.conf', import.meta.url);

export interface NextcloudStackOptions {
  /** Deployment name, used for labels and cleanup */
  name?: string;
  /** Public hostname; defaults to the `${hostname}` parameter */
  hostname?: string;
  adminUser?: string;
  images?: Partial<Record<keyof typeof NEXTCLOUD_IMAGES, string>>;
  storage?: {
    minio?: string;
    mariadb?: string;
    nextcloud?: string;
    storageClass?: string;
  };
  /** Install Collabora (richdocuments + built-in CODE server) */
  office?: boolean;
  /**
   * Turn off Nextcloud's data directory permission check. Volumes mounted
   * under a random OpenShift UID often fail it; disabling it hides real
   * permission problems too, so it is never done implicitly.
   */
  disableDataDirectoryPermissionCheck?: boolean;
  /** Probe https://<hostname>/status.php after the Route is admitted */
  verifyEndpoint?: boolean;
  /** nginx server block; defaults to the bundled configuration */
  nginxConfig?: string;
  /** ISO 3166-1 country code for phone numbers without a prefix */
  defaultPhoneRegion?: string;
}

export const CRON_INTERVAL_SECONDS = 300;

function fromSecret(name: string, secret: string, key: string): EnvBinding {
  return { name, secret: { name: secret, key } };
}

function occ(...args: string[]): string[] {
  return ['php', 'occ', ...args];
}

export function loadNginxConfig(): string {
  return readFileSync(NGINX_CONFIG_URL, 'utf8');
}

function secrets(adminUser: string): SecretSpec[] {
  return [
    {
      name: 'minio-secret',
      component: 'minio',
      fields: { 'root-user': { length: 16 }, 'root-password': {} },
    },
    {
      name: 'mariadb-secret',
      component: 'mariadb',
      fields: {
        'database-name': { value: 'nextcloud' },
        'database-user': { value: 'nextcloud' },
        'database-password': {},
        'database-root-password': {},
      },
    },
    {
      name: 'redis-secret',
      component: 'redis',
      fields: { 'database-password': {} },
    },
    {
      name: 'nextcloud-admin',
      component: 'nextcloud',
      fields: { username: { value: adminUser }, password: {} },
    },
  ];
}

function minio(options: NextcloudStackOptions): ComponentSpec {
  const health = (path: string) => ({ httpGet: { path, port: 9000 } });
  return {
    name: 'minio',
    kind: 'object-store',
    image: options.images?.minio ?? NEXTCLOUD_IMAGES.minio,
    args: ['server', '/data', '--console-address', ':9001'],
    ports: [
      { name: 'api', port: 9000 },
      { name: 'console', port: 9001 },
    ],
    env: [
      fromSecret('MINIO_ROOT_USER', 'minio-secret', 'root-user'),
      fromSecret('MINIO_ROOT_PASSWORD', 'minio-secret', 'root-password'),
      // mc keeps its aliases here; the random UID has no writable home
      { name: 'MC_CONFIG_DIR', value: '/tmp/.mc' },
    ],
    resources: {
      requests: { cpu: '100m', memory: '256Mi' },
      limits: { cpu: '1000m', memory: '1Gi' },
    },
    storage: {
      size: options.storage?.minio ?? '20Gi',
      mountPath: '/data',
      ...(options.storage?.storageClass && { storageClass: options.storage.storageClass }),
    },
    probes: {
      liveness: { ...health('/minio/health/live'), initialDelaySeconds: 30, periodSeconds: 20 },
      readiness: { ...health('/minio/health/ready'), initialDelaySeconds: 10, periodSeconds: 10 },
    },
    healthCheck: { type: 'rollout' },
    execReady: {
      command: ['sh', '-c', 'mc alias set local http://localhost:9000 "$MINIO_ROOT_USER" "$MINIO_ROOT_PASSWORD"'],
    },
  };
}

function mariadb(options: NextcloudStackOptions): ComponentSpec {
  return {
    name: 'mariadb',
    kind: 'stateful-db',
    image: options.images?.mariadb ?? NEXTCLOUD_IMAGES.mariadb,
    ports: [{ name: 'mysql', port: 3306 }],
    env: [
      fromSecret('MYSQL_USER', 'mariadb-secret', 'database-user'),
      fromSecret('MYSQL_PASSWORD', 'mariadb-secret', 'database-password'),
      fromSecret('MYSQL_ROOT_PASSWORD', 'mariadb-secret', 'database-root-password'),
      fromSecret('MYSQL_DATABASE', 'mariadb-secret', 'database-name'),
    ],
    resources: {
      requests: { cpu: '100m', memory: '256Mi' },
      limits: { cpu: '1000m', memory: '1Gi' },
    },
    storage: {
      size: options.storage?.mariadb ?? '2Gi',
      mountPath: '/var/lib/mysql/data',
      ...(options.storage?.storageClass && { storageClass: options.storage.storageClass }),
    },
    probes: {
      liveness: {
        exec: { command: ['sh', '-c', 'mysqladmin ping -u root -p"$MYSQL_ROOT_PASSWORD"'] },
        initialDelaySeconds: 30,
        periodSeconds: 10,
      },
      readiness: {
        exec: { command: ['sh', '-c', 'mysql -u "$MYSQL_USER" -p"$MYSQL_PASSWORD" -e "SELECT 1" "$MYSQL_DATABASE"'] },
        initialDelaySeconds: 10,
        periodSeconds: 5,
      },
    },
    healthCheck: { type: 'rollout' },
  };
}

function redis(options: NextcloudStackOptions): ComponentSpec {
  const ping = { exec: { command: ['sh', '-c', 'redis-cli -a "$REDIS_PASSWORD" --no-auth-warning ping | grep PONG'] } };
  return {
    name: 'redis',
    kind: 'cache',
    image: options.images?.redis ?? NEXTCLOUD_IMAGES.redis,
    command: [
      'redis-server',
      '--requirepass',
      '$(REDIS_PASSWORD)',
      '--maxmemory',
      '256mb',
      '--maxmemory-policy',
      'allkeys-lru',
    ],
    ports: [{ name: 'redis', port: 6379 }],
    env: [fromSecret('REDIS_PASSWORD', 'redis-secret', 'database-password')],
    resources: {
      requests: { cpu: '50m', memory: '64Mi' },
      limits: { cpu: '500m', memory: '512Mi' },
    },
    probes: {
      liveness: { ...ping, initialDelaySeconds: 10, periodSeconds: 10 },
      readiness: { ...ping, initialDelaySeconds: 5, periodSeconds: 5 },
    },
    healthCheck: { type: 'rollout' },
  };
}

/**
 * Environment of every container that runs Nextcloud code. The image's
 * config snippets read these at request time, so background jobs need
 * them as much as FPM does.
 */
function nextcloudEnv(hostname: string): EnvBinding[] {
  return [
    { name: 'MYSQL_HOST', value: 'mariadb' },
    fromSecret('MYSQL_DATABASE', 'mariadb-secret', 'database-name'),
    fromSecret('MYSQL_USER', 'mariadb-secret', 'database-user'),
    fromSecret('MYSQL_PASSWORD', 'mariadb-secret', 'database-password'),
    { name: 'REDIS_HOST', value: 'redis' },
    { name: 'REDIS_HOST_PORT', value: '6379' },
    fromSecret('REDIS_HOST_PASSWORD', 'redis-secret', 'database-password'),
    { name: 'OBJECTSTORE_S3_BUCKET', value: NEXTCLOUD_BUCKET },
    { name: 'OBJECTSTORE_S3_HOST', value: 'minio' },
    { name: 'OBJECTSTORE_S3_PORT', value: '9000' },
    { name: 'OBJECTSTORE_S3_SSL', value: 'false' },
    { name: 'OBJECTSTORE_S3_USEPATH_STYLE', value: 'true' },
    { name: 'OBJECTSTORE_S3_AUTOCREATE', value: 'true' },
    fromSecret('OBJECTSTORE_S3_KEY', 'minio-secret', 'root-user'),
    fromSecret('OBJECTSTORE_S3_SECRET', 'minio-secret', 'root-password'),
    fromSecret('NEXTCLOUD_ADMIN_USER', 'nextcloud-admin', 'username'),
    fromSecret('NEXTCLOUD_ADMIN_PASSWORD', 'nextcloud-admin', 'password'),
    { name: 'NEXTCLOUD_TRUSTED_DOMAINS', value: `${hostname} localhost` },
    { name: 'TRUSTED_PROXIES', value: '10.0.0.0/8 172.16.0.0/12 192.168.0.0/16' },
    { name: 'OVERWRITEPROTOCOL', value: 'https' },
    { name: 'OVERWRITEHOST', value: hostname },
    { name: 'PHP_MEMORY_LIMIT', value: '512M' },
    { name: 'PHP_UPLOAD_LIMIT', value: '10G' },
  ];
}

function nextcloud(options: NextcloudStackOptions, hostname: string, nginxConfig: string): ComponentSpec {
  const statusProbe = { httpGet: { path: '/status.php', port: 8080, headers: { Host: 'localhost' } } };
  return {
    name: 'nextcloud',
    kind: 'stateless-app',
    dependsOn: ['minio', 'mariadb', 'redis'],
    image: options.images?.nextcloud ?? NEXTCLOUD_IMAGES.nextcloud,
    env: nextcloudEnv(hostname),
    resources: {
      requests: { cpu: '200m', memory: '512Mi' },
      limits: { cpu: '2000m', memory: '2Gi' },
    },
    storage: {
      size: options.storage?.nextcloud ?? '5Gi',
      mountPath: '/var/www/html',
      sharedWith: ['nginx', 'cron'],
      ...(options.storage?.storageClass && { storageClass: options.storage.storageClass }),
    },
    sidecars: [
      {
        name: 'nginx',
        image: options.images?.nginx ?? NEXTCLOUD_IMAGES.nginx,
        ports: [{ name: 'http', port: 8080 }],
        resources: {
          requests: { cpu: '50m', memory: '64Mi' },
          limits: { cpu: '500m', memory: '256Mi' },
        },
        probes: {
          readiness: { ...statusProbe, initialDelaySeconds: 30, periodSeconds: 10, failureThreshold: 30 },
          liveness: { ...statusProbe, initialDelaySeconds: 300, periodSeconds: 30, timeoutSeconds: 5 },
        },
      },
      {
        name: 'cron',
        image: options.images?.nextcloud ?? NEXTCLOUD_IMAGES.nextcloud,
        // busybox crond needs root; a loop works under any UID
        command: [
          'sh',
          '-c',
          `while true; do php -f /var/www/html/cron.php; sleep ${CRON_INTERVAL_SECONDS}; done`,
        ],
        env: nextcloudEnv(hostname),
        resources: {
          requests: { cpu: '50m', memory: '128Mi' },
          limits: { cpu: '500m', memory: '512Mi' },
        },
      },
    ],
    configFiles: [
      {
        name: 'nginx',
        mountPath: '/etc/nginx/conf.d',
        files: { 'default.conf': nginxConfig },
        container: 'nginx',
      },
    ],
    healthCheck: { type: 'rollout' },
    execReady: {
      command: occ('status', '--output=json'),
      expect: '"installed":true',
    },
  };
}

function route(options: NextcloudStackOptions, hostname: string): ComponentSpec {
  return {
    name: NEXTCLOUD_ROUTE,
    kind: 'route',
    route: { host: hostname, target: 'nextcloud', port: 'http', timeout: '3600s' },
    ...(options.verifyEndpoint && {
      healthCheck: { type: 'http' as const, path: '/status.php', expectStatus: 200 },
    }),
  };
}

function configuration(options: NextcloudStackOptions, hostname: string): ConfigStepSpec[] {
  const trustedDomains = ['localhost', '127.0.0.1', hostname, 'nextcloud', 'nextcloud.${namespace}.svc.cluster.local'];

  const steps: ConfigStepSpec[] = [
    {
      id: 'minio-bucket',
      target: 'minio',
      fatal: true,
      description: `Create the '${NEXTCLOUD_BUCKET}' bucket`,
      command: [
        'sh',
        '-c',
        `mc alias set local http://localhost:9000 "$MINIO_ROOT_USER" "$MINIO_ROOT_PASSWORD" && mc mb --ignore-existing local/${NEXTCLOUD_BUCKET}`,
      ],
    },
    ...trustedDomains.map(
      (domain, index): ConfigStepSpec => ({
        id: `trusted-domain-${index}`,
        target: 'nextcloud',
        fatal: false,
        description: `Trust ${domain}`,
        command: occ('config:system:set', 'trusted_domains', String(index), `--value=${domain}`),
      })
    ),
    {
      id: 'memcache-distributed',
      target: 'nextcloud',
      fatal: false,
      description: 'Use Redis as distributed cache',
      command: occ('config:system:set', 'memcache.distributed', '--value=\\OC\\Memcache\\Redis'),
    },
    {
      id: 'memcache-locking',
      target: 'nextcloud',
      fatal: false,
      description: 'Use Redis for file locking',
      command: occ('config:system:set', 'memcache.locking', '--value=\\OC\\Memcache\\Redis'),
    },
    {
      id: 'background-jobs-cron',
      target: 'nextcloud',
      fatal: false,
      description: 'Run background jobs from the cron sidecar',
      command: occ('background:cron'),
    },
    {
      id: 'overwrite-cli-url',
      target: 'nextcloud',
      fatal: false,
      description: 'Use the public URL in links generated by occ and cron',
      command: occ('config:system:set', 'overwrite.cli.url', `--value=https://${hostname}`),
    },
    {
      id: 'default-phone-region',
      target: 'nextcloud',
      fatal: false,
      description: 'Set the default phone region',
      command: occ('config:system:set', 'default_phone_region', `--value=${options.defaultPhoneRegion ?? 'US'}`),
    },
    {
      id: 'db-missing-indices',
      target: 'nextcloud',
      fatal: false,
      description: 'Add missing database indices',
      command: occ('db:add-missing-indices', '-n'),
    },
    {
      id: 'mimetype-repair',
      target: 'nextcloud',
      fatal: false,
      description: 'Repair mimetypes',
      command: occ('maintenance:repair', '--include-expensive', '-n'),
    },
  ];

  if (options.office) {
    const wopiUrl = `https://${hostname}/custom_apps/richdocumentscode/proxy.php?req=`;
    steps.push(
      {
        id: 'office-app',
        target: 'nextcloud',
        fatal: true,
        description: 'Install Nextcloud Office',
        command: ['sh', '-c', 'php occ app:install richdocuments || php occ app:enable richdocuments'],
      },
      {
        id: 'office-code-server',
        target: 'nextcloud',
        fatal: true,
        description: 'Install the built-in CODE server',
        command: ['sh', '-c', 'php occ app:install richdocumentscode || php occ app:enable richdocumentscode'],
      },
      {
        id: 'office-wopi-url',
        target: 'nextcloud',
        fatal: false,
        command: occ('config:app:set', 'richdocuments', 'wopi_url', `--value=${wopiUrl}`),
      },
      {
        id: 'office-public-wopi-url',
        target: 'nextcloud',
        fatal: false,
        command: occ('config:app:set', 'richdocuments', 'public_wopi_url', `--value=${wopiUrl}`),
      }
    );
  }

  if (options.disableDataDirectoryPermissionCheck === true) {
    steps.push({
      id: 'data-directory-permissions',
      target: 'nextcloud',
      fatal: false,
      description: 'Disable the data directory permission check',
      command: occ('config:system:set', 'check_data_directory_permissions', '--value=false', '--type=boolean'),
    });
  }

  return steps;
}

/**
 * Deployment spec for the Nextcloud stack
 */
export function nextcloudStack(options: NextcloudStackOptions = {}): DeploymentSpec {
  const hostname = options.hostname ?? '${hostname}';
  const nginxConfig = options.nginxConfig ?? loadNginxConfig();

  if (options.disableDataDirectoryPermissionCheck === true) {
    logger.warn('Data directory permission check will be disabled', {
      reason: 'requested by disableDataDirectoryPermissionCheck',
    });
  }

  return {
    name: options.name ?? 'nextcloud',
    components: [minio(options), mariadb(options), redis(options), nextcloud(options, hostname, nginxConfig), route(options, hostname)],
    secrets: secrets(options.adminUser ?? 'admin'),
    configuration: configuration(options, hostname),
  };
}
