#!/usr/bin/env node
/**
 * Deploy (or clean up) the Nextcloud stack in the current kube context.
 *
 *   npm run deploy:nextcloud -- --namespace nextcloud --office
 *   npm run deploy:nextcloud -- --namespace nextcloud --cleanup
 *   npm run deploy:nextcloud -- --namespace nextcloud --cleanup --delete-volumes --delete-secrets
 *
 * --delete-secrets is only accepted together with --delete-volumes.
 */

import { parseArgs } from 'node:util';
import {
  createRunContext,
  formatReport,
  getComponentLogger,
  getKubernetesClientProvider,
  KubernetesClusterClient,
  loadDeploymentSpec,
  loadRunOptionsFromEnv,
  nextcloudStack,
  NEXTCLOUD_ROUTE,
  Reconciler,
  resolveHostname,
} from '../src/index.js';

const logger = getComponentLogger('deploy-nextcloud');

const { values } = parseArgs({
  options: {
    namespace: { type: 'string', short: 'n' },
    hostname: { type: 'string' },
    'storage-class': { type: 'string' },
    spec: { type: 'string' },
    kubeconfig: { type: 'string' },
    context: { type: 'string' },
    office: { type: 'boolean', default: false },
    'disable-data-dir-check': { type: 'boolean', default: false },
    'verify-endpoint': { type: 'boolean', default: false },
    cleanup: { type: 'boolean', default: false },
    'delete-secrets': { type: 'boolean', default: false },
    'delete-volumes': { type: 'boolean', default: false },
  },
});

async function main(): Promise<number> {
  const provider = getKubernetesClientProvider({
    ...(values.kubeconfig && { kubeconfigPath: values.kubeconfig }),
    ...(values.context && { context: values.context }),
  });
  const client = new KubernetesClusterClient(provider);
  const reconciler = new Reconciler(client);

  const options = loadRunOptionsFromEnv({
    ...(values.namespace && { namespace: values.namespace }),
    ...(values.hostname && { hostname: values.hostname }),
    ...(values['storage-class'] && { storageClass: values['storage-class'] }),
    retainSecretsOnCleanup: !values['delete-secrets'],
    retainVolumesOnCleanup: !values['delete-volumes'],
  });

  if (values.cleanup) {
    const name = values.spec ? (await loadDeploymentSpec(values.spec)).name : 'nextcloud';
    const result = await reconciler.cleanup(name, createRunContext(options));
    console.log(
      `Deleted ${result.deleted.length} objects, kept ${result.retained.length}, ${result.failed.length} failed`
    );
    for (const failure of result.failed) {
      console.log(`  ${failure.ref.kind}/${failure.ref.name}: ${failure.message}`);
    }
    return result.failed.length > 0 ? 1 : 0;
  }

  const hostname = await resolveHostname(client, options.namespace, NEXTCLOUD_ROUTE, options.hostname, 'nextcloud');
  if (!hostname) {
    logger.error('No hostname given and none could be derived; pass --hostname');
    return 2;
  }

  const spec = values.spec
    ? await loadDeploymentSpec(values.spec)
    : nextcloudStack({
        office: values.office,
        disableDataDirectoryPermissionCheck: values['disable-data-dir-check'],
        verifyEndpoint: values['verify-endpoint'],
      });

  const run = await reconciler.reconcile(spec, createRunContext({ ...options, hostname }));
  console.log(formatReport(run.report));
  return run.status === 'failed' ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal('Deployment failed', error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  });
