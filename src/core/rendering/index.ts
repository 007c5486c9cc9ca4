export {
  canonicalJson,
  CONFIG_HASH_ANNOTATION,
  computeConfigHash,
  computeSpecHash,
  readSpecHash,
  SPEC_HASH_ANNOTATION,
  sha256,
  stampSpecHash,
} from './hash.js';
export {
  deploymentLabels,
  instanceSelector,
  LABEL_INSTANCE,
  LABEL_MANAGED_BY,
  LABEL_NAME,
  LABEL_PART_OF,
  MANAGED_BY,
  podSelectorLabels,
  toLabelSelector,
} from './labels.js';
export {
  CONTAINER_SECURITY_CONTEXT,
  configMapName,
  dataClaimName,
  POD_SECURITY_CONTEXT,
  renderComponent,
  renderDeployment,
  resolveReplicas,
  ROUTE_TIMEOUT_ANNOTATION,
} from './renderer.js';
export type { RenderedComponent } from './renderer.js';
export { findPlaceholders, resolveDeploymentSpec, substitute, substituteDeep } from './template.js';
