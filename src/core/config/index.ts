export { detectAppsDomain, resolveHostname, ROUTE_API_VERSION } from './hostname.js';
export {
  createRunContext,
  DEFAULT_API_RETRY,
  DEFAULT_EXEC_READY_POLICY,
  DEFAULT_RUN_TIMEOUT_MS,
  loadRunOptionsFromEnv,
  runOptionsSchema,
} from './run-context.js';
export type { ApiRetryPolicy, RunContext, RunOptions } from './run-context.js';
