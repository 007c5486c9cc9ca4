export {
  execReadyPredicate,
  httpPredicate,
  objectStatusPredicate,
  tcpPredicate,
} from './predicates.js';
export type { ReadinessPredicate } from './predicates.js';
export {
  evaluateRollout,
  evaluateRouteAdmission,
  IMMEDIATELY_READY_KINDS,
  ReadinessEvaluatorRegistry,
} from './registry.js';
export type { ReadinessEvaluator } from './registry.js';
export { execTargetFor, ReadinessWaiter } from './waiter.js';
export type { ReadinessWaiterOptions } from './waiter.js';
