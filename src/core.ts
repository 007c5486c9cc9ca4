/**
 * kubeconverge core - consolidated exports
 *
 * A single entry point for every core module. Prefer importing from here
 * (or from the package root) over reaching into module paths.
 */

// =============================================================================
// Configuration
// =============================================================================
export * from './core/config/index.js';

// =============================================================================
// Dependencies
// =============================================================================
export * from './core/dependencies/index.js';

// =============================================================================
// Deployment: applier, reconciler, cleanup, component state
// =============================================================================
export * from './core/deployment/index.js';

// =============================================================================
// Post-deploy configuration
// =============================================================================
export * from './core/configuration/index.js';

// =============================================================================
// Error Classes and Utilities
// =============================================================================
export {
  ApplyError,
  CircularDependencyError,
  ConfigStepError,
  formatArktypeError,
  formatCircularDependencyError,
  formatResourceRef,
  KubeconvergeError,
  SecretStoreError,
  SpecValidationError,
  TemplateError,
  TimeoutError,
  ValidationError,
} from './core/errors.js';

// =============================================================================
// Kubernetes client
// =============================================================================
export * from './core/kubernetes/index.js';

// =============================================================================
// Logging
// =============================================================================
export * from './core/logging/index.js';

// =============================================================================
// Readiness
// =============================================================================
export * from './core/readiness/index.js';

// =============================================================================
// Rendering
// =============================================================================
export * from './core/rendering/index.js';

// =============================================================================
// Reporting
// =============================================================================
export * from './core/reporting/index.js';

// =============================================================================
// Credentials
// =============================================================================
export * from './core/secrets/index.js';

// =============================================================================
// Types
// =============================================================================
export * from './core/types/index.js';

// =============================================================================
// Utilities
// =============================================================================
export * from './core/utils/index.js';

// =============================================================================
// Validation
// =============================================================================
export * from './core/validation/index.js';
