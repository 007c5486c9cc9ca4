export { DEFAULT_SECRET_LENGTH, generateSecretValue, resolveSecretFields, SECRET_ALPHABET } from './generator.js';
export { CREATED_AT_ANNOTATION, SecretStore } from './store.js';
export type { EnsureSecretOptions, SecretStoreOptions } from './store.js';
