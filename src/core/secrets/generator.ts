/**
 * Credential generation
 */

import { randomInt } from 'node:crypto';
import type { SecretFieldSpec } from '../types/spec.js';

export const SECRET_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

export const DEFAULT_SECRET_LENGTH = 24;

/**
 * Uniformly random alphanumeric string. `randomInt` rejects biased draws,
 * so every character of the alphabet is equally likely.
 */
export function generateSecretValue(length: number = DEFAULT_SECRET_LENGTH): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Secret length must be a positive integer, got ${length}`);
  }
  let value = '';
  for (let i = 0; i < length; i++) {
    value += SECRET_ALPHABET.charAt(randomInt(SECRET_ALPHABET.length));
  }
  return value;
}

/**
 * Literal values are kept; every other field gets a generated value
 */
export function resolveSecretFields(fields: Readonly<Record<string, SecretFieldSpec>>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, field] of Object.entries(fields)) {
    values[key] = field.value ?? generateSecretValue(field.length ?? DEFAULT_SECRET_LENGTH);
  }
  return values;
}
