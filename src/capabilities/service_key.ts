/**
 * @fileoverview Service keys
 *
 * TypeScript types do not exist at run time, so a service is registered and
 * looked up through a {@link ServiceKey}: a named descriptor carrying a
 * capability check that decides whether an arbitrary value can serve as `T`.
 * The check powers the duck-typed fallback lookup ("someone registered a
 * concrete class, someone else asks for an interface it implements").
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../core/errors.js';

export interface ServiceKey<T> {
  /** Unique per key; used for composite lookups */
  readonly id: number;
  readonly name: string;
  /** Normalized capability GUID, when the service has one */
  readonly guid?: string;
  matches(value: unknown): value is T;
}

export interface ServiceKeyOptions {
  guid?: string;
}

let nextKeyId = 1;

/**
 * Define a key from a capability check.
 *
 * @example
 * ```typescript
 * interface Formatter { format(text: string): string }
 * const FormatterKey = defineServiceKey<Formatter>('Formatter', (value): value is Formatter =>
 *   typeof value === 'object' && value !== null && 'format' in value);
 * ```
 */
export function defineServiceKey<T>(
  name: string,
  matches: (value: unknown) => value is T,
  options: ServiceKeyOptions = {}
): ServiceKey<T> {
  return {
    id: nextKeyId++,
    name,
    guid: options.guid === undefined ? undefined : requireGuid(options.guid),
    matches,
  };
}

/**
 * Define a key whose capability check is `instanceof ctor`.
 */
export function classServiceKey<T extends object>(
  ctor: abstract new (...args: never[]) => T,
  options: ServiceKeyOptions = {}
): ServiceKey<T> {
  return defineServiceKey(ctor.name, (value: unknown): value is T => value instanceof ctor, options);
}

// ============================================================================
// GUIDS
// ============================================================================

const GuidSchema = z.string().uuid();

/**
 * Lower-case a GUID and strip surrounding braces.
 *
 * @returns undefined when the value is not a GUID
 */
export function normalizeGuid(value: string): string | undefined {
  const trimmed = value.trim().replace(/^\{(.*)\}$/, '$1').toLowerCase();
  return GuidSchema.safeParse(trimmed).success ? trimmed : undefined;
}

export function requireGuid(value: string): string {
  const normalized = normalizeGuid(value);
  if (!normalized) {
    throw new InvalidArgumentError('guid', `'${value}' is not a GUID`);
  }
  return normalized;
}

/**
 * GUID declared by an instance's class through a static `serviceGuid`.
 */
export function runtimeGuidOf(instance: unknown): string | undefined {
  if (typeof instance !== 'object' || instance === null) {
    return undefined;
  }
  const ctor: unknown = instance.constructor;
  if (typeof ctor === 'function' && 'serviceGuid' in ctor && typeof ctor.serviceGuid === 'string') {
    return normalizeGuid(ctor.serviceGuid);
  }
  return undefined;
}
