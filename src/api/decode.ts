// Narrowing helpers for response bodies. Everything off the wire is
// `unknown` until one of these has looked at it.

import { MalformedResponseError } from '../errors';

export type JsonObject = Record<string, unknown>;

export function asObject(value: unknown, what: string): JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new MalformedResponseError(`${what} is not an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function asArray(value: unknown, what: string): unknown[] {
  if (value === null || value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new MalformedResponseError(`${what} is not an array`);
  }
  return value;
}

export function str(obj: JsonObject, key: string, what: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new MalformedResponseError(`${what}.${key} is not a string`);
  }
  return value;
}

export function optStr(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  return typeof value === 'string' ? value : null;
}

export function num(obj: JsonObject, key: string, what: string): number {
  const value = obj[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  throw new MalformedResponseError(`${what}.${key} is not a number`);
}

/** Booleans are sometimes sent as 0/1. */
export function bool(obj: JsonObject, key: string): boolean {
  const value = obj[key];
  return value === true || value === 1 || value === '1';
}
