/**
 * Typed accessors over node/edge properties.
 *
 * Every accessor returns a neutral value ("" / false / 0 / undefined) when the key is
 * missing or holds a value of another type; handlers report missing required values
 * themselves.
 */

import type { JsonValue, Properties } from "./types.js";

export type JsonObject = { readonly [key: string]: JsonValue };

export function isJsonArray(value: JsonValue | undefined): value is readonly JsonValue[] {
  return Array.isArray(value);
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getString(props: Properties, key: string): string {
  const value = props[key];
  return typeof value === "string" ? value : "";
}

export function getBoolean(props: Properties, key: string): boolean {
  return props[key] === true;
}

/**
 * Integer property; fractional JSON numbers are truncated.
 */
export function getInteger(props: Properties, key: string): number {
  const value = props[key];
  if (typeof value !== "number" || !Number.isFinite(value)) return 0;
  return Math.trunc(value);
}

export function getRecord(props: Properties, key: string): JsonObject | undefined {
  const value = props[key];
  return isJsonObject(value) ? value : undefined;
}

/**
 * String-valued map such as `tags`; non-string entries are dropped.
 */
export function getStringRecord(props: Properties, key: string): Record<string, string> {
  const record = getRecord(props, key);
  const out: Record<string, string> = {};
  if (!record) return out;
  for (const [k, v] of Object.entries(record)) {
    if (typeof v === "string") out[k] = v;
  }
  return out;
}

export function getList(props: Properties, key: string): readonly JsonValue[] {
  const value = props[key];
  return isJsonArray(value) ? value : [];
}

export function getStringList(props: Properties, key: string): string[] {
  return getList(props, key).filter((v): v is string => typeof v === "string");
}

export function hasProperty(props: Properties, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(props, key);
}
