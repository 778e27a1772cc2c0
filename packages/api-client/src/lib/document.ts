/**
 * Accessors for dynamically-shaped panel documents.
 * Every reader returns `undefined` (or an empty container) when a field is
 * absent or of the wrong kind; none of them throw.
 */
import type { JsonObject, JsonValue } from '@hostpanel/shared';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The value itself when it is an object, otherwise `{}`. */
export function asObject(value: JsonValue | undefined): JsonObject {
  return isJsonObject(value) ? value : {};
}

export function getObject(doc: JsonObject, key: string): JsonObject {
  return asObject(doc[key]);
}

export function getArray(doc: JsonObject, key: string): JsonValue[] {
  const value = doc[key];
  return Array.isArray(value) ? value : [];
}

/** Array field narrowed to its object members. */
export function getObjects(doc: JsonObject, key: string): JsonObject[] {
  return getArray(doc, key).filter(isJsonObject);
}

export function getString(doc: JsonObject, key: string): string | undefined {
  const value = doc[key];
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(doc: JsonObject, key: string): number | undefined {
  const value = doc[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function getBoolean(doc: JsonObject, key: string): boolean | undefined {
  const value = doc[key];
  return typeof value === 'boolean' ? value : undefined;
}

/** `envelope.attributes`, or `{}`. */
export function attributesOf(envelope: JsonValue | undefined): JsonObject {
  return getObject(asObject(envelope), 'attributes');
}

/** Attribute blocks of `attributes.relationships[name].data[]`. */
export function relationshipAttributes(attributes: JsonObject, name: string): JsonObject[] {
  const relation = getObject(getObject(attributes, 'relationships'), name);
  return getObjects(relation, 'data').map((entry) => attributesOf(entry));
}

/** Renders a scalar for display; objects and arrays come back as JSON. */
export function displayValue(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}
