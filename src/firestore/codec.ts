/**
 * Firestore value codec.
 *
 * Converts between host values and Firestore's typed JSON representation,
 * where every value is an object keyed by its type tag
 * (`{ "integerValue": "42" }`, `{ "mapValue": { "fields": { ... } } }`).
 */

import { z } from "zod";
import { ValidationError } from "../errors/index.js";
import { Bytes, GeoPoint, type DocumentData, type HostValue } from "../types/index.js";

export type WireValue =
  | { nullValue: null }
  | { booleanValue: boolean }
  | { integerValue: string }
  | { doubleValue: number | string }
  | { stringValue: string }
  | { bytesValue: string }
  | { timestampValue: string }
  | { geoPointValue: { latitude: number; longitude: number } }
  | { referenceValue: string }
  | { arrayValue: { values?: WireValue[] } }
  | { mapValue: { fields?: Record<string, WireValue> } };

export type WireFields = Record<string, WireValue>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * `YYYY-MM-DDTHH:MM:SSZ` in UTC. Sub-second precision is dropped.
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError("Cannot encode an invalid Date", { field: "timestamp" });
  }
  return date.toISOString().replace(/\.\d+Z$/, "Z");
}

/**
 * Encodes a host value as a Firestore typed value.
 *
 * @example
 * ```typescript
 * encodeValue(42); // { integerValue: "42" }
 * encodeValue({ tags: ["a"] });
 * // { mapValue: { fields: { tags: { arrayValue: { values: [{ stringValue: "a" }] } } } } }
 * ```
 */
export function encodeValue(value: unknown): WireValue {
  if (value === null || value === undefined) {
    return { nullValue: null };
  }

  switch (typeof value) {
    case "boolean":
      return { booleanValue: value };
    case "number":
      if (Number.isSafeInteger(value)) {
        return { integerValue: String(value) };
      }
      return { doubleValue: Number.isFinite(value) ? value : String(value) };
    case "bigint":
      return { integerValue: value.toString() };
    case "string":
      return { stringValue: value };
    case "object":
      return encodeObject(value);
    default:
      return { stringValue: String(value) };
  }
}

function encodeObject(value: object): WireValue {
  if (value instanceof Date) {
    return { timestampValue: formatTimestamp(value) };
  }
  if (value instanceof Bytes) {
    return { bytesValue: value.toBase64() };
  }
  if (value instanceof Uint8Array) {
    return { bytesValue: Buffer.from(value).toString("base64") };
  }
  if (value instanceof GeoPoint) {
    return { geoPointValue: { latitude: value.latitude, longitude: value.longitude } };
  }
  if (Array.isArray(value)) {
    return { arrayValue: { values: value.map((item: unknown) => encodeValue(item)) } };
  }
  if (value instanceof Map) {
    const fields: WireFields = {};
    for (const [key, item] of value) {
      fields[String(key)] = encodeValue(item);
    }
    return { mapValue: { fields } };
  }
  if (isPlainObject(value)) {
    return { mapValue: { fields: encodeFields(value) } };
  }
  return { stringValue: String(value) };
}

/**
 * Encodes every property of a record.
 *
 * @throws {ValidationError} If `data` is not a plain object
 */
export function encodeFields(data: unknown): WireFields {
  if (!isRecord(data)) {
    throw new ValidationError("Document data must be an object", { field: "data" });
  }
  const fields: WireFields = {};
  for (const [key, value] of Object.entries(data)) {
    fields[key] = encodeValue(value);
  }
  return fields;
}

/**
 * Decodes a Firestore typed value. Objects without a recognised type tag are
 * returned as they are.
 */
export function decodeValue(value: unknown): HostValue {
  if (!isRecord(value)) {
    return toHostValue(value);
  }

  if ("nullValue" in value) {
    return null;
  }
  if ("booleanValue" in value && typeof value.booleanValue === "boolean") {
    return value.booleanValue;
  }
  if ("integerValue" in value) {
    return decodeInteger(value.integerValue);
  }
  if ("doubleValue" in value) {
    return Number(value.doubleValue);
  }
  if ("stringValue" in value && typeof value.stringValue === "string") {
    return value.stringValue;
  }
  if ("bytesValue" in value && typeof value.bytesValue === "string") {
    return Bytes.fromBase64(value.bytesValue);
  }
  if ("timestampValue" in value && typeof value.timestampValue === "string") {
    return parseTimestamp(value.timestampValue);
  }
  if ("geoPointValue" in value && isRecord(value.geoPointValue)) {
    const { latitude, longitude } = value.geoPointValue;
    return new GeoPoint(Number(latitude ?? 0), Number(longitude ?? 0));
  }
  if ("referenceValue" in value && typeof value.referenceValue === "string") {
    return value.referenceValue;
  }
  if ("arrayValue" in value && isRecord(value.arrayValue)) {
    const values = value.arrayValue.values;
    return Array.isArray(values) ? values.map((item: unknown) => decodeValue(item)) : [];
  }
  if ("mapValue" in value && isRecord(value.mapValue)) {
    return decodeFields(value.mapValue.fields);
  }

  return toHostValue(value);
}

/**
 * Decodes a `fields` map. A missing map decodes to an empty record.
 */
export function decodeFields(fields: unknown): DocumentData {
  const result: DocumentData = {};
  if (!isRecord(fields)) {
    return result;
  }
  for (const [key, value] of Object.entries(fields)) {
    result[key] = decodeValue(value);
  }
  return result;
}

function decodeInteger(raw: unknown): number | bigint {
  if (typeof raw === "number") {
    return raw;
  }
  if (typeof raw === "string" && /^-?\d+$/.test(raw)) {
    const big = BigInt(raw);
    const asNumber = Number(big);
    return Number.isSafeInteger(asNumber) ? asNumber : big;
  }
  return Number.parseInt(String(raw), 10);
}

/**
 * Parses `YYYY-MM-DDTHH:MM:SSZ` or RFC 3339 with fractional seconds.
 * Unparseable input is returned as the original string.
 */
export function parseTimestamp(text: string): Date | string {
  const millis = Date.parse(text);
  return Number.isNaN(millis) ? text : new Date(millis);
}

/**
 * Passes JSON-shaped data through unchanged.
 */
function toHostValue(value: unknown): HostValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "boolean" || typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toHostValue(item));
  }
  if (isRecord(value)) {
    const result: DocumentData = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toHostValue(item);
    }
    return result;
  }
  return String(value);
}

// ============================================================================
// Documents
// ============================================================================

/**
 * Document envelope returned by the REST API.
 */
export const FirestoreDocumentSchema = z
  .object({
    name: z.string().optional(),
    fields: z.record(z.string(), z.unknown()).optional(),
    createTime: z.string().optional(),
    updateTime: z.string().optional(),
  })
  .passthrough();

export type FirestoreDocument = z.infer<typeof FirestoreDocumentSchema>;

/**
 * Decoded document with its metadata.
 */
export interface DocumentSnapshot {
  /** Trailing segment of the document name */
  id?: string;
  /** Path relative to the database's `documents` root */
  path?: string;
  /** Full resource name */
  name?: string;
  createTime?: Date;
  updateTime?: Date;
  data: DocumentData;
}

/**
 * Decodes a document envelope.
 */
export function parseDocument(document: FirestoreDocument): DocumentSnapshot {
  const snapshot: DocumentSnapshot = { data: decodeFields(document.fields) };

  if (document.name !== undefined) {
    snapshot.name = document.name;
    const marker = "/documents/";
    const index = document.name.indexOf(marker);
    snapshot.path = index === -1 ? document.name : document.name.slice(index + marker.length);
    const segments = document.name.split("/");
    snapshot.id = segments[segments.length - 1];
  }
  if (document.createTime !== undefined) {
    const created = parseTimestamp(document.createTime);
    if (created instanceof Date) {
      snapshot.createTime = created;
    }
  }
  if (document.updateTime !== undefined) {
    const updated = parseTimestamp(document.updateTime);
    if (updated instanceof Date) {
      snapshot.updateTime = updated;
    }
  }
  return snapshot;
}
