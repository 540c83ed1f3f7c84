import type { CallDirection, Dataset, DetailRecord, MasterRecord } from '../types';
import { SchemaError } from '../services/errors';

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireField(source: RawObject, key: string, path: string): unknown {
  if (!(key in source) || source[key] === undefined || source[key] === null) {
    throw new SchemaError(key, `${path}.${key}`, `Missing required field "${key}" at ${path}`);
  }
  return source[key];
}

function readString(source: RawObject, key: string, path: string): string {
  const value = requireField(source, key, path);
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  throw new SchemaError(key, `${path}.${key}`, `Field "${key}" at ${path} must be a string`);
}

// Accepts numbers and numeric strings ("42", " 7 ")
function readCount(source: RawObject, key: string, path: string): number {
  const value = requireField(source, key, path);
  const coerced =
    typeof value === 'number' ? value :
    typeof value === 'string' && value.trim() !== '' ? Number(value) :
    NaN;

  if (!Number.isInteger(coerced) || coerced < 0) {
    throw new SchemaError(
      key,
      `${path}.${key}`,
      `Field "${key}" at ${path} must be a non-negative integer, got ${JSON.stringify(value)}`
    );
  }
  return coerced;
}

const DIRECTION_ALIASES = new Map<string, CallDirection>([
  ['in', 'inbound'],
  ['inbound', 'inbound'],
  ['out', 'outbound'],
  ['outbound', 'outbound'],
]);

function readDirection(source: RawObject, path: string): CallDirection {
  const value = requireField(source, 'direction', path);
  const direction = typeof value === 'string' ? DIRECTION_ALIASES.get(value.trim().toLowerCase()) : undefined;
  if (!direction) {
    throw new SchemaError(
      'direction',
      `${path}.direction`,
      `Field "direction" at ${path} must be inbound or outbound, got ${JSON.stringify(value)}`
    );
  }
  return direction;
}

export function normalizeDetail(raw: unknown, path: string): DetailRecord {
  if (!isObject(raw)) {
    throw new SchemaError('<root>', path, `Call record at ${path} must be an object`);
  }

  return {
    callId: readString(raw, 'callId', path),
    direction: readDirection(raw, path),
    number: readString(raw, 'number', path),
    duration: readCount(raw, 'duration', path),
    switchCode: readString(raw, 'switchCode', path),
  };
}

export function normalizeMaster(raw: unknown, path: string): MasterRecord {
  if (!isObject(raw)) {
    throw new SchemaError('<root>', path, `Record at ${path} must be an object`);
  }

  const callRecords = requireField(raw, 'callRecords', path);
  if (!Array.isArray(callRecords)) {
    throw new SchemaError('callRecords', `${path}.callRecords`, `Field "callRecords" at ${path} must be an array`);
  }

  return {
    name: readString(raw, 'name', path),
    account: readString(raw, 'account', path),
    calls: readCount(raw, 'calls', path),
    minutes: readCount(raw, 'minutes', path),
    details: callRecords.map((detail, index) => normalizeDetail(detail, `${path}.callRecords[${index}]`)),
  };
}

/**
 * Converts the decoded payload into master records, preserving source order
 * for both masters and their call records. Fails on the first bad field.
 */
export function normalize(tree: unknown): Dataset {
  if (!Array.isArray(tree)) {
    throw new SchemaError('<root>', '', 'Expected a JSON array of records');
  }
  return tree.map((item, index) => normalizeMaster(item, `[${index}]`));
}
