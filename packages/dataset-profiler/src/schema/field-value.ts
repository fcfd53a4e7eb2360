/**
 * Conversion of raw SQLite values into tagged FieldValues
 *
 * SQLite columns are dynamically typed, so the runtime type of a value wins
 * over the declared type; the declared type only refines numbers (BOOLEAN
 * 0/1) and strings (DATE/DATETIME).
 */

import type { FieldValue, SemanticType } from '../core/types/field-value.js';
import type { SqlValue } from '../reader/types.js';

export function toFieldValue(raw: SqlValue, declared: SemanticType): FieldValue | null {
  if (raw === null) {
    return null;
  }

  if (typeof raw === 'bigint') {
    const asNumber = Number(raw);
    return Number.isSafeInteger(asNumber)
      ? { kind: 'integer', value: asNumber }
      : { kind: 'text', value: raw.toString() };
  }

  if (typeof raw === 'number') {
    if (declared === 'boolean' && (raw === 0 || raw === 1)) {
      return { kind: 'boolean', value: raw === 1 };
    }
    if (!Number.isFinite(raw)) {
      return { kind: 'text', value: String(raw) };
    }
    if (declared === 'real') {
      return { kind: 'real', value: raw };
    }
    return Number.isInteger(raw) ? { kind: 'integer', value: raw } : { kind: 'real', value: raw };
  }

  if (typeof raw === 'string') {
    return declared === 'datetime' ? { kind: 'datetime', value: raw } : { kind: 'text', value: raw };
  }

  return {
    kind: 'binary',
    byteLength: raw.byteLength,
    value: Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).toString('base64'),
  };
}

/**
 * Display string of a value, as used for preview properties and code labels
 */
export function formatFieldValue(value: FieldValue): string {
  switch (value.kind) {
    case 'integer':
    case 'real':
      return String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'binary':
      return `<${value.byteLength} bytes>`;
    case 'text':
    case 'datetime':
      return value.value;
  }
}

/**
 * Key used to deduplicate values regardless of their numeric/text kind
 */
export function fieldValueKey(value: FieldValue): string {
  return `${value.kind}:${formatFieldValue(value)}`;
}
