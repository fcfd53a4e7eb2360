import { describe, expect, it } from 'vitest';
import { fieldValueKey, formatFieldValue, toFieldValue } from '../../../schema/field-value.js';

describe('toFieldValue', () => {
  it('returns null for SQL NULL', () => {
    expect(toFieldValue(null, 'text')).toBeNull();
  });

  it('reads 0/1 of a boolean column as booleans', () => {
    expect(toFieldValue(1, 'boolean')).toEqual({ kind: 'boolean', value: true });
    expect(toFieldValue(0, 'boolean')).toEqual({ kind: 'boolean', value: false });
    expect(toFieldValue(2, 'boolean')).toEqual({ kind: 'integer', value: 2 });
  });

  it('lets the runtime value decide between integer and real', () => {
    expect(toFieldValue(3.5, 'integer')).toEqual({ kind: 'real', value: 3.5 });
    expect(toFieldValue(4, 'real')).toEqual({ kind: 'real', value: 4 });
    expect(toFieldValue(4, 'text')).toEqual({ kind: 'integer', value: 4 });
  });

  it('keeps big integers exact', () => {
    expect(toFieldValue(10n, 'integer')).toEqual({ kind: 'integer', value: 10 });
    expect(toFieldValue(2n ** 64n, 'integer')).toEqual({ kind: 'text', value: '18446744073709551616' });
  });

  it('tags strings of date columns as datetime', () => {
    expect(toFieldValue('2024-03-01', 'datetime')).toEqual({ kind: 'datetime', value: '2024-03-01' });
    expect(toFieldValue('2024-03-01', 'text')).toEqual({ kind: 'text', value: '2024-03-01' });
  });

  it('encodes blobs as base64', () => {
    expect(toFieldValue(Buffer.from([1, 2, 3]), 'binary')).toEqual({
      kind: 'binary',
      byteLength: 3,
      value: 'AQID',
    });
  });
});

describe('formatFieldValue', () => {
  it('renders display strings', () => {
    expect(formatFieldValue({ kind: 'real', value: 2.25 })).toBe('2.25');
    expect(formatFieldValue({ kind: 'boolean', value: false })).toBe('false');
    expect(formatFieldValue({ kind: 'binary', byteLength: 16, value: '' })).toBe('<16 bytes>');
  });

  it('keys values by kind and display form', () => {
    expect(fieldValueKey({ kind: 'integer', value: 1 })).toBe('integer:1');
    expect(fieldValueKey({ kind: 'text', value: '1' })).toBe('text:1');
  });
});
