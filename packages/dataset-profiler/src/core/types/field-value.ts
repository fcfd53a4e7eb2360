/**
 * Field value and semantic type model
 *
 * Every value the engine lifts out of a dataset (samples, code-list codes)
 * is carried as a tagged variant so that the presentation layer never has to
 * guess what a raw SQLite value was.
 *
 * @module core/types/field-value
 */

/**
 * Semantic field types surfaced in the Document
 */
export type SemanticType =
  | 'integer'
  | 'real'
  | 'text'
  | 'boolean'
  | 'datetime'
  | 'binary'
  | 'geometry';

/**
 * Semantic types that can hold a sampled value (geometry is previewed instead)
 */
export type ValueKind = Exclude<SemanticType, 'geometry'>;

export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: number;
}

export interface RealValue {
  readonly kind: 'real';
  readonly value: number;
}

export interface TextValue {
  readonly kind: 'text';
  readonly value: string;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

/**
 * Date or date-time kept verbatim as stored (ISO-8601 in GeoPackage)
 */
export interface DateTimeValue {
  readonly kind: 'datetime';
  readonly value: string;
}

export interface BinaryValue {
  readonly kind: 'binary';
  readonly byteLength: number;
  /** Base64 rendering of the bytes */
  readonly value: string;
}

export type FieldValue =
  | IntegerValue
  | RealValue
  | TextValue
  | BooleanValue
  | DateTimeValue
  | BinaryValue;
