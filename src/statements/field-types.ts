/**
 * Unsigned MySQL integer column types accepted in table schemas
 */
export type FieldTypeName = 'TINYINT' | 'SMALLINT' | 'MEDIUMINT' | 'INT' | 'BIGINT';

export interface FieldType {
  byteWidth: number;
  maxValue: bigint;
}

function unsigned(byteWidth: number): FieldType {
  return {
    byteWidth,
    maxValue: (1n << BigInt(byteWidth * 8)) - 1n,
  };
}

export const FIELD_TYPES: Readonly<Record<FieldTypeName, FieldType>> = Object.freeze({
  TINYINT: unsigned(1),    // 255
  SMALLINT: unsigned(2),   // 65535
  MEDIUMINT: unsigned(3),  // 16777215
  INT: unsigned(4),        // 4294967295
  BIGINT: unsigned(8),     // 18446744073709551615
});

export function isFieldTypeName(value: string): value is FieldTypeName {
  return Object.prototype.hasOwnProperty.call(FIELD_TYPES, value);
}
