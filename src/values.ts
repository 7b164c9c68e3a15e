/**
 * Value helpers - literal decoding, oid coalescing, plain-object conversion
 */

import { readBytes, readByteString } from './source';
import { MorkOid, MorkTables, MorkTablesObject } from './types';

const BACKSLASH = 0x5c;
const DOLLAR = 0x24;
const CR = 0x0d;
const LF = 0x0a;

/**
 * Decodes a literal as scanned (one char per byte): `\` + newline is a line
 * continuation, `\x` yields `x`, `$XX` yields the byte 0xXX. The bytes are
 * then read as UTF-8, or as latin1 when they are not valid UTF-8.
 */
export function decodeLiteral(raw: string): string {
  if (!raw.includes('\\') && !raw.includes('$')) {
    return readByteString(raw);
  }
  const input = Buffer.from(raw, 'latin1');
  const output: number[] = [];
  let i = 0;
  while (i < input.length) {
    const byte = input[i] ?? 0;
    if (byte === BACKSLASH && i + 1 < input.length) {
      const escaped = input[i + 1] ?? 0;
      if (escaped === LF) {
        i += 2;
      } else if (escaped === CR && input[i + 2] === LF) {
        i += 3;
      } else {
        output.push(escaped);
        i += 2;
      }
      continue;
    }
    if (byte === DOLLAR) {
      const hex = input.toString('latin1', i + 1, i + 3);
      if (/^[0-9a-fA-F]{2}$/.test(hex)) {
        output.push(parseInt(hex, 16));
        i += 3;
        continue;
      }
    }
    output.push(byte);
    i += 1;
  }
  return readBytes(Buffer.from(output));
}

export function coalesceOid(oid: MorkOid): string {
  return `${oid.id}:${oid.scope}`;
}

/** Rows in the table's own row scope are keyed by bare id. */
export function rowKey(oid: MorkOid, rowScope: string): string {
  return oid.scope === rowScope ? oid.id : coalesceOid(oid);
}

export function toObject(tables: MorkTables): MorkTablesObject {
  const result: MorkTablesObject = {};
  for (const [key, table] of tables) {
    const rows: Record<string, Record<string, string>> = {};
    for (const [rowId, row] of table.rows) {
      rows[rowId] = Object.fromEntries(row);
    }
    result[key] = { meta: Object.fromEntries(table.meta), rows };
  }
  return result;
}
