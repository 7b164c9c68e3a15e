/**
 * Type definitions for the Mork parser
 */

import { MorkError } from './errors';

/** Namespace that cell values resolve against unless told otherwise. */
export const VALUE_NAMESPACE = 'a';

/** Namespace for column names and table ids. */
export const COLUMN_NAMESPACE = 'c';

/** Metadict cell that retargets a dict block at another namespace. */
export const DICT_NAMESPACE_CELL = 'a';

/** Metatable cell that overrides the row scope of a table's rows. */
export const ROW_SCOPE_CELL = 'r';

// Parser configuration options
export interface MorkParserOptions {
  /** Display name used in diagnostics. */
  source?: string | undefined;
  /** Decode `\x` and `$XX` escapes in literals (default true). */
  decodeLiterals?: boolean | undefined;
}

export interface MorkOid {
  id: string;
  scope: string;
}

export type MorkRow = Map<string, string>;

export interface MorkTable {
  id: string;
  scope: string;
  /** `<id>:<scope>`, the key of the table in the result map. */
  key: string;
  rowScope: string;
  meta: Map<string, string>;
  rows: Map<string, MorkRow>;
}

export type MorkTables = Map<string, MorkTable>;

export interface MorkParseResult {
  tables: MorkTables;
  error: MorkError | null;
}

// Plain-object forms, for JSON output
export interface MorkTableObject {
  meta: Record<string, string>;
  rows: Record<string, Record<string, string>>;
}

export type MorkTablesObject = Record<string, MorkTableObject>;
