/**
 * Mork Parser - recursive descent over the token stream
 *
 * Main entry points: parse(input), load(path) and loads(content)
 *
 * Grammar errors are never thrown here. The first one is stored in `error`,
 * after which every expect/resolve step is a no-op returning an empty value,
 * so productions unwind without checking at each call.
 */

import * as fs from 'fs';
import { MorkContext } from './context';
import {
  GroupMismatchError,
  InvalidIdentifierError,
  LexicalError,
  MorkError,
  MorkSyntaxError,
  UnresolvedReferenceError,
} from './errors';
import { MorkLexer, MorkToken, TokenKind, groupIdOf, isHexId } from './lexer';
import { SourcePosition, SourceText, START_POSITION, readByteString } from './source';
import {
  COLUMN_NAMESPACE,
  DICT_NAMESPACE_CELL,
  MorkOid,
  MorkParseResult,
  MorkParserOptions,
  MorkRow,
  MorkTable,
  MorkTables,
  ROW_SCOPE_CELL,
  VALUE_NAMESPACE,
} from './types';
import { coalesceOid, decodeLiteral, rowKey } from './values';

const NO_TOKEN: MorkToken = { kind: 'eof', text: '', position: START_POSITION };

export class MorkParser {
  private readonly lexer: MorkLexer;
  private readonly source: SourceText;
  private readonly decodeLiterals: boolean;
  private readonly root: MorkContext = new MorkContext();
  private context: MorkContext;
  private peeked: MorkToken | null = null;
  private error: MorkError | null = null;

  constructor(lexer: MorkLexer, options: MorkParserOptions = {}) {
    this.lexer = lexer;
    this.source = lexer.source;
    this.decodeLiterals = options.decodeLiterals ?? true;
    this.context = this.root;
  }

  public static parse(input: Uint8Array | string, options: MorkParserOptions = {}): MorkParseResult {
    const lexer = MorkLexer.fromContent(input, options.source);
    return new MorkParser(lexer, options).parse();
  }

  public static parseFile(filePath: string, options: MorkParserOptions = {}): MorkParseResult {
    let content: Buffer;
    try {
      content = fs.readFileSync(filePath);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return {
        tables: new Map(),
        error: new MorkError('io', `Cannot read file: ${reason}`, { source: filePath }),
      };
    }
    return MorkParser.parse(content, { ...options, source: options.source ?? filePath });
  }

  public getContext(): MorkContext {
    return this.root;
  }

  public parse(): MorkParseResult {
    for (;;) {
      const token = this.peek();
      if (this.error) {
        break;
      }
      switch (token.kind) {
        case 'eof':
          return { tables: this.root.getTables(), error: null };
        case 'group-start':
          this.parseGroup();
          break;
        default:
          this.parseConstruct(token);
      }
      if (this.error) {
        break;
      }
    }
    return { tables: this.root.getTables(), error: this.error };
  }

  // dict, row or table; shared by the top level and groups
  private parseConstruct(token: MorkToken): void {
    switch (token.kind) {
      case 'langle':
        this.parseDict();
        return;
      case 'lsquare':
        // legal, but a row outside a table has nowhere to go
        this.parseRow(COLUMN_NAMESPACE);
        return;
      case 'lbrace': {
        const table = this.parseTable();
        if (!this.error) {
          this.context.setTable(table);
        }
        return;
      }
      default:
        this.unexpected(token);
    }
  }

  //  group ::= GROUPSTART (dict | row | table)* (GROUPCOMMIT | GROUPABORT)
  private parseGroup(): void {
    const start = this.expect('group-start');
    const startId = groupIdOf(start);
    const outer = this.context;
    this.context = outer.beginGroup();
    try {
      for (;;) {
        const token = this.peek();
        if (this.error) {
          return;
        }
        switch (token.kind) {
          case 'eof':
            // truncated group: discard like an abort
            return;
          case 'group-abort':
            this.next();
            return;
          case 'group-commit': {
            this.next();
            const commitId = groupIdOf(token);
            if (commitId.toLowerCase() !== startId.toLowerCase()) {
              this.fail(new GroupMismatchError(startId, commitId, this.source.locate(token.position)));
              return;
            }
            this.context.commit();
            return;
          }
          case 'group-start':
            this.fail(
              new MorkSyntaxError('Nested groups are not supported', this.source.locate(token.position)),
            );
            return;
          default:
            this.parseConstruct(token);
        }
        if (this.error) {
          return;
        }
      }
    } finally {
      this.context = outer;
    }
  }

  //  dict ::= < metadict? cell* >
  //  metadict ::= < cell* >
  private parseDict(): void {
    this.expect('langle');
    let namespace = VALUE_NAMESPACE;
    if (this.peek().kind === 'langle') {
      const meta = this.parseMetaDict();
      namespace = meta.get(DICT_NAMESPACE_CELL) ?? namespace;
    }
    const cells = this.parseCells();
    this.expect('rangle');

    if (this.error) {
      return;
    }
    for (const [id, value] of cells) {
      this.context.define(id, namespace, value);
    }
  }

  private parseMetaDict(): Map<string, string> {
    this.expect('langle');
    const cells = this.parseCells();
    this.expect('rangle');
    return cells;
  }

  //  cell ::= ( col slot )
  //  col ::= ref /*default scope is c*/ | name
  //  slot ::= ref /*default scope is a*/ | =literal
  private parseCell(): [string, string] {
    this.expect('lparen');

    const name =
      this.peek().kind === 'caret' ? this.parseRef(COLUMN_NAMESPACE) : this.expect('name').text;

    let value: string;
    if (this.peek().kind === 'equal') {
      this.next();
      const raw = this.expect('literal').text;
      value = this.decodeLiterals ? decodeLiteral(raw) : readByteString(raw);
    } else {
      value = this.parseRef(VALUE_NAMESPACE);
    }

    this.expect('rparen');
    return [name, value];
  }

  private parseCells(): Map<string, string> {
    const cells = new Map<string, string>();
    while (!this.error && this.peek().kind === 'lparen') {
      const [name, value] = this.parseCell();
      if (!this.error) {
        cells.set(name, value);
      }
    }
    return cells;
  }

  //  row ::= [ roid cell* ]
  //  roid ::= oid /*default scope is the table's row scope*/
  private parseRow(rowScope: string): { key: string; row: MorkRow } {
    this.expect('lsquare');
    const oid = this.parseOid(rowScope);
    const row = this.parseCells();
    this.expect('rsquare');
    return { key: rowKey(oid, rowScope), row };
  }

  //  table ::= { toid metatable? (row | roid)* }
  //  toid ::= oid /*default scope is c*/
  //  metatable ::= { cell* }
  private parseTable(): MorkTable {
    this.expect('lbrace');
    const oid = this.parseOid(COLUMN_NAMESPACE);
    const table: MorkTable = {
      id: oid.id,
      scope: oid.scope,
      key: coalesceOid(oid),
      rowScope: oid.scope,
      meta: new Map(),
      rows: new Map(),
    };

    if (this.peek().kind === 'lbrace') {
      this.next();
      table.meta = this.parseCells();
      this.expect('rbrace');
      table.rowScope = table.meta.get(ROW_SCOPE_CELL) ?? table.rowScope;
    }

    for (;;) {
      const token = this.peek();
      if (this.error) {
        return table;
      }
      switch (token.kind) {
        case 'rbrace':
          this.next();
          return table;
        case 'lsquare': {
          const { key, row } = this.parseRow(table.rowScope);
          if (!this.error) {
            table.rows.set(key, row);
          }
          break;
        }
        case 'name': {
          // a bare row id drops that row from the table
          const id = this.expectId();
          table.rows.delete(id);
          break;
        }
        default:
          this.unexpected(token);
          return table;
      }
    }
  }

  //  oid ::= id | id:scope
  //  scope ::= name | ref
  private parseOid(defaultNamespace: string): MorkOid {
    const id = this.expectId();
    let scope = defaultNamespace;
    if (this.peek().kind === 'colon') {
      this.next();
      scope = this.parseScope(defaultNamespace);
    }
    return { id, scope };
  }

  private parseScope(defaultNamespace: string): string {
    if (this.peek().kind === 'caret') {
      return this.parseRef(defaultNamespace);
    }
    return this.expect('name').text;
  }

  //  ref ::= ^id | ^id:scope
  private parseRef(defaultNamespace: string): string {
    const caret = this.expect('caret');
    const id = this.expectId();
    let namespace = defaultNamespace;
    if (this.peek().kind === 'colon') {
      this.next();
      namespace = this.parseScope(defaultNamespace);
    }
    return this.resolve(id, namespace, caret.position);
  }

  private resolve(id: string, namespace: string, position: SourcePosition): string {
    if (this.error) {
      return '';
    }
    const value = this.context.lookup(id, namespace);
    if (value === undefined) {
      this.fail(new UnresolvedReferenceError(id, namespace, this.source.locate(position)));
      return '';
    }
    return value;
  }

  private expectId(): string {
    const token = this.expect('name');
    if (this.error) {
      return '';
    }
    if (!isHexId(token.text)) {
      this.fail(new InvalidIdentifierError(token.text, this.source.locate(token.position)));
      return '';
    }
    return token.text;
  }

  private expect(kind: TokenKind): MorkToken {
    if (this.error) {
      return NO_TOKEN;
    }
    const token = this.next();
    if (this.error) {
      return NO_TOKEN;
    }
    if (token.kind !== kind) {
      this.fail(
        new MorkSyntaxError(
          `Unexpected ${token.kind} ${JSON.stringify(readByteString(token.text))}, expected ${kind}`,
          this.source.locate(token.position),
        ),
      );
      return NO_TOKEN;
    }
    return token;
  }

  private peek(): MorkToken {
    if (!this.peeked) {
      this.peeked = this.pull();
    }
    return this.peeked;
  }

  private next(): MorkToken {
    const token = this.peeked ?? this.pull();
    this.peeked = null;
    return token;
  }

  private pull(): MorkToken {
    const token = this.lexer.nextToken();
    if (token.kind === 'error') {
      this.fail(new LexicalError(token.text, this.source.locate(token.position)));
    }
    return token;
  }

  private unexpected(token: MorkToken): void {
    this.fail(
      new MorkSyntaxError(
        `Unexpected ${token.kind} ${JSON.stringify(readByteString(token.text))}`,
        this.source.locate(token.position),
      ),
    );
  }

  private fail(error: MorkError): void {
    if (!this.error) {
      this.error = error;
    }
  }
}

// ============================================================================
// Public API
// ============================================================================

export function parse(input: Uint8Array | string, options?: MorkParserOptions): MorkParseResult {
  return MorkParser.parse(input, options);
}

export function load(filePath: string, options?: MorkParserOptions): MorkTables {
  const { tables, error } = MorkParser.parseFile(filePath, options);
  if (error) {
    throw error;
  }
  return tables;
}

export function loads(content: Uint8Array | string, options?: MorkParserOptions): MorkTables {
  const { tables, error } = MorkParser.parse(content, options);
  if (error) {
    throw error;
  }
  return tables;
}
