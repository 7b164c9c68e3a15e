/**
 * Mork Lexer - Turns a byte buffer into tokens, one pull at a time
 *
 * The scanner is a resumable state machine: `state` names the scan that runs
 * next and `cursor` is where it resumes. Each state handler either queues
 * tokens and returns the following state, or queues a terminal token and
 * returns 'done'.
 */

import { EOF, SourcePosition, SourceText, START_POSITION, readByteString } from './source';

export type TokenKind =
  | 'eof'
  | 'error'
  | 'literal'
  | 'name'
  | 'caret'
  | 'plus'
  | 'colon'
  | 'equal'
  | 'langle'
  | 'rangle'
  | 'lparen'
  | 'rparen'
  | 'lsquare'
  | 'rsquare'
  | 'lbrace'
  | 'rbrace'
  | 'group-start'
  | 'group-commit'
  | 'group-abort';

export interface MorkToken {
  kind: TokenKind;
  /** Source bytes, one char per byte, or the message for an 'error' token. */
  text: string;
  position: SourcePosition;
}

export type ScanState = 'default' | 'name' | 'literal' | 'comment' | 'group' | 'done';

const SINGLES: ReadonlyMap<number, TokenKind> = new Map<number, TokenKind>([
  [0x28, 'lparen'],
  [0x29, 'rparen'],
  [0x5b, 'lsquare'],
  [0x5d, 'rsquare'],
  [0x7b, 'lbrace'],
  [0x7d, 'rbrace'],
  [0x3c, 'langle'],
  [0x3e, 'rangle'],
  [0x3a, 'colon'],
  [0x2b, 'plus'],
]);

const CH = {
  caret: 0x5e,
  slash: 0x2f,
  equal: 0x3d,
  at: 0x40,
  backslash: 0x5c,
  rparen: 0x29,
  lbrace: 0x7b,
  rbrace: 0x7d,
  tilde: 0x7e,
  newline: 0x0a,
  underscore: 0x5f,
} as const;

// allowed after the first character of a name
const NAME_TAIL = new Set([0x2d, 0x21, 0x3f, 0x2b]); // - ! ? +

export function isSpace(ch: number): boolean {
  return ch === 0x20 || ch === 0x0a || ch === 0x0d || ch === 0x09;
}

export function isDigit(ch: number): boolean {
  return ch >= 0x30 && ch <= 0x39;
}

export function isAlpha(ch: number): boolean {
  return (ch >= 0x61 && ch <= 0x7a) || (ch >= 0x41 && ch <= 0x5a);
}

export function isHex(ch: number): boolean {
  return isDigit(ch) || (ch >= 0x61 && ch <= 0x66) || (ch >= 0x41 && ch <= 0x46);
}

export function isHexId(text: string): boolean {
  return /^[0-9a-fA-F]+$/.test(text);
}

export class MorkLexer {
  readonly source: SourceText;
  private state: ScanState = 'default';
  private cursor: SourcePosition = START_POSITION;
  private start: SourcePosition = START_POSITION;
  private pending: MorkToken[] = [];
  private terminal: MorkToken | null = null;

  constructor(source: SourceText) {
    this.source = source;
  }

  public static fromContent(content: Uint8Array | string, name?: string): MorkLexer {
    return new MorkLexer(new SourceText(content, name));
  }

  public nextToken(): MorkToken {
    for (;;) {
      const queued = this.pending.shift();
      if (queued) {
        return queued;
      }
      if (this.state === 'done') {
        // terminal is always set before entering 'done'
        return this.terminal ?? this.makeToken('eof', '', this.cursor);
      }
      this.state = this.step();
    }
  }

  /** Drains the scanner, up to and including the terminal token. */
  public tokenize(): MorkToken[] {
    const tokens: MorkToken[] = [];
    for (;;) {
      const token = this.nextToken();
      tokens.push(token);
      if (token.kind === 'eof' || token.kind === 'error') {
        return tokens;
      }
    }
  }

  private step(): ScanState {
    switch (this.state) {
      case 'default':
        return this.scanDefault();
      case 'name':
        return this.scanName();
      case 'literal':
        return this.scanLiteral();
      case 'comment':
        return this.scanComment();
      case 'group':
        return this.scanGroup();
      case 'done':
        return 'done';
    }
  }

  private scanDefault(): ScanState {
    for (;;) {
      const ch = this.peek();
      if (ch === EOF) {
        this.emitTerminal(this.makeToken('eof', '', this.start));
        return 'done';
      }

      if (isSpace(ch)) {
        this.advance();
        this.start = this.cursor;
        continue;
      }

      const single = SINGLES.get(ch);
      if (single) {
        this.advance();
        this.emit(single);
        return 'default';
      }

      if (ch === CH.caret) {
        this.advance();
        this.emit('caret');
        if (this.gatherHex().length === 0) {
          return this.fail(`Expected hex id after '^'`);
        }
        this.emit('name');
        return 'default';
      }

      if (ch === CH.slash) {
        return 'comment';
      }
      if (ch === CH.equal) {
        return 'literal';
      }
      if (ch === CH.at) {
        return 'group';
      }
      if (isAlpha(ch) || isDigit(ch) || ch === CH.underscore) {
        return 'name';
      }

      return this.fail(`Unexpected character ${JSON.stringify(String.fromCharCode(ch))}`);
    }
  }

  private scanName(): ScanState {
    let first = true;
    for (;;) {
      const ch = this.peek();
      const accepted =
        isAlpha(ch) || isDigit(ch) || ch === CH.underscore || (!first && NAME_TAIL.has(ch));
      if (!accepted) {
        break;
      }
      this.advance();
      first = false;
    }
    this.emit('name');
    return 'default';
  }

  private scanLiteral(): ScanState {
    if (this.advance() !== CH.equal) {
      return this.fail(`Expected '='`);
    }
    this.emit('equal');

    // Escapes are left in place; only track them to find the terminator.
    let escaped = false;
    for (;;) {
      const ch = this.peek();
      if (ch === EOF) {
        break;
      }
      if (!escaped && ch === CH.rparen) {
        break;
      }
      escaped = !escaped && ch === CH.backslash;
      this.advance();
    }
    this.emit('literal');
    return 'default';
  }

  private scanComment(): ScanState {
    if (this.advance() !== CH.slash || this.advance() !== CH.slash) {
      return this.fail(`Expected "//"`);
    }
    for (;;) {
      const ch = this.peek();
      if (ch === EOF || ch === CH.newline) {
        break;
      }
      this.advance();
    }
    this.start = this.cursor;
    return 'default';
  }

  // @$${ID{@   @$$}ID}@   @$$}~~}@
  private scanGroup(): ScanState {
    if (!this.expectSequence('@$$')) {
      return 'done';
    }
    const marker = this.advance();
    if (marker === CH.lbrace) {
      if (this.gatherHex().length === 0) {
        return this.fail('Bad group id');
      }
      if (!this.expectSequence('{@')) {
        return 'done';
      }
      this.emit('group-start');
      return 'default';
    }
    if (marker === CH.rbrace) {
      if (this.peek() === CH.tilde) {
        if (!this.expectSequence('~~}@')) {
          return 'done';
        }
        this.emit('group-abort');
        return 'default';
      }
      if (this.gatherHex().length === 0) {
        return this.fail('Bad group id');
      }
      if (!this.expectSequence('}@')) {
        return 'done';
      }
      this.emit('group-commit');
      return 'default';
    }
    return this.fail('Bad group marker');
  }

  private expectSequence(sequence: string): boolean {
    for (let i = 0; i < sequence.length; i += 1) {
      if (this.advance() !== sequence.charCodeAt(i)) {
        this.fail(`Expected "${sequence}"`);
        return false;
      }
    }
    return true;
  }

  private gatherHex(): string {
    const from = this.cursor.offset;
    while (isHex(this.peek())) {
      this.advance();
    }
    return this.source.slice(from, this.cursor.offset);
  }

  private peek(): number {
    return this.source.byteAt(this.cursor.offset);
  }

  private advance(): number {
    const ch = this.source.byteAt(this.cursor.offset);
    if (ch === EOF) {
      return EOF;
    }
    const { offset, line, column } = this.cursor;
    this.cursor =
      ch === CH.newline
        ? { offset: offset + 1, line: line + 1, column: 0 }
        : { offset: offset + 1, line, column: column + 1 };
    return ch;
  }

  private emit(kind: TokenKind): void {
    this.pending.push(
      this.makeToken(kind, this.source.slice(this.start.offset, this.cursor.offset), this.start),
    );
    this.start = this.cursor;
  }

  private fail(message: string): ScanState {
    this.emitTerminal(this.makeToken('error', message, this.cursor));
    return 'done';
  }

  private emitTerminal(token: MorkToken): void {
    this.terminal = token;
    this.pending.push(token);
  }

  private makeToken(kind: TokenKind, text: string, position: SourcePosition): MorkToken {
    return { kind, text, position };
  }
}

/** `line:column kind "text"`, as printed by the token dump. */
export function describeToken(token: MorkToken): string {
  const text = token.kind === 'error' ? token.text : readByteString(token.text);
  return `${token.position.line}:${token.position.column} ${token.kind} ${JSON.stringify(text)}`;
}

/** Group id carried by a group-start or group-commit token. */
export function groupIdOf(token: MorkToken): string {
  return token.text.slice(4, -2);
}
