export interface SourceLocation {
  source?: string | undefined;
  line?: number | undefined;
  column?: number | undefined;
  offset?: number | undefined;
  lineText?: string | undefined;
}

export type MorkErrorKind =
  | 'lexical'
  | 'syntax'
  | 'unresolved-reference'
  | 'invalid-identifier'
  | 'group-mismatch'
  | 'io';

export class MorkError extends Error {
  readonly kind: MorkErrorKind;
  readonly detail: string;
  source?: string | undefined;
  line?: number | undefined;
  column?: number | undefined;
  offset?: number | undefined;
  lineText?: string | undefined;

  constructor(kind: MorkErrorKind, message: string, location: SourceLocation = {}) {
    super(formatMorkErrorMessage(message, location));
    this.name = 'MorkError';
    this.kind = kind;
    this.detail = message;
    this.source = location.source;
    this.line = location.line;
    this.column = location.column;
    this.offset = location.offset;
    this.lineText = location.lineText;
  }
}

export class LexicalError extends MorkError {
  constructor(message: string, location: SourceLocation = {}) {
    super('lexical', message, location);
    this.name = 'LexicalError';
  }
}

export class MorkSyntaxError extends MorkError {
  constructor(message: string, location: SourceLocation = {}) {
    super('syntax', message, location);
    this.name = 'MorkSyntaxError';
  }
}

export class UnresolvedReferenceError extends MorkError {
  readonly id: string;
  readonly namespace: string;

  constructor(id: string, namespace: string, location: SourceLocation = {}) {
    super('unresolved-reference', `Unresolved alias ${id}:${namespace}`, location);
    this.name = 'UnresolvedReferenceError';
    this.id = id;
    this.namespace = namespace;
  }
}

export class InvalidIdentifierError extends MorkError {
  readonly identifier: string;

  constructor(identifier: string, location: SourceLocation = {}) {
    super('invalid-identifier', `Not a hex id: "${identifier}"`, location);
    this.name = 'InvalidIdentifierError';
    this.identifier = identifier;
  }
}

export class GroupMismatchError extends MorkError {
  readonly startId: string;
  readonly commitId: string;

  constructor(startId: string, commitId: string, location: SourceLocation = {}) {
    super('group-mismatch', `Group ${startId} committed as ${commitId}`, location);
    this.name = 'GroupMismatchError';
    this.startId = startId;
    this.commitId = commitId;
  }
}

// file:line:column, or file@offset when only the byte offset is known
function describeLocation({ source, line, column, offset }: SourceLocation): string {
  const file = source ?? '';
  if (line !== undefined) {
    const at = column !== undefined ? `${line}:${column}` : `${line}`;
    return file ? `${file}:${at}` : at;
  }
  if (offset !== undefined) {
    return `${file}@${offset}`;
  }
  return file;
}

function formatMorkErrorMessage(message: string, location: SourceLocation): string {
  const where = describeLocation(location);
  const head = where ? `${where} - ${message}` : message;
  return location.lineText ? `${head}\n    ${location.lineText}` : head;
}
