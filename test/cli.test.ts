import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CliOutput, runCli } from '../src/cli';

const FIXTURE = path.join(__dirname, 'fixtures', 'addressbook.mork');

class RecordingOutput implements CliOutput {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  log(line: string): void {
    this.lines.push(line);
  }

  error(line: string): void {
    this.errors.push(line);
  }
}

const ADDRESS_BOOK = [
  '----- 1:people -----',
  '  row 1:',
  "    email: 'alice@example.test'",
  "    name: 'Alice'",
  '  row 2:',
  "    email: 'bob@example.test'",
  "    name: 'Bob'",
  '----- 2:c -----',
  '  row 1:',
  "    name: 'Carol'",
];

describe('mork-dump', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mork-cli-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('should print tables sorted by key', () => {
    const out = new RecordingOutput();

    expect(runCli([FIXTURE], out)).toBe(0);
    expect(out.lines).toEqual(ADDRESS_BOOK);
    expect(out.errors).toEqual([]);
  });

  test('should print JSON', () => {
    const out = new RecordingOutput();

    expect(runCli(['--json', FIXTURE], out)).toBe(0);
    expect(JSON.parse(out.lines.join('\n'))).toEqual({
      '1:people': {
        meta: { k: 'contacts' },
        rows: {
          '1': { name: 'Alice', email: 'alice@example.test' },
          '2': { name: 'Bob', email: 'bob@example.test' },
        },
      },
      '2:c': { meta: {}, rows: { '1': { name: 'Carol' } } },
    });
  });

  test('should dump tokens', () => {
    const filePath = path.join(dir, 'tokens.mork');
    fs.writeFileSync(filePath, '<(a=1)>');
    const out = new RecordingOutput();

    expect(runCli(['--tokens', filePath], out)).toBe(0);
    expect(out.lines).toEqual([
      '1:0 langle "<"',
      '1:1 lparen "("',
      '1:2 name "a"',
      '1:3 equal "="',
      '1:4 literal "1"',
      '1:5 rparen ")"',
      '1:6 rangle ">"',
      '1:7 eof ""',
    ]);
  });

  test('should report a bad file and carry on with the rest', () => {
    const bad = path.join(dir, 'bad.mork');
    fs.writeFileSync(bad, '+');
    const out = new RecordingOutput();

    expect(runCli([bad, FIXTURE], out)).toBe(1);
    expect(out.errors).toEqual([`ERROR: ${bad}:1:0 - Unexpected plus "+"\n    +`]);
    expect(out.lines).toEqual(ADDRESS_BOOK);
  });

  test('should report unreadable files', () => {
    const missing = path.join(dir, 'missing.mork');
    const out = new RecordingOutput();

    expect(runCli([missing], out)).toBe(1);
    expect(out.errors).toHaveLength(1);
    expect(out.errors[0]).toMatch(/^ERROR: .*missing\.mork - Cannot read file: /);
  });

  test('should print usage without files', () => {
    const out = new RecordingOutput();

    expect(runCli([], out)).toBe(2);
    expect(out.errors).toEqual(['Usage: mork-dump [--tokens | --json] <file.mork>...']);
  });

  test('should reject unknown options', () => {
    const out = new RecordingOutput();

    expect(runCli(['--verbose', FIXTURE], out)).toBe(2);
    expect(out.errors[0]).toBe('Unknown option --verbose');
  });
});
