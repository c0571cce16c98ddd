import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { Chalk } from 'chalk';
import { TOKEN_RULES } from '../highlight/token-rules.js';
import { renderHighlightedLine } from './highlight.js';
import { indentCommand } from './indent-cmd.js';
import { createProgram } from './index.js';
import { formatNavigation, navigateCommand } from './navigate.js';
import { formatOutline, outlineCommand } from './outline.js';
import { parsePositiveInt } from './utils.js';

const SOURCE = [
  'fn first() {',
  'return 1; // done',
  '}',
  '',
  'fn second() {',
  '        loop {',
  'x',
  '}',
  '}',
].join('\n');

const plain = new Chalk({ level: 0 });

describe('CLI commands', () => {
  let testDir: string;
  let file: string;
  let log: MockInstance<typeof console.log>;
  let errorLog: MockInstance<typeof console.error>;

  beforeEach(async () => {
    const tmpBase = path.join(os.tmpdir(), 'jade-mode-test');
    await fs.mkdir(tmpBase, { recursive: true });
    testDir = await fs.mkdtemp(path.join(tmpBase, 'cli-'));
    file = path.join(testDir, 'main.jade');
    await fs.writeFile(file, SOURCE);
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('outline', () => {
    it('should print the symbol index as JSON', async () => {
      await outlineCommand(file, { json: true });

      expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual([
        { name: 'first', line: 0, offset: 0 },
        { name: 'second', line: 4, offset: 34 },
      ]);
      expect(process.exitCode).toBeUndefined();
    });

    it('should reject files that are not .jade', async () => {
      const other = path.join(testDir, 'main.rs');
      await fs.writeFile(other, SOURCE);

      await outlineCommand(other, {});

      expect(process.exitCode).toBe(1);
      expect(errorLog.mock.calls[0][0]).toContain(`Unsupported file type: ${other}`);
    });

    it('should report a missing file', async () => {
      const missing = path.join(testDir, 'missing.jade');

      await outlineCommand(missing, {});

      expect(process.exitCode).toBe(1);
      expect(errorLog.mock.calls[0][0]).toContain(`File not found: ${missing}`);
    });

    it('should report failures as JSON with --json', async () => {
      const missing = path.join(testDir, 'missing.jade');

      await outlineCommand(missing, { json: true });

      expect(process.exitCode).toBe(1);
      expect(errorLog).not.toHaveBeenCalled();
      expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
        error: `File not found: ${missing}`,
        code: 'FILE_NOT_FOUND',
        severity: 'low',
        recoverable: true,
        context: { filePath: missing },
      });
    });
  });

  describe('indent', () => {
    it('should write re-indented text to stdout', async () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      await indentCommand(file, {});

      expect(write).toHaveBeenCalledWith(
        [
          'fn first() {',
          '    return 1; // done',
          '}',
          '',
          'fn second() {',
          '    loop {',
          '        x',
          '    }',
          '}',
        ].join('\n'),
      );
    });

    it('should rewrite the file with --write', async () => {
      await indentCommand(file, { write: true, indentOffset: '2' });

      expect(await fs.readFile(file, 'utf-8')).toBe(
        [
          'fn first() {',
          '  return 1; // done',
          '}',
          '',
          'fn second() {',
          '  loop {',
          '    x',
          '  }',
          '}',
        ].join('\n'),
      );
    });

    it('should keep CRLF line endings with --write', async () => {
      await fs.writeFile(file, 'fn a() {\r\nreturn 1;\r\n}\r\n');

      await indentCommand(file, { write: true });

      expect(await fs.readFile(file, 'utf-8')).toBe('fn a() {\r\n    return 1;\r\n}\r\n');
    });

    it('should list changed lines and fail with --check', async () => {
      await indentCommand(file, { check: true });

      const lines = log.mock.calls.map(call => String(call[0]));
      expect(lines.filter(line => line.startsWith(`${file}:`)).map(l => l.split(': ')[0])).toEqual([
        `${file}:2`,
        `${file}:6`,
        `${file}:7`,
        `${file}:8`,
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('should pass --check on an indented file', async () => {
      await fs.writeFile(file, 'fn a() {\n    return 1;\n}\n');

      await indentCommand(file, { check: true });

      expect(process.exitCode).toBeUndefined();
    });

    it('should read the indent offset from --config', async () => {
      const configPath = path.join(testDir, 'jade.yml');
      await fs.writeFile(configPath, 'indentOffset: 3\n');
      await fs.writeFile(file, 'fn a() {\nreturn 1;\n}');

      await indentCommand(file, { write: true, config: configPath });

      expect(await fs.readFile(file, 'utf-8')).toBe('fn a() {\n   return 1;\n}');
    });

    it('should fail on an invalid config', async () => {
      const configPath = path.join(testDir, 'jade.yml');
      await fs.writeFile(configPath, 'indentOffset: 99\n');

      await indentCommand(file, { config: configPath });

      expect(process.exitCode).toBe(1);
      expect(errorLog.mock.calls[0][0]).toContain(`Invalid config in ${configPath}`);
    });
  });

  describe('navigate', () => {
    it('should jump to the definition start', async () => {
      await navigateCommand(file, { line: '7', json: true });

      expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
        position: { line: 4, column: 0 },
        steps: 1,
        outcome: 'ok',
      });
    });

    it('should jump to the definition end', async () => {
      await navigateCommand(file, { line: '5', end: true, json: true });

      expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
        position: { line: 8, column: 0 },
        steps: 1,
        outcome: 'ok',
      });
    });

    it('should reject a line past the end of the file', async () => {
      await navigateCommand(file, { line: '40' });

      expect(process.exitCode).toBe(1);
      expect(errorLog.mock.calls[0][0]).toContain('--line 40 is past the end');
    });

    it('should reject a non-numeric count', async () => {
      await navigateCommand(file, { line: '1', count: 'two' });

      expect(process.exitCode).toBe(1);
      expect(errorLog.mock.calls[0][0]).toContain('--count must be a positive integer, got "two"');
    });
  });
});

describe('formatters', () => {
  it('should align outline rows', () => {
    const rows = formatOutline(
      [
        { name: 'a', line: 0, offset: 0 },
        { name: 'longer', line: 3, offset: 25 },
      ],
      plain,
    );

    expect(rows).toEqual(['a       line 1, offset 0', 'longer  line 4, offset 25']);
  });

  it('should describe navigation outcomes', () => {
    expect(formatNavigation('m.jade', { position: { line: 4, column: 0 }, steps: 1, outcome: 'ok' })).toBe(
      'm.jade:5:1 (1 step)',
    );
    expect(
      formatNavigation('m.jade', { position: { line: 0, column: 0 }, steps: 0, outcome: 'no-match' }),
    ).toBe('m.jade:1:1 (stopped after 0 steps: no further definition)');
    expect(
      formatNavigation('m.jade', { position: { line: 2, column: 3 }, steps: 0, outcome: 'unbalanced' }),
    ).toBe('m.jade:3:4 (no matching end found)');
  });

  it('should colour tokens and keep plain text', () => {
    const colors = new Chalk({ level: 1 });

    expect(renderHighlightedLine('fn main() { // go', TOKEN_RULES, colors)).toBe(
      '\u001b[35mfn\u001b[39m \u001b[34mmain\u001b[39m() { \u001b[90m// go\u001b[39m',
    );
  });

  it('should return uncoloured text when colours are off', () => {
    expect(renderHighlightedLine('    return i32;', TOKEN_RULES, plain)).toBe('    return i32;');
  });
});

describe('parsePositiveInt', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('12', '--count')).toBe(12);
  });

  it.each(['0', '-1', '1.5', 'abc', ''])('should reject %j', value => {
    expect(() => parsePositiveInt(value, '--count')).toThrow('--count must be a positive integer');
  });
});

describe('createProgram', () => {
  it('should register every command', () => {
    expect(createProgram().commands.map(command => command.name())).toEqual([
      'outline',
      'indent',
      'highlight',
      'navigate',
    ]);
  });
});
