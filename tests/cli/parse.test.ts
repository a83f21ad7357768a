/**
 * Kestrel CLI Tests: kestrel-parse
 * Argument parsing and runs against temporary files
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  type CliIO,
  formatTokens,
  parseCliArgs,
  type ParsedCliArgs,
  runParse,
} from '../../src/cli-parse.js';
import { tokensOf } from '../helpers/syntax.js';

type RunArgs = Extract<ParsedCliArgs, { mode: 'run' }>;

function runArgs(file: string, overrides: Partial<RunArgs> = {}): RunArgs {
  return {
    mode: 'run',
    file,
    grammar: undefined,
    format: undefined,
    config: undefined,
    ...overrides,
  };
}

describe('kestrel-parse CLI', () => {
  describe('parseCliArgs', () => {
    it('parses a bare file argument', () => {
      expect(parseCliArgs(['main.kes'])).toEqual(runArgs('main.kes'));
    });

    it('parses grammar, format and config options', () => {
      expect(
        parseCliArgs(['--grammar', 'program', '--format', 'json', '--config', 'cfg.yaml', 'a.kes'])
      ).toEqual(
        runArgs('a.kes', { grammar: 'program', format: 'json', config: 'cfg.yaml' })
      );
    });

    it('accepts options after the file', () => {
      expect(parseCliArgs(['a.kes', '--grammar', 'tokens'])).toEqual(
        runArgs('a.kes', { grammar: 'tokens' })
      );
    });

    it('recognizes help and version in any position', () => {
      expect(parseCliArgs(['a.kes', '-h'])).toEqual({ mode: 'help' });
      expect(parseCliArgs(['--version'])).toEqual({ mode: 'version' });
    });

    it('rejects unknown options', () => {
      expect(() => parseCliArgs(['--bogus', 'a.kes'])).toThrow('Unknown option: --bogus');
    });

    it('rejects a missing file', () => {
      expect(() => parseCliArgs([])).toThrow('Missing file argument');
    });

    it('rejects a second file', () => {
      expect(() => parseCliArgs(['a.kes', 'b.kes'])).toThrow('Unexpected argument: b.kes');
    });

    it('rejects invalid values', () => {
      expect(() => parseCliArgs(['--grammar', 'nope', 'a.kes'])).toThrow(
        'Invalid grammar: nope. Expected expr, decl, program or tokens'
      );
      expect(() => parseCliArgs(['--format', 'xml', 'a.kes'])).toThrow(
        'Invalid format: xml. Expected human or json'
      );
    });

    it('rejects an option without its value', () => {
      expect(() => parseCliArgs(['a.kes', '--format'])).toThrow(
        '--format requires an argument'
      );
    });
  });

  describe('formatTokens', () => {
    it('prints one token per line', () => {
      expect(formatTokens(tokensOf("x := 'a'"), 'human')).toBe(
        ['0..1 IDENTIFIER x', '2..4 COLON_EQ', '5..8 CHAR_LIT "a"', '8..8 EOF'].join('\n')
      );
    });
  });

  describe('runParse', () => {
    let tempDir: string;
    let out: string[];
    let err: string[];
    let io: CliIO;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kestrel-parse-test-'));
      out = [];
      err = [];
      io = {
        stdout: { write: (chunk: string) => out.push(chunk) },
        stderr: { write: (chunk: string) => err.push(chunk) },
        cwd: tempDir,
      };
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    /**
     * Write a file to the temp directory and return its name.
     */
    async function writeFile(name: string, content: string): Promise<string> {
      await fs.writeFile(path.join(tempDir, name), content, 'utf-8');
      return name;
    }

    it('prints the parsed expression', async () => {
      const file = await writeFile('ok.kes', '1 + 2 * 3\n');
      expect(await runParse(runArgs(file), io)).toBe(0);
      expect(out.join('')).toBe('(+ 1 (* 2 3))\n');
      expect(err.join('')).toBe('');
    });

    it('prints every declaration of a program', async () => {
      const file = await writeFile('prog.kes', 'val a = 1\nfun f x = x\n');
      expect(await runParse(runArgs(file, { grammar: 'program' }), io)).toBe(0);
      expect(out.join('')).toBe('(val a 1)\n(fun f (x) x)\n');
    });

    it('prints nothing for an empty program', async () => {
      const file = await writeFile('empty.kes', '');
      expect(await runParse(runArgs(file, { grammar: 'program' }), io)).toBe(0);
      expect(out.join('')).toBe('');
    });

    it('prints a single declaration', async () => {
      const file = await writeFile('decl.kes', 'val x : int = 1');
      expect(await runParse(runArgs(file, { grammar: 'decl' }), io)).toBe(0);
      expect(out.join('')).toBe('(val x:int 1)\n');
    });

    it('prints tokens as JSON', async () => {
      const file = await writeFile('tokens.kes', 'x');
      const code = await runParse(runArgs(file, { grammar: 'tokens', format: 'json' }), io);
      expect(code).toBe(0);
      expect(JSON.parse(out.join(''))).toEqual([
        { type: 'IDENTIFIER', start: 0, end: 1, value: 'x' },
        { type: 'EOF', start: 1, end: 1 },
      ]);
    });

    it('prints parsed items as JSON', async () => {
      const file = await writeFile('json.kes', 'a - b');
      expect(await runParse(runArgs(file, { format: 'json' }), io)).toBe(0);
      expect(JSON.parse(out.join(''))).toEqual({ file: 'json.kes', items: ['(- a b)'] });
    });

    it('reports a parse error with a caret excerpt', async () => {
      const file = await writeFile('bad.kes', 'if a else b\n');
      expect(await runParse(runArgs(file), io)).toBe(1);
      expect(out.join('')).toBe('');
      expect(err.join('')).toBe(
        [
          "error[parse::unexpected_token]: expected 'then', found 'else'",
          '  --> bad.kes:1:6',
          '   |',
          ' 1 | if a else b',
          '   |      ^^^^ here',
          '   |',
          '',
        ].join('\n')
      );
    });

    it('reports every lexer error', async () => {
      const file = await writeFile('lex.kes', 'a | b $\n');
      expect(await runParse(runArgs(file), io)).toBe(1);
      const block = (column: number, lexeme: string): string =>
        [
          `error[lex::invalid_token]: invalid token '${lexeme}'`,
          `  --> lex.kes:1:${column}`,
          '   |',
          ' 1 | a | b $',
          `   | ${' '.repeat(column - 1)}^ not recognized`,
          '   |',
          '   = help: this character or sequence is not recognized',
        ].join('\n');
      expect(err.join('')).toBe(`${block(3, '|')}\n\n${block(7, '$')}\n`);
    });

    it('reports diagnostics as LSP-shaped JSON', async () => {
      const file = await writeFile('open.kes', '(1');
      expect(await runParse(runArgs(file, { format: 'json' }), io)).toBe(1);
      expect(JSON.parse(err.join(''))).toEqual({
        file: 'open.kes',
        diagnostics: [
          {
            range: {
              start: { line: 0, character: 2 },
              end: { line: 0, character: 2 },
            },
            severity: 1,
            code: 'parse::expected_delimiter',
            source: 'kestrel',
            message: "expected ')' to close '('",
            help: "add ')' to match the opening '('",
            relatedInformation: [
              {
                location: {
                  uri: 'open.kes',
                  range: {
                    start: { line: 0, character: 0 },
                    end: { line: 0, character: 1 },
                  },
                },
                message: "unclosed '(' opened here",
              },
            ],
          },
        ],
      });
    });

    it('exits with 2 when the file is missing', async () => {
      expect(await runParse(runArgs('missing.kes'), io)).toBe(2);
      expect(err.join('')).toBe(
        `Error: File not found: ${path.join(tempDir, 'missing.kes')}\n`
      );
    });

    describe('configuration', () => {
      it('takes the grammar from kestrel.yaml', async () => {
        await writeFile('kestrel.yaml', 'grammar: program\n');
        const file = await writeFile('prog.kes', 'val a = 1');
        expect(await runParse(runArgs(file), io)).toBe(0);
        expect(out.join('')).toBe('(val a 1)\n');
      });

      it('lets flags override the configuration', async () => {
        await writeFile('kestrel.yaml', 'grammar: program\nformat: json\n');
        const file = await writeFile('tok.kes', '1');
        const code = await runParse(runArgs(file, { grammar: 'tokens', format: 'human' }), io);
        expect(code).toBe(0);
        expect(out.join('')).toBe('0..1 INT_LIT 1\n1..1 EOF\n');
      });

      it('reads an explicit configuration path', async () => {
        await writeFile('custom.yaml', 'grammar: decl\n');
        const file = await writeFile('d.kes', 'fun id x = x');
        expect(await runParse(runArgs(file, { config: 'custom.yaml' }), io)).toBe(0);
        expect(out.join('')).toBe('(fun id (x) x)\n');
      });

      it('exits with 2 on an invalid configuration', async () => {
        await writeFile('kestrel.yaml', 'grammar: sentence\n');
        const file = await writeFile('x.kes', '1');
        expect(await runParse(runArgs(file), io)).toBe(2);
        expect(err.join('')).toBe(
          'Error: Invalid configuration: grammar has invalid value "sentence" (must be expr, decl, program, tokens)\n'
        );
      });
    });
  });
});
