/**
 * CLI Tests: fxlit command
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  extractFile,
  formatLiteralEvent,
  parseArgs,
  resolveExtractOptions,
} from '../../src/cli-extract.js';
import { ParsingError } from '../../src/index.js';

describe('fxlit', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fxlit-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFile(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  describe('parseArgs', () => {
    it('defaults to filter mode', () => {
      expect(parseArgs([])).toEqual({
        mode: 'extract',
        input: undefined,
        output: undefined,
        functionName: undefined,
        lineMarkers: false,
        config: undefined,
        verbose: false,
      });
    });

    it('reads input and output files', () => {
      const parsed = parseArgs(['in.cpp', 'out.cpp']);
      expect(parsed).toMatchObject({
        mode: 'extract',
        input: 'in.cpp',
        output: 'out.cpp',
      });
    });

    it('treats - as stdin', () => {
      expect(parseArgs(['-', 'out.cpp'])).toMatchObject({
        input: undefined,
        output: 'out.cpp',
      });
    });

    it('parses options', () => {
      expect(
        parseArgs(['-n', 'fmt::format', '-l', '--verbose', '-c', 'cfg.yaml', 'a.cpp'])
      ).toEqual({
        mode: 'extract',
        input: 'a.cpp',
        output: undefined,
        functionName: 'fmt::format',
        lineMarkers: true,
        config: 'cfg.yaml',
        verbose: true,
      });
      expect(parseArgs(['--name', 'print', '--line-markers'])).toMatchObject({
        functionName: 'print',
        lineMarkers: true,
      });
    });

    it('parses help, version, test and explain', () => {
      expect(parseArgs(['--help']).mode).toBe('help');
      expect(parseArgs(['a.cpp', '-h']).mode).toBe('help');
      expect(parseArgs(['--version']).mode).toBe('version');
      expect(parseArgs(['-v']).mode).toBe('version');
      expect(parseArgs(['--test'])).toEqual({ mode: 'test' });
      expect(parseArgs(['--explain', 'FX-P005'])).toEqual({
        mode: 'explain',
        errorId: 'FX-P005',
      });
    });

    it('throws on unknown flags', () => {
      expect(() => parseArgs(['--unknown'])).toThrow('Unknown option: --unknown');
      expect(() => parseArgs(['-x'])).toThrow('Unknown option: -x');
    });

    it('throws on missing option values', () => {
      expect(() => parseArgs(['-n'])).toThrow('Missing value for -n');
      expect(() => parseArgs(['--explain'])).toThrow('Missing value for --explain');
    });

    it('throws on a third file argument', () => {
      expect(() => parseArgs(['a', 'b', 'c'])).toThrow('Unexpected argument: c');
    });
  });

  describe('resolveExtractOptions', () => {
    it('uses flags when no configuration file exists', async () => {
      const dir = await fs.mkdtemp(path.join(tempDir, 'empty-'));
      const parsed = parseArgs(['-n', 'print', 'src.cpp']);
      if (parsed.mode !== 'extract') throw new Error('expected extract mode');
      expect(resolveExtractOptions(parsed, dir)).toEqual({
        functionName: 'print',
        emitLocationMarkers: false,
        sourcePath: 'src.cpp',
      });
    });

    it('reads .fxlit.yaml from the working directory', async () => {
      const dir = await fs.mkdtemp(path.join(tempDir, 'cfg-'));
      await fs.writeFile(
        path.join(dir, '.fxlit.yaml'),
        'functionName: fmt::format\nlineMarkers: true\n'
      );
      const parsed = parseArgs([]);
      if (parsed.mode !== 'extract') throw new Error('expected extract mode');
      expect(resolveExtractOptions(parsed, dir)).toEqual({
        functionName: 'fmt::format',
        emitLocationMarkers: true,
        sourcePath: undefined,
      });
    });

    it('lets flags override the configuration file', async () => {
      const configPath = await writeFile('override.yaml', 'functionName: cfg\n');
      const parsed = parseArgs(['-c', configPath, '-n', 'flag']);
      if (parsed.mode !== 'extract') throw new Error('expected extract mode');
      expect(resolveExtractOptions(parsed, tempDir).functionName).toBe('flag');
    });
  });

  describe('extractFile', () => {
    it('writes the rewritten source to the output file', async () => {
      const input = await writeFile('main.fx.cpp', 'auto s = f"{n}";\n');
      const output = path.join(tempDir, 'main.cpp');
      extractFile(input, output, {});
      expect(await fs.readFile(output, 'utf-8')).toBe(
        'auto s = std::format("{}", n);\n'
      );
    });

    it('keeps the lines written before an error', async () => {
      const input = await writeFile('bad.fx.cpp', 'int a;\nf"{x)}"\n');
      const output = path.join(tempDir, 'bad.cpp');
      expect(() => extractFile(input, output, {})).toThrow(ParsingError);
      expect(await fs.readFile(output, 'utf-8')).toBe('int a;\n');
    });

    it('throws a file error for a missing input', () => {
      let caught: unknown;
      try {
        extractFile(path.join(tempDir, 'missing.cpp'), undefined, {});
      } catch (err) {
        caught = err;
      }
      expect(caught).toMatchObject({ code: 'ENOENT', syscall: 'open' });
    });
  });

  describe('formatLiteralEvent', () => {
    it('describes f literals with their callee', () => {
      expect(
        formatLiteralEvent({
          kind: 'f',
          location: { line: 3, column: 7 },
          argumentCount: 2,
          callee: 'std::format',
        })
      ).toBe('[fxlit] 3:7 f literal, 2 argument(s) via std::format');
    });

    it('describes x literals', () => {
      expect(
        formatLiteralEvent({
          kind: 'x',
          location: { line: 1, column: 1 },
          argumentCount: 0,
          callee: null,
        })
      ).toBe('[fxlit] 1:1 x literal, 0 argument(s)');
    });
  });
});
