/**
 * Line loader tests
 *
 * Each test works in a fresh temp directory.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadLines, loadInts, splitLines, parseInteger } from './line_loader';
import { createFilterSpec } from '../filter_spec';
import { InvalidInputError } from '../errors';

describe('LineLoader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'line-loader-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function createFile(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  describe('splitLines()', () => {
    it('should not produce a line after a trailing separator', () => {
      expect(splitLines('a\nb\n', '\n')).toEqual(['a', 'b']);
      expect(splitLines('a\nb', '\n')).toEqual(['a', 'b']);
    });

    it('should return no lines for empty content', () => {
      expect(splitLines('', '\n')).toEqual([]);
    });

    it('should keep empty lines between separators', () => {
      expect(splitLines('a\n\nb\n', '\n')).toEqual(['a', '', 'b']);
    });
  });

  describe('loadLines()', () => {
    it('should load all lines in file order', () => {
      const filePath = createFile('test.txt', 'line1\nline2\nline3\n');

      expect(loadLines(filePath)).toEqual(['line1', 'line2', 'line3']);
    });

    it('should skip empty lines by default', () => {
      const filePath = createFile('test.txt', 'line1\n\nline2\n\nline3\n');

      expect(loadLines(filePath)).toEqual(['line1', 'line2', 'line3']);
    });

    it('should keep empty lines when skipEmpty is false', () => {
      const filePath = createFile('test.txt', 'a\n\nb\n');

      expect(loadLines(filePath, {}, '\n', false)).toEqual(['a', '', 'b']);
    });

    it('should drop lines starting with a skipped prefix', () => {
      const filePath = createFile('test.txt', '#c\nd\n');
      const spec = createFilterSpec({ 'skip if starts with': ['#'] });

      expect(loadLines(filePath, spec)).toEqual(['d']);
    });

    it('should drop lines containing a skipped fragment', () => {
      const filePath = createFile('test.txt', 'good line\nbad line with ERROR\nanother good line\n');
      const spec = createFilterSpec({ 'skip if contains': new Set(['ERROR']) });

      expect(loadLines(filePath, spec)).toEqual(['good line', 'another good line']);
    });

    it('should apply every filter together', () => {
      const filePath = createFile(
        'test.txt',
        '# comment\nvalid data\ndata with ERROR\n// comment\nmore valid data\n'
      );
      const spec = createFilterSpec({
        'skip if starts with': ['#', '//'],
        'skip if contains': ['ERROR'],
      });

      expect(loadLines(filePath, spec)).toEqual(['valid data', 'more valid data']);
    });

    it('should split on a custom separator', () => {
      const filePath = createFile('test.txt', 'part1|part2|part3');

      expect(loadLines(filePath, {}, '|', false)).toEqual(['part1', 'part2', 'part3']);
    });

    it('should return N entries for N non-empty unfiltered lines', () => {
      const content = Array.from({ length: 25 }, (_, i) => `entry ${i}`).join('\n');
      const filePath = createFile('test.txt', `${content}\n\n`);

      const lines = loadLines(filePath);
      expect(lines).toHaveLength(25);
      expect(lines[0]).toBe('entry 0');
      expect(lines[24]).toBe('entry 24');
    });

    it('should return an empty list for an empty file', () => {
      const filePath = createFile('empty.txt', '');

      expect(loadLines(filePath, {}, '\n', false)).toEqual([]);
    });

    it('should throw FILE_NOT_FOUND for a missing file', () => {
      const filePath = path.join(tempDir, 'nonexistent.txt');

      expect(() => loadLines(filePath)).toThrow(InvalidInputError);
      expect(() => loadLines(filePath)).toThrow(
        expect.objectContaining({ code: 'FILE_NOT_FOUND', filePath })
      );
    });

    it('should throw NOT_A_FILE for a directory', () => {
      expect(() => loadLines(tempDir)).toThrow(
        expect.objectContaining({ code: 'NOT_A_FILE' })
      );
    });

    it('should throw INVALID_ARGUMENT for an empty separator', () => {
      const filePath = createFile('test.txt', 'a\nb\n');

      expect(() => loadLines(filePath, {}, '')).toThrow(
        expect.objectContaining({ code: 'INVALID_ARGUMENT' })
      );
    });
  });

  describe('loadInts()', () => {
    it('should load space separated integers', () => {
      const filePath = createFile('ints.txt', '1 2 3 4 5');

      expect(loadInts(filePath)).toEqual([1, 2, 3, 4, 5]);
    });

    it('should load newline separated integers', () => {
      const filePath = createFile('ints.txt', '10\n20\n30\n');

      expect(loadInts(filePath)).toEqual([10, 20, 30]);
    });

    it('should load negative integers', () => {
      const filePath = createFile('ints.txt', '-5 -10 15 -20');

      expect(loadInts(filePath)).toEqual([-5, -10, 15, -20]);
    });

    it('should read a signed zero as plain zero', () => {
      const filePath = createFile('ints.txt', '-0 5 +0');

      const numbers = loadInts(filePath);
      expect(numbers).toEqual([0, 5, 0]);
      expect(Object.is(numbers[0], 0)).toBe(true);
    });

    it('should treat runs of mixed whitespace as one separator', () => {
      const filePath = createFile('ints.txt', '  7\t8\n\n 9  \n');

      expect(loadInts(filePath)).toEqual([7, 8, 9]);
    });

    it('should throw PARSE_ERROR naming the offending token', () => {
      const filePath = createFile('ints.txt', '1 two 3');

      expect(() => loadInts(filePath)).toThrow(InvalidInputError);
      expect(() => loadInts(filePath)).toThrow('Invalid integer token: "two"');
    });

    it('should throw FILE_NOT_FOUND for a missing file', () => {
      expect(() => loadInts(path.join(tempDir, 'nonexistent.txt'))).toThrow(
        expect.objectContaining({ code: 'FILE_NOT_FOUND' })
      );
    });
  });

  describe('parseInteger()', () => {
    it('should accept an explicit plus sign', () => {
      expect(parseInteger('+42')).toBe(42);
    });

    it('should reject decimals', () => {
      expect(() => parseInteger('1.5')).toThrow(
        expect.objectContaining({ code: 'PARSE_ERROR' })
      );
    });

    it('should reject values outside the safe integer range', () => {
      expect(() => parseInteger('99999999999999999999')).toThrow(
        'Integer out of range: "99999999999999999999"'
      );
    });
  });
});
