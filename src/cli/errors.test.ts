/**
 * Error suggestion system tests.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigParseError, EnvCoercionError } from '../config/index.js';
import { ConceptSyntaxError, FileAccessError } from '../parser/index.js';
import { ExportError, JsonImportError } from '../render/index.js';
import { stripAnsi } from '../render/ansi.js';
import {
  classifyError,
  displayErrorWithSuggestions,
  errorContextFor,
  formatErrorWithSuggestions,
  getSuggestions,
  inferErrorType,
} from './errors.js';
import type { ErrorType } from './errors.js';
import { runWithErrorHandling } from './utils/errorHandling.js';

const plain = { colors: false, unicode: true };

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Error suggestion system', () => {
  describe('inferErrorType', () => {
    it.each<[string, ErrorType]>([
      ['File not found: notes.outline', 'file_access'],
      ['Permission denied: notes.outline', 'file_access'],
      ['File encoding error: notes.outline is not valid UTF-8', 'file_access'],
      ['Line 2: invalid level jump: found level 3, expected at most 2', 'syntax'],
      ['Line 1: file must start with an unmarked root concept', 'syntax'],
      ['no valid concepts found', 'syntax'],
      ['Cannot write out/tree.txt: directory does not exist', 'export'],
      ['Invalid JSON syntax: Unexpected end of JSON input', 'json_import'],
      ["Unsupported format_version '2.0': expected '1.0'", 'json_import'],
      ['Invalid TOML syntax: Unexpected character', 'config'],
      ['something unexpected', 'unknown'],
    ])('classifies %j as %s', (message, expected) => {
      expect(inferErrorType(message)).toBe(expected);
    });
  });

  describe('classifyError', () => {
    it('uses the error class first', () => {
      expect(classifyError(new FileAccessError('gone', 'a.outline'))).toBe('file_access');
      expect(classifyError(new ConceptSyntaxError('bad', 1, '*'))).toBe('syntax');
      expect(classifyError(new ExportError('nope', 'out.txt'))).toBe('export');
      expect(classifyError(new JsonImportError('nope'))).toBe('json_import');
      expect(classifyError(new ConfigParseError('nope'))).toBe('config');
      expect(classifyError(new EnvCoercionError('ASTERISM_DEBUG', 'x', 'boolean'))).toBe('config');
    });

    it('falls back to the message for other values', () => {
      expect(classifyError(new Error('File not found: x'))).toBe('file_access');
      expect(classifyError('plain string')).toBe('unknown');
    });
  });

  describe('errorContextFor', () => {
    it('carries the file of access and export errors', () => {
      expect(errorContextFor(new FileAccessError('File not found: a.outline', 'a.outline'), 'view')).toEqual({
        errorType: 'file_access',
        errorMessage: 'File not found: a.outline',
        command: 'view',
        details: { filePath: 'a.outline' },
      });
      expect(errorContextFor(new ExportError('Cannot write o.txt: x', 'o.txt')).details).toEqual({
        filePath: 'o.txt',
      });
    });

    it('carries the line of syntax errors', () => {
      const context = errorContextFor(new ConceptSyntaxError('concept title cannot be empty', 4, '** '));

      expect(context.details).toEqual({ lineNumber: 4 });
      expect(context.command).toBeUndefined();
    });

    it('omits details for errors without a location', () => {
      expect(errorContextFor(new ConceptSyntaxError('no valid concepts found')).details).toBeUndefined();
    });
  });

  describe('getSuggestions', () => {
    it('has suggestions for every error type', () => {
      const types: ErrorType[] = ['file_access', 'syntax', 'export', 'json_import', 'config', 'unknown'];
      for (const type of types) {
        expect(getSuggestions(type).length).toBeGreaterThan(0);
      }
    });

    it('points syntax errors at verbose validation', () => {
      expect(getSuggestions('syntax').at(-1)?.action).toBe('asterism validate <file> --verbose');
    });
  });

  describe('formatErrorWithSuggestions', () => {
    it('lists location, command and numbered suggestions', () => {
      const output = formatErrorWithSuggestions(
        'File not found: a.outline',
        { errorType: 'file_access', command: 'view', details: { filePath: 'a.outline' } },
        plain
      );

      expect(output).toBe(
        [
          'Error: File not found: a.outline',
          '  File: a.outline',
          '  Command: view',
          '',
          'Suggestions:',
          '  1. Check that the file path is spelled correctly',
          '  2. Make sure the file exists and is readable',
          '    ls -l <file>',
          '  3. Save the document as UTF-8 text',
        ].join('\n')
      );
    });

    it('shows the line number of syntax errors', () => {
      const output = formatErrorWithSuggestions('Line 3: bad', { errorType: 'syntax', details: { lineNumber: 3 } }, plain);

      expect(output.split('\n').slice(0, 3)).toEqual(['Error: Line 3: bad', '  Line: 3', '']);
    });

    it('infers the type when none is given', () => {
      const output = formatErrorWithSuggestions('Invalid TOML syntax: x', {}, plain);

      expect(output).toContain('  1. Check the syntax of asterism.toml');
    });

    it('adds styles only when colors are enabled', () => {
      const colored = formatErrorWithSuggestions('oops', { errorType: 'unknown' });

      expect(colored.startsWith('\x1b[31mError:\x1b[0m oops')).toBe(true);
      expect(stripAnsi(colored)).toBe(formatErrorWithSuggestions('oops', { errorType: 'unknown' }, plain));
    });
  });

  describe('displayErrorWithSuggestions', () => {
    it('writes the formatted error between blank lines', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      displayErrorWithSuggestions('oops', { errorType: 'unknown' }, plain);

      expect(spy).toHaveBeenCalledTimes(3);
      expect(spy).toHaveBeenNthCalledWith(2, formatErrorWithSuggestions('oops', { errorType: 'unknown' }, plain));
    });
  });
});

describe('runWithErrorHandling', () => {
  it('returns the handler result', async () => {
    await expect(runWithErrorHandling(() => ({ exitCode: 0 }), plain)).resolves.toEqual({ exitCode: 0 });
  });

  it('turns a thrown error into exit code 1 with suggestions', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const result = await runWithErrorHandling(
      () => Promise.reject(new FileAccessError('File not found: a.outline', 'a.outline')),
      plain,
      'export'
    );

    expect(result).toEqual({ exitCode: 1, message: 'File not found: a.outline' });
    expect(spy).toHaveBeenCalledWith(
      formatErrorWithSuggestions(
        'File not found: a.outline',
        { errorType: 'file_access', command: 'export', details: { filePath: 'a.outline' } },
        plain
      )
    );
  });
});
