/**
 * Tests for environment variable overrides.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { DEFAULT_CONFIG } from './defaults.js';
import {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
import { ConfigParseError, parseConfig } from './parser.js';

describe('Environment Overrides', () => {
  describe('readEnvOverrides', () => {
    it('returns nothing for an empty environment', () => {
      expect(readEnvOverrides({})).toEqual({ overrides: {}, appliedVars: [], errors: [] });
    });

    it('ignores unrelated and empty variables', () => {
      const result = readEnvOverrides({ PATH: '/usr/bin', ASTERISM_CLI_COLORS: '' });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('coerces values to the field type', () => {
      const result = readEnvOverrides({
        ASTERISM_PARSER_FENCE: '~~~',
        ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT: ' 25 ',
        ASTERISM_CLI_COLORS: 'off',
      });

      expect(result.overrides).toEqual({
        parser: { fence: '~~~', frontmatter_line_limit: 25 },
        cli: { colors: false },
      });
      expect(result.appliedVars).toEqual([
        'ASTERISM_PARSER_FENCE',
        'ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT',
        'ASTERISM_CLI_COLORS',
      ]);
    });

    it('lets the full variable name win over its shortcut', () => {
      const result = readEnvOverrides({ ASTERISM_MARKER: '+', ASTERISM_PARSER_MARKER: '-' });

      expect(result.overrides.parser?.marker).toBe('-');
      expect(result.appliedVars).toEqual(['ASTERISM_MARKER', 'ASTERISM_PARSER_MARKER']);
    });

    it('accepts every boolean spelling in any case', () => {
      const spellings = fc.constantFrom<[string, boolean]>(
        ['true', true],
        ['1', true],
        ['yes', true],
        ['on', true],
        ['false', false],
        ['0', false],
        ['no', false],
        ['off', false]
      );
      fc.assert(
        fc.property(spellings, fc.boolean(), ([word, expected], upper) => {
          const value = upper ? word.toUpperCase() : word;
          const result = readEnvOverrides({ ASTERISM_DEBUG: value });
          expect(result.overrides.logging?.debug).toBe(expected);
        })
      );
    });

    it('throws on values that cannot be coerced', () => {
      expect(() => readEnvOverrides({ ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT: 'abc' })).toThrow(
        "Cannot coerce environment variable 'ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT' value 'abc' to number"
      );
      expect(() => readEnvOverrides({ ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT: '   ' })).toThrow(
        "Empty value for 'ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT'"
      );
      expect(() => readEnvOverrides({ ASTERISM_CLI_UNICODE: 'maybe' })).toThrow(
        "Cannot coerce 'ASTERISM_CLI_UNICODE' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
      );
    });

    it('collects coercion errors when asked', () => {
      const result = readEnvOverrides(
        { ASTERISM_CLI_UNICODE: 'maybe', ASTERISM_CLI_COLORS: 'no' },
        { collectErrors: true }
      );

      expect(result.overrides).toEqual({ cli: { colors: false } });
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(EnvCoercionError);
      expect(result.errors[0]?.envVar).toBe('ASTERISM_CLI_UNICODE');
      expect(result.errors[0]?.expectedType).toBe('boolean');
    });
  });

  describe('applyEnvOverrides', () => {
    it('overrides file values and keeps the rest', () => {
      const fromFile = parseConfig('[parser]\nmarker = "+"\n\n[cli]\nunicode = false\n');

      const config = applyEnvOverrides(fromFile, { ASTERISM_DEBUG: 'yes', ASTERISM_CLI_UNICODE: 'true' });

      expect(config.parser.marker).toBe('+');
      expect(config.cli.unicode).toBe(true);
      expect(config.logging.debug).toBe(true);
    });

    it('returns an equal configuration without overrides', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });

    it('validates overridden values like file values', () => {
      expect(() => applyEnvOverrides(DEFAULT_CONFIG, { ASTERISM_MARKER: 'x' })).toThrow(ConfigParseError);
      expect(() =>
        applyEnvOverrides(DEFAULT_CONFIG, { ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT: '-3' })
      ).toThrow("Invalid value for 'parser.frontmatter_line_limit': must be a positive integer, got -3");
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('documents every variable with its type', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toEqual([
        'ASTERISM_MARKER',
        'ASTERISM_DEBUG',
        'ASTERISM_PARSER_MARKER',
        'ASTERISM_PARSER_FENCE',
        'ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT',
        'ASTERISM_RENDER_COLLAPSE_MARKER',
        'ASTERISM_CLI_COLORS',
        'ASTERISM_CLI_UNICODE',
        'ASTERISM_LOGGING_DEBUG',
      ]);
      expect(docs.ASTERISM_PARSER_FRONTMATTER_LINE_LIMIT?.type).toBe('number');
    });
  });
});
