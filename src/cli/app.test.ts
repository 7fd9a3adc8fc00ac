/**
 * Tests for CLI context creation and config loading.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { DEFAULT_CONFIG } from '../config/index.js';
import { createCliApp, displayOptionsFor, parserOptionsFor } from './app.js';

vi.mock('node:fs', async (importOriginal) => {
  const original = await importOriginal<typeof import('node:fs')>();

  return {
    ...original,
    existsSync: vi.fn(),
    readFileSync: vi.fn(),
  };
});

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

describe('createCliApp', () => {
  beforeEach(() => {
    mockExistsSync.mockReset();
    mockReadFileSync.mockReset();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses default values when no config file exists', () => {
    mockExistsSync.mockReturnValue(false);

    const context = createCliApp({ env: {}, args: [] });

    expect(context.config).toEqual(DEFAULT_CONFIG);
    expect(mockExistsSync).toHaveBeenCalledWith('asterism.toml');
    expect(mockReadFileSync).not.toHaveBeenCalled();
  });

  it('loads settings from asterism.toml when the file exists', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('[parser]\nmarker = "+"\n\n[cli]\ncolors = false\n');

    const context = createCliApp({ env: {} });

    expect(context.config.parser.marker).toBe('+');
    expect(context.config.cli.colors).toBe(false);
    expect(context.config.cli.unicode).toBe(true);
  });

  it('falls back to defaults when the config file has a parse error', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('invalid [ toml');

    const context = createCliApp({ env: {} });

    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining('Warning: Failed to load config from asterism.toml: Invalid TOML syntax:')
    );
    expect(console.warn).toHaveBeenCalledWith('Using default settings.');
    expect(context.config).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to defaults when the config file has an invalid value', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('[parser]\nmarker = "ab"\n');

    const context = createCliApp({ env: {} });

    expect(console.warn).toHaveBeenCalledWith(
      "Warning: Failed to load config from asterism.toml: Invalid value for 'parser.marker': must be a single non-alphanumeric, non-space character, got 'ab'"
    );
    expect(context.config.parser.marker).toBe('*');
  });

  it('lets environment variables win over the config file', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('[cli]\nunicode = false\n');

    const context = createCliApp({ env: { ASTERISM_CLI_UNICODE: 'yes', ASTERISM_DEBUG: '1' } });

    expect(context.config.cli.unicode).toBe(true);
    expect(context.config.logging.debug).toBe(true);
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    context.logger.debug('config_loaded');
    expect(write).toHaveBeenCalledTimes(1);
  });

  it('skips invalid environment overrides with a warning', () => {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue('[cli]\ncolors = false\n');

    const context = createCliApp({ env: { ASTERISM_CLI_UNICODE: 'maybe' } });

    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("Warning: Ignoring environment overrides: Cannot coerce 'ASTERISM_CLI_UNICODE'")
    );
    expect(context.config.cli).toEqual({ colors: false, unicode: true });
  });

  it('lets explicit overrides win over everything', () => {
    mockExistsSync.mockReturnValue(false);

    const context = createCliApp({
      env: { ASTERISM_CLI_COLORS: 'true' },
      overrides: { cli: { colors: false }, render: { collapse_marker: '…' } },
    });

    expect(context.config.cli.colors).toBe(false);
    expect(context.config.render.collapse_marker).toBe('…');
  });

  it('passes arguments through', () => {
    mockExistsSync.mockReturnValue(false);

    expect(createCliApp({ env: {}, args: ['notes.outline', '-v'] }).args).toEqual(['notes.outline', '-v']);
  });
});

describe('option helpers', () => {
  it('derive parser and display options from the configuration', () => {
    mockExistsSync.mockReturnValue(false);
    const context = createCliApp({
      env: {},
      args: [],
      overrides: { parser: { marker: '-', frontmatter_line_limit: 3 }, cli: { unicode: false } },
    });

    const parserOptions = parserOptionsFor(context);

    expect(parserOptions.marker).toBe('-');
    expect(parserOptions.fence).toBe('```');
    expect(parserOptions.frontmatterLineLimit).toBe(3);
    expect(displayOptionsFor(context)).toEqual({ colors: true, unicode: false });
  });
});
