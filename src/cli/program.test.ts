/**
 * Tests for CLI option plumbing
 * Validates that flags are parsed and passed to the build handler
 */

import { describe, it, expect, jest } from '@jest/globals';
import { InvalidArgumentError } from 'commander';
import { createProgram, parseSiteUrl, toBuildOptions, type BuildHandler } from './program.js';
import type { CliOptions } from './types.js';

function createTestProgram() {
  const handler = jest.fn<BuildHandler>().mockResolvedValue(undefined);
  const program = createProgram(handler);

  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  }

  return { program, handler };
}

describe('CLI option plumbing', () => {
  it('should apply defaults for the build command', async () => {
    const { program, handler } = createTestProgram();
    await program.parseAsync(['node', 'city-site', 'build']);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toEqual({
      content: 'content/site.json',
      image: 'content/picture.png',
      stylesheet: 'content/styles.css',
      out: 'public',
    });
  });

  it('should pass every flag through', async () => {
    const { program, handler } = createTestProgram();
    await program.parseAsync([
      'node',
      'city-site',
      'build',
      '--cities',
      'cities.csv',
      '--out',
      'site',
      '--site-url',
      'https://example.com/',
      '--verbose',
    ]);

    expect(handler.mock.calls[0][0]).toEqual({
      cities: 'cities.csv',
      content: 'content/site.json',
      image: 'content/picture.png',
      stylesheet: 'content/styles.css',
      out: 'site',
      siteUrl: 'https://example.com',
      verbose: true,
    });
  });

  it('should reject a non-http site URL', async () => {
    const { program, handler } = createTestProgram();

    await expect(
      program.parseAsync(['node', 'city-site', 'build', '--site-url', 'ftp://example.com'])
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
    expect(handler).not.toHaveBeenCalled();
  });

  describe('parseSiteUrl', () => {
    it('should strip trailing slashes', () => {
      expect(parseSiteUrl('https://example.com///')).toBe('https://example.com');
    });

    it('should reject relative values', () => {
      expect(() => parseSiteUrl('example.com')).toThrow(InvalidArgumentError);
    });
  });

  describe('toBuildOptions', () => {
    it('should map CLI names to build options', () => {
      const cli: CliOptions = {
        cities: 'c.csv',
        content: 's.json',
        image: 'p.png',
        stylesheet: 's.css',
        out: 'o',
        siteUrl: 'https://example.com',
      };

      expect(toBuildOptions(cli)).toEqual({
        contentPath: 's.json',
        citiesPath: 'c.csv',
        imagePath: 'p.png',
        stylesheetPath: 's.css',
        outDir: 'o',
        siteUrl: 'https://example.com',
      });
    });
  });
});
