import { USAGE, formatSummary, main, parseCliArgs } from '../../src/cli.js';
import { describe, expect, it, vi } from 'vitest';

describe('cli', () => {
  describe('parseCliArgs', () => {
    it('should parse the path and flags', () => {
      expect(parseCliArgs(['./calendars', '--calendar', 'Trips', '--dry-run', '-v'])).toEqual({
        icsPath: './calendars',
        calendar: 'Trips',
        dryRun: true,
        verbose: true,
        help: false,
      });
    });

    it('should default to a live, quiet run', () => {
      expect(parseCliArgs(['trips.ics'])).toEqual({
        icsPath: 'trips.ics',
        calendar: undefined,
        dryRun: false,
        verbose: false,
        help: false,
      });
    });

    it('should require exactly one path', () => {
      expect(() => parseCliArgs([])).toThrow('Expected exactly one path');
      expect(() => parseCliArgs(['a.ics', 'b.ics'])).toThrow('Expected exactly one path');
    });

    it('should reject unknown options', () => {
      expect(() => parseCliArgs(['a.ics', '--force'])).toThrow();
    });
  });

  describe('formatSummary', () => {
    it('should list counts and failures with their context', () => {
      const summary = formatSummary({
        files: ['a.ics', 'b.ics'],
        created: [{ ics_uid: 'u1', title: 'One', id: '1' }],
        updated: [],
        errors: [
          { file: 'b.ics', error: 'ICS parsing failed: invalid line' },
          { ics_uid: 'u2', title: 'Two', error: 'Rate Limit Exceeded' },
        ],
      });

      expect(summary).toBe(
        [
          'Processed 2 file(s): created=1 updated=0 errors=2',
          '  - b.ics: ICS parsing failed: invalid line',
          '  - UID u2 "Two": Rate Limit Exceeded',
        ].join('\n'),
      );
    });
  });

  describe('main', () => {
    it('should print usage for --help', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      expect(await main(['--help'])).toBe(0);
      expect(log).toHaveBeenCalledWith(USAGE);
    });

    it('should exit with 2 on bad arguments', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(await main([])).toBe(2);
      expect(error).toHaveBeenCalledWith(
        `Expected exactly one path to an .ics file or a directory of .ics files\n\n${USAGE}`,
      );
    });
  });
});
