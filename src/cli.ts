#!/usr/bin/env node
import './lib/env.js';
import { loadConfig } from './lib/config.js';
import { createLogger } from './lib/logger.js';
import { GoogleCalendarStore, resolveCalendarId } from './services/calendar.service.js';
import { getAuthorizedClient, getGoogleCalendarClient } from './services/google.service.js';
import { syncFromPath } from './services/sync.service.js';
import { errorMessage } from './utils/errors.js';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import type { CalendarApi } from './services/calendar.service.js';
import type { SyncReport } from './types/index.js';

export const USAGE = `Usage: ics-gcal-import <path> [options]

Upload events from .ics files (a file, or every .ics file in a directory) to Google Calendar.
Events are matched on their ICS UID, so re-running updates instead of duplicating.

Options:
  -c, --calendar <id|name>  Calendar id or display name (default: $ICS_IMPORT_CALENDAR or "primary")
  -n, --dry-run             Look up events but do not create or update anything
  -v, --verbose             Verbose logging
  -h, --help                Show this help`;

export interface CliArgs {
  icsPath: string;
  calendar?: string;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
}

export const parseCliArgs = (argv: string[]): CliArgs => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      calendar: { type: 'string', short: 'c' },
      'dry-run': { type: 'boolean', short: 'n', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (!values.help && positionals.length !== 1) {
    throw new Error('Expected exactly one path to an .ics file or a directory of .ics files');
  }

  return {
    icsPath: positionals[0] ?? '',
    calendar: values.calendar,
    dryRun: values['dry-run'] ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
};

export const formatSummary = (report: SyncReport): string => {
  const lines = [
    `Processed ${report.files.length} file(s): created=${report.created.length} updated=${report.updated.length} errors=${report.errors.length}`,
  ];
  for (const failure of report.errors) {
    const context = [failure.file, failure.ics_uid && `UID ${failure.ics_uid}`, failure.title && `"${failure.title}"`]
      .filter(Boolean)
      .join(' ');
    lines.push(`  - ${context ? `${context}: ` : ''}${failure.error}`);
  }
  return lines.join('\n');
};

export const main = async (argv: string[]): Promise<number> => {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`${errorMessage(error)}\n\n${USAGE}`);
    return 2;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const logger = createLogger({ verbose: args.verbose });
  try {
    const config = loadConfig();
    const auth = await getAuthorizedClient(config, { logger });
    const calendarClient: CalendarApi = getGoogleCalendarClient(auth);

    const calendarId = await resolveCalendarId(calendarClient.calendarList, args.calendar ?? config.calendar, logger);
    logger.info(`Using calendar: ${calendarId}`);

    const report = await syncFromPath(args.icsPath, {
      store: new GoogleCalendarStore(calendarClient.events, calendarId),
      dryRun: args.dryRun,
      logger,
    });

    console.log(formatSummary(report));
    return report.errors.length > 0 ? 1 : 0;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }
};

const isEntryPoint = (): boolean => {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
