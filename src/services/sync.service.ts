import { errorMessage } from '../utils/errors.js';
import { mapCalendar } from '../utils/event-mapper.js';
import { ICSParser } from '../utils/ics-parser.js';
import { emptyReport } from '../types/index.js';
import { readdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { Logger } from '../lib/logger.js';
import type { MapperOptions } from '../utils/event-mapper.js';
import type { EventStore, MappedEvent, RemoteEvent, SyncReport } from '../types/index.js';

export const DRY_RUN_EVENT_ID = '(dry-run-new-id)';

export interface ReconcileOptions {
  dryRun?: boolean;
  logger: Logger;
}

export interface SyncOptions extends ReconcileOptions, MapperOptions {
  store: EventStore;
  parser?: ICSParser;
}

const lookupExisting = async (store: EventStore, uid: string, logger: Logger): Promise<RemoteEvent | null> => {
  if (!uid) {
    return null;
  }
  try {
    return await store.findByIdentity(uid);
  } catch (error) {
    // A failed lookup counts as "not found": at worst the event is created twice
    logger.warn(`Error searching for existing event with UID ${uid}: ${errorMessage(error)}`);
    return null;
  }
};

/**
 * Creates or updates each mapped event in order, matching on the ICS UID.
 * Failed creates/updates are reported and skipped; they do not stop the run.
 */
export const reconcileEvents = async (
  events: MappedEvent[],
  store: EventStore,
  { dryRun = false, logger }: ReconcileOptions,
  report: SyncReport = emptyReport(),
): Promise<SyncReport> => {
  for (const { payload, uid } of events) {
    const title = payload.summary;
    try {
      const existing = await lookupExisting(store, uid, logger);

      if (existing) {
        let id = existing.id;
        if (dryRun) {
          logger.info(`[DRY-RUN] Would update event ${existing.id}: ${title}`);
        } else {
          id = await store.update(existing.id, payload);
          logger.debug(`Updated event ${id}: ${title}`);
        }
        report.updated.push({ ics_uid: uid, title, id });
      } else {
        let id = DRY_RUN_EVENT_ID;
        if (dryRun) {
          logger.info(`[DRY-RUN] Would create event: ${title}`);
        } else {
          id = await store.create(payload);
          logger.debug(`Created event ${id}: ${title}`);
        }
        report.created.push({ ics_uid: uid, title, id });
      }
    } catch (error) {
      logger.error(`Failed to import event ${uid || '(no UID)'} "${title}": ${errorMessage(error)}`);
      report.errors.push({ ics_uid: uid, title, error: errorMessage(error) });
    }
  }
  return report;
};

const listICSFiles = async (path: string): Promise<string[]> => {
  const info = await stat(path);
  if (info.isFile()) {
    return [path];
  }

  const entries = await readdir(path, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && extname(entry.name).toLowerCase() === '.ics')
    .map(entry => entry.name)
    .sort()
    .map(name => join(path, name));
};

// Imports a single .ics file or every .ics file of a directory
export const syncFromPath = async (path: string, options: SyncOptions): Promise<SyncReport> => {
  const { store, logger, parser = new ICSParser() } = options;
  const report = emptyReport();

  const files = await listICSFiles(path);
  if (files.length === 0) {
    logger.warn(`No .ics files found in ${path}`);
  }

  for (const file of files) {
    logger.info(`Processing ${file}`);
    report.files.push(file);

    let events: MappedEvent[];
    try {
      const calendar = await parser.readAndParse(file);
      events = mapCalendar(calendar, options);
      logger.debug(`Found ${events.length} event(s) in ${basename(file)}`);
    } catch (error) {
      logger.error(`Skipping ${file}: ${errorMessage(error)}`);
      report.errors.push({ file, error: errorMessage(error) });
      continue;
    }

    await reconcileEvents(events, store, options, report);
  }

  logger.info(`Done. created=${report.created.length} updated=${report.updated.length}`);
  return report;
};
