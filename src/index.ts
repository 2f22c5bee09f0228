export * from './types/index.js';
export * from './utils/errors.js';
export { ICSParser } from './utils/ics-parser.js';
export { ICS_UID_PROPERTY, mapCalendar, mapEvent, renderRecurrence } from './utils/event-mapper.js';
export type { MapperOptions } from './utils/event-mapper.js';
export { DRY_RUN_EVENT_ID, reconcileEvents, syncFromPath } from './services/sync.service.js';
export type { ReconcileOptions, SyncOptions } from './services/sync.service.js';
export { GoogleCalendarStore, resolveCalendarId } from './services/calendar.service.js';
export type { CalendarApi, CalendarEventsApi, CalendarListApi } from './services/calendar.service.js';
export {
  createOAuth2Client,
  getAuthorizedClient,
  getGoogleCalendarClient,
  loadStoredTokens,
  saveTokens,
} from './services/google.service.js';
export { loadConfig } from './lib/config.js';
export type { AppConfig, GoogleConfig } from './lib/config.js';
export { createLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
