export type * from './calendar.js';
export type * from './events.js';
export * from './sync-reports.js';
