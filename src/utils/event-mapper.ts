import { AmbiguousTimezoneError, UnsupportedTimezoneError } from './errors.js';
import { DateTime } from 'luxon';
import type {
  DateTimeValue,
  EventDate,
  EventTime,
  MappedEvent,
  ParsedCalendar,
  RecurrencePart,
  RemoteEventPayload,
  SourceEvent,
} from '../types/index.js';

export const ICS_UID_PROPERTY = 'ics_uid';

export interface MapperOptions {
  /** Zone for floating times when the calendar declares none. Defaults to the system zone. */
  localZone?: string;
}

const toDateTime = (value: DateTimeValue, zone: string): DateTime => {
  const dt = DateTime.fromISO(value.dateTime, { zone });
  if (!dt.isValid) {
    throw new UnsupportedTimezoneError(zone);
  }
  return dt;
};

const formatDateTime = (dt: DateTime, zone: string): string => {
  const iso = dt.toISO({ suppressMilliseconds: true });
  if (iso === null) {
    throw new UnsupportedTimezoneError(zone);
  }
  return iso;
};

const formatDate = (dt: DateTime): string => {
  const iso = dt.toISODate();
  if (iso === null) {
    throw new Error(`Invalid date: ${dt.invalidExplanation ?? 'unknown reason'}`);
  }
  return iso;
};

export const renderRecurrence = (parts: RecurrencePart[]): string =>
  'RRULE:' +
  parts.map(([name, value]) => `${name.toUpperCase()}=${Array.isArray(value) ? value.join(',') : value}`).join(';');

/**
 * Maps every VEVENT of a parsed calendar to a Google Calendar payload plus its source UID,
 * keeping calendar order. Throws AmbiguousTimezoneError before producing anything when the
 * calendar declares several timezones and contains timed events.
 */
export const mapCalendar = (calendar: ParsedCalendar, options: MapperOptions = {}): MappedEvent[] => {
  const hasTimedEvents = calendar.events.some(event => event.start.type === 'date-time');
  if (hasTimedEvents && calendar.timezones.length > 1) {
    throw new AmbiguousTimezoneError(calendar.timezones);
  }

  const floatingZone = calendar.timezones[0] ?? options.localZone ?? 'system';
  return calendar.events.map(event => ({
    payload: mapEvent(event, floatingZone),
    uid: event.uid,
  }));
};

export const mapEvent = (event: SourceEvent, floatingZone: string): RemoteEventPayload => {
  const payload: RemoteEventPayload = {
    summary: event.summary || null,
    description: event.description || null,
    location: event.location || null,
    ...mapEventTimes(event.start, event.end, floatingZone),
  };

  if (event.uid) {
    payload.extendedProperties = { private: { [ICS_UID_PROPERTY]: event.uid } };
  }
  if (event.rrule && event.rrule.length > 0) {
    payload.recurrence = [renderRecurrence(event.rrule)];
  }
  return payload;
};

const mapEventTimes = (
  start: EventTime,
  end: EventTime | undefined,
  floatingZone: string,
): { start: EventDate; end: EventDate } => {
  if (start.type === 'date') {
    let endDate: string;
    if (!end) {
      // RFC5545: an all-day event without DTEND lasts one day
      endDate = formatDate(DateTime.fromISO(start.date, { zone: 'UTC' }).plus({ days: 1 }));
    } else {
      endDate = end.type === 'date' ? end.date : end.dateTime.slice(0, 10);
    }
    return { start: { date: start.date }, end: { date: endDate } };
  }

  const startZone = start.tzid ?? floatingZone;
  const startDt = toDateTime(start, startZone);

  let endDt: DateTime;
  let endZone = startZone;
  if (!end) {
    endDt = startDt.plus({ hours: 1 });
  } else if (end.type === 'date') {
    endDt = DateTime.fromISO(end.date, { zone: startZone });
  } else {
    endZone = end.tzid ?? floatingZone;
    endDt = toDateTime(end, endZone);
  }

  return {
    start: { dateTime: formatDateTime(startDt, startZone) },
    end: { dateTime: formatDateTime(endDt, endZone) },
  };
};
