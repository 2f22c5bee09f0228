// Parsed ICS calendar types

export interface DateValue {
  type: 'date';
  date: string; // YYYY-MM-DD
}

export interface DateTimeValue {
  type: 'date-time';
  dateTime: string; // YYYY-MM-DDTHH:mm:ss, no offset
  // TZID parameter, 'UTC' for a trailing Z, null for floating times
  tzid: string | null;
}

export type EventTime = DateValue | DateTimeValue;

export type RecurrencePart = [name: string, value: string | string[]];

export interface SourceEvent {
  uid: string;
  summary?: string;
  description?: string;
  location?: string;
  start: EventTime;
  end?: EventTime;
  rrule?: RecurrencePart[];
}

export interface ParsedCalendar {
  events: SourceEvent[];
  timezones: string[];
  calendarName?: string;
  timezone?: string;
}
