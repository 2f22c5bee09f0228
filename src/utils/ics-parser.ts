import { IcsParseError, errorMessage } from './errors.js';
import ICAL from 'ical.js';
import { readFile } from 'node:fs/promises';
import type { EventTime, ParsedCalendar, RecurrencePart, SourceEvent } from '../types/index.js';

type IcalComponent = InstanceType<typeof ICAL.Component>;
type IcalProperty = InstanceType<typeof ICAL.Property>;
type IcalTime = InstanceType<typeof ICAL.Time>;

const WEEKDAYS = ['SU', 'MO', 'TU', 'WE', 'TH', 'FR', 'SA'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const pad = (value: number): string => String(value).padStart(2, '0');

const formatDate = (time: IcalTime): string => `${time.year}-${pad(time.month)}-${pad(time.day)}`;

const formatDateTime = (time: IcalTime): string =>
  `${formatDate(time)}T${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;

const textValue = (component: IcalComponent, name: string): string | undefined => {
  const value = component.getFirstPropertyValue(name);
  return typeof value === 'string' ? value : undefined;
};

export class ICSParser {
  async readICS(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      throw new Error(`Failed to read ICS file ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  parseICS(icsContent: string): ParsedCalendar {
    let calendars: IcalComponent[];
    try {
      const jcalData: unknown = ICAL.parse(icsContent);
      // a single component comes back as one jCal array, several as a list of them
      const roots: unknown[] = Array.isArray(jcalData) ? (typeof jcalData[0] === 'string' ? [jcalData] : jcalData) : [];
      calendars = roots
        .filter(Array.isArray)
        .map(root => new ICAL.Component(root))
        .filter(comp => comp.name === 'vcalendar');
    } catch (error) {
      throw new IcsParseError(`ICS parsing failed: ${errorMessage(error)}`, { cause: error });
    }
    if (calendars.length === 0) {
      throw new IcsParseError('ICS parsing failed: no VCALENDAR component found');
    }

    const events: SourceEvent[] = [];
    const timezones: string[] = [];
    for (const comp of calendars) {
      for (const vtimezone of comp.getAllSubcomponents('vtimezone')) {
        const tzid = textValue(vtimezone, 'tzid');
        if (tzid && !timezones.includes(tzid)) {
          timezones.push(tzid);
        }
      }
      events.push(...comp.getAllSubcomponents('vevent').map(vevent => this.parseEvent(vevent)));
    }

    return {
      events,
      timezones,
      calendarName: textValue(calendars[0], 'x-wr-calname') || undefined,
      timezone: textValue(calendars[0], 'x-wr-timezone') || undefined,
    };
  }

  async readAndParse(path: string): Promise<ParsedCalendar> {
    const icsContent = await this.readICS(path);
    return this.parseICS(icsContent);
  }

  private parseEvent(vevent: IcalComponent): SourceEvent {
    const uid = textValue(vevent, 'uid') ?? '';
    const start = this.parseTime(vevent.getFirstProperty('dtstart'));
    if (!start) {
      throw new IcsParseError(`ICS parsing failed: event ${uid || '(no UID)'} has no valid DTSTART`);
    }

    const event: SourceEvent = {
      uid,
      summary: textValue(vevent, 'summary'),
      description: textValue(vevent, 'description'),
      location: textValue(vevent, 'location'),
      start,
      end: this.parseTime(vevent.getFirstProperty('dtend')),
    };

    // ICAL.Recur regroups the parts, so the rule is read from the property's jCal
    const rrule: unknown = vevent.getFirstProperty('rrule')?.toJSON()[3];
    if (isRecord(rrule)) {
      event.rrule = this.parseRecurrence(rrule);
    }
    return event;
  }

  private parseTime(prop: IcalProperty | null): EventTime | undefined {
    const value = prop?.getFirstValue();
    if (!prop || !(value instanceof ICAL.Time)) {
      return undefined;
    }

    if (value.isDate) {
      return { type: 'date', date: formatDate(value) };
    }
    if (value.zone === ICAL.Timezone.utcTimezone) {
      return { type: 'date-time', dateTime: formatDateTime(value), tzid: 'UTC' };
    }
    const tzid = prop.getParameter('tzid');
    return {
      type: 'date-time',
      dateTime: formatDateTime(value),
      tzid: typeof tzid === 'string' ? tzid : null,
    };
  }

  // The jCal rule is a dict in source order, with UNTIL expanded to ISO form
  // and WKST converted to a day number
  private parseRecurrence(rrule: Record<string, unknown>): RecurrencePart[] {
    return Object.entries(rrule).map(([name, value]): RecurrencePart => {
      if (name === 'until' && typeof value === 'string') {
        return [name, value.replace(/[-:]/g, '')];
      }
      if (name === 'wkst' && typeof value === 'number') {
        return [name, WEEKDAYS[value - 1] ?? String(value)];
      }
      if (Array.isArray(value)) {
        return [name, value.map(item => String(item))];
      }
      return [name, String(value)];
    });
  }
}
