import { IcsParseError } from '../../src/utils/errors.js';
import { ICSParser } from '../../src/utils/ics-parser.js';
import { fileURLToPath } from 'node:url';
import { beforeEach, describe, expect, it } from 'vitest';

const TRIPS_FILE = fileURLToPath(new URL('../fixtures/two-trips/trips.ics', import.meta.url));

describe('ICSParser', () => {
  let parser: ICSParser;

  beforeEach(() => {
    parser = new ICSParser();
  });

  describe('parseICS', () => {
    it('should parse a simple timed event', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
PRODID:-//Example//Test//EN
X-WR-CALNAME:Team Calendar
X-WR-TIMEZONE:America/Chicago
BEGIN:VEVENT
UID:review-123@example.test
DTSTART:20240315T235900Z
DTEND:20240316T003000Z
SUMMARY:Quarterly review
DESCRIPTION:Go through the numbers
LOCATION:Room 4
END:VEVENT
END:VCALENDAR`;

      const result = parser.parseICS(icsContent);

      expect(result.calendarName).toBe('Team Calendar');
      expect(result.timezone).toBe('America/Chicago');
      expect(result.timezones).toEqual([]);
      expect(result.events).toHaveLength(1);

      const event = result.events[0];
      expect(event.uid).toBe('review-123@example.test');
      expect(event.summary).toBe('Quarterly review');
      expect(event.description).toBe('Go through the numbers');
      expect(event.location).toBe('Room 4');
      expect(event.start).toEqual({ type: 'date-time', dateTime: '2024-03-15T23:59:00', tzid: 'UTC' });
      expect(event.end).toEqual({ type: 'date-time', dateTime: '2024-03-16T00:30:00', tzid: 'UTC' });
      expect(event.rrule).toBeUndefined();
    });

    it('should keep the TZID of zoned times and leave floating times without one', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VEVENT
UID:zoned@example.test
DTSTART;TZID=Europe/Berlin:20250110T083000
DTEND:20250110T093000
SUMMARY:Zoned start
END:VEVENT
END:VCALENDAR`;

      const event = parser.parseICS(icsContent).events[0];

      expect(event.start).toEqual({ type: 'date-time', dateTime: '2025-01-10T08:30:00', tzid: 'Europe/Berlin' });
      expect(event.end).toEqual({ type: 'date-time', dateTime: '2025-01-10T09:30:00', tzid: null });
    });

    it('should keep the TZID of a time whose VTIMEZONE is declared', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VTIMEZONE
TZID:Europe/Berlin
BEGIN:STANDARD
TZOFFSETFROM:+0200
TZOFFSETTO:+0100
DTSTART:19701025T030000
END:STANDARD
END:VTIMEZONE
BEGIN:VEVENT
UID:declared@example.test
DTSTART;TZID=Europe/Berlin:20250110T083000
SUMMARY:Declared zone
END:VEVENT
END:VCALENDAR`;

      const result = parser.parseICS(icsContent);

      expect(result.timezones).toEqual(['Europe/Berlin']);
      expect(result.events[0].start).toEqual({
        type: 'date-time',
        dateTime: '2025-01-10T08:30:00',
        tzid: 'Europe/Berlin',
      });
    });

    it('should read events from every VCALENDAR in the content', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
X-WR-CALNAME:First
BEGIN:VEVENT
UID:one@example.test
DTSTART;VALUE=DATE:20240320
END:VEVENT
END:VCALENDAR
BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VEVENT
UID:two@example.test
DTSTART;VALUE=DATE:20240321
END:VEVENT
END:VCALENDAR`;

      const result = parser.parseICS(icsContent);

      expect(result.calendarName).toBe('First');
      expect(result.events.map(event => event.uid)).toEqual(['one@example.test', 'two@example.test']);
    });

    it('should handle all-day events', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VEVENT
UID:all-day@example.test
DTSTART;VALUE=DATE:20240320
DTEND;VALUE=DATE:20240321
SUMMARY:Offsite
END:VEVENT
END:VCALENDAR`;

      const event = parser.parseICS(icsContent).events[0];

      expect(event.start).toEqual({ type: 'date', date: '2024-03-20' });
      expect(event.end).toEqual({ type: 'date', date: '2024-03-21' });
    });

    it('should handle events with missing optional fields', () => {
      const minimalIcs = `BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VEVENT
DTSTART:20240315T120000Z
END:VEVENT
END:VCALENDAR`;

      const event = parser.parseICS(minimalIcs).events[0];

      expect(event.uid).toBe('');
      expect(event.summary).toBeUndefined();
      expect(event.description).toBeUndefined();
      expect(event.location).toBeUndefined();
      expect(event.end).toBeUndefined();
    });

    it('should unescape text values', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VEVENT
UID:escaped@example.test
DTSTART:20240315T120000Z
SUMMARY:Lunch\\, then walk
DESCRIPTION:Line one\\nLine two
END:VEVENT
END:VCALENDAR`;

      const event = parser.parseICS(icsContent).events[0];

      expect(event.summary).toBe('Lunch, then walk');
      expect(event.description).toBe('Line one\nLine two');
    });

    it('should keep recurrence rule parts in their original order', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VEVENT
UID:weekly@example.test
DTSTART:20240304T090000Z
RRULE:FREQ=WEEKLY;BYDAY=MO,WE;COUNT=10
END:VEVENT
BEGIN:VEVENT
UID:daily@example.test
DTSTART:20240304T090000Z
RRULE:FREQ=DAILY;INTERVAL=2;UNTIL=20251231T000000Z
END:VEVENT
END:VCALENDAR`;

      const [weekly, daily] = parser.parseICS(icsContent).events;

      expect(weekly.rrule).toEqual([
        ['freq', 'WEEKLY'],
        ['byday', ['MO', 'WE']],
        ['count', '10'],
      ]);
      expect(daily.rrule).toEqual([
        ['freq', 'DAILY'],
        ['interval', '2'],
        ['until', '20251231T000000Z'],
      ]);
    });

    it('should collect distinct VTIMEZONE ids in declaration order', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VTIMEZONE
TZID:Europe/Berlin
BEGIN:STANDARD
TZOFFSETFROM:+0200
TZOFFSETTO:+0100
DTSTART:19701025T030000
END:STANDARD
END:VTIMEZONE
BEGIN:VTIMEZONE
TZID:America/New_York
BEGIN:STANDARD
TZOFFSETFROM:-0400
TZOFFSETTO:-0500
DTSTART:19701101T020000
END:STANDARD
END:VTIMEZONE
BEGIN:VTIMEZONE
TZID:Europe/Berlin
BEGIN:STANDARD
TZOFFSETFROM:+0200
TZOFFSETTO:+0100
DTSTART:19701025T030000
END:STANDARD
END:VTIMEZONE
END:VCALENDAR`;

      expect(parser.parseICS(icsContent).timezones).toEqual(['Europe/Berlin', 'America/New_York']);
    });

    it('should handle multiple events in calendar order', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VEVENT
UID:first@example.test
DTSTART:20240316T090000Z
SUMMARY:First
END:VEVENT
BEGIN:VEVENT
UID:second@example.test
DTSTART:20240315T090000Z
SUMMARY:Second
END:VEVENT
END:VCALENDAR`;

      const result = parser.parseICS(icsContent);

      expect(result.events.map(event => event.uid)).toEqual(['first@example.test', 'second@example.test']);
    });

    it('should handle empty calendar', () => {
      const emptyIcs = `BEGIN:VCALENDAR
VERSION:2.0
END:VCALENDAR`;

      const result = parser.parseICS(emptyIcs);
      expect(result.events).toHaveLength(0);
    });

    it('should throw error for invalid ICS format', () => {
      const invalidIcs = 'This is not an ICS file';

      expect(() => parser.parseICS(invalidIcs)).toThrow(IcsParseError);
      expect(() => parser.parseICS(invalidIcs)).toThrow('ICS parsing failed');
    });

    it('should reject events without DTSTART', () => {
      const icsContent = `BEGIN:VCALENDAR
VERSION:2.0
BEGIN:VEVENT
UID:no-start@example.test
SUMMARY:Nothing scheduled
END:VEVENT
END:VCALENDAR`;

      expect(() => parser.parseICS(icsContent)).toThrow('event no-start@example.test has no valid DTSTART');
    });
  });

  describe('readAndParse', () => {
    it('should read and parse a file in one operation', async () => {
      const result = await parser.readAndParse(TRIPS_FILE);

      expect(result.timezones).toEqual(['Europe/Berlin']);
      expect(result.events.map(event => event.uid)).toEqual(['trip-0001@example.test', 'trip-0002@example.test']);
      expect(result.events[0].summary).toBe('Berlin Hbf ➞ Halle(Saale)Hbf');
      expect(result.events[0].start).toEqual({ type: 'date-time', dateTime: '2025-09-13T09:00:00', tzid: null });
    });

    it('should report unreadable files', async () => {
      await expect(parser.readAndParse('/nonexistent/calendar.ics')).rejects.toThrow(
        'Failed to read ICS file /nonexistent/calendar.ics',
      );
    });
  });
});
