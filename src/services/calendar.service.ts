import { CalendarNotFoundError } from '../utils/errors.js';
import { ICS_UID_PROPERTY } from '../utils/event-mapper.js';
import type { Logger } from '../lib/logger.js';
import type { EventStore, RemoteEvent, RemoteEventPayload } from '../types/index.js';
import type { calendar_v3 } from 'googleapis';

// The parts of calendar_v3.Calendar this tool calls
export interface CalendarEventsApi {
  list(params: calendar_v3.Params$Resource$Events$List): Promise<{ data: calendar_v3.Schema$Events }>;
  insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<{ data: calendar_v3.Schema$Event }>;
  patch(params: calendar_v3.Params$Resource$Events$Patch): Promise<{ data: calendar_v3.Schema$Event }>;
}

export interface CalendarListApi {
  list(params: calendar_v3.Params$Resource$Calendarlist$List): Promise<{ data: calendar_v3.Schema$CalendarList }>;
}

export interface CalendarApi {
  events: CalendarEventsApi;
  calendarList: CalendarListApi;
}

export class GoogleCalendarStore implements EventStore {
  constructor(
    private readonly events: CalendarEventsApi,
    private readonly calendarId: string,
  ) {}

  async findByIdentity(uid: string): Promise<RemoteEvent | null> {
    if (!uid) {
      return null;
    }

    const response = await this.events.list({
      calendarId: this.calendarId,
      privateExtendedProperty: [`${ICS_UID_PROPERTY}=${uid}`],
      maxResults: 1,
      singleEvents: false,
      showDeleted: false,
    });

    const item = response.data.items?.[0];
    if (!item?.id) {
      return null;
    }
    return { id: item.id, uid: item.extendedProperties?.private?.[ICS_UID_PROPERTY] };
  }

  async create(payload: RemoteEventPayload): Promise<string> {
    const response = await this.events.insert({
      calendarId: this.calendarId,
      requestBody: payload,
    });

    const createdEvent = response.data;
    if (!createdEvent.id) {
      throw new Error('Google did not return an event ID');
    }
    return createdEvent.id;
  }

  async update(id: string, payload: RemoteEventPayload): Promise<string> {
    const response = await this.events.patch({
      calendarId: this.calendarId,
      eventId: id,
      requestBody: payload,
    });
    return response.data.id || id;
  }
}

/**
 * Resolves a calendar id from either an id or a display name (case-insensitive).
 * 'primary' is returned as is. When several calendars match, the first one listed wins.
 */
export const resolveCalendarId = async (
  calendarList: CalendarListApi,
  selector: string,
  logger: Logger,
): Promise<string> => {
  if (selector === 'primary') {
    return 'primary';
  }

  const wanted = selector.toLowerCase();
  const matches: Array<{ id: string; summary: string }> = [];
  let pageToken: string | undefined;

  do {
    const response = await calendarList.list({ pageToken, maxResults: 250 });
    for (const item of response.data.items || []) {
      if (!item.id) {
        continue;
      }
      if (item.id.toLowerCase() === wanted || (item.summary || '').toLowerCase() === wanted) {
        matches.push({ id: item.id, summary: item.summary || '' });
      }
    }
    pageToken = response.data.nextPageToken || undefined;
  } while (pageToken);

  if (matches.length === 0) {
    throw new CalendarNotFoundError(selector);
  }
  if (matches.length > 1) {
    logger.warn(`Multiple calendars matched '${selector}'; using first: ${matches[0].summary} (${matches[0].id})`);
  }
  return matches[0].id;
};
