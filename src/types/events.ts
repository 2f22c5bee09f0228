// Remote (Google Calendar) event types

export type EventDate = { date: string } | { dateTime: string };

export interface RemoteEventPayload {
  summary: string | null;
  description: string | null;
  location: string | null;
  start: EventDate;
  end: EventDate;
  recurrence?: string[];
  extendedProperties?: {
    private: { ics_uid: string };
  };
}

export interface MappedEvent {
  payload: RemoteEventPayload;
  uid: string;
}

export interface RemoteEvent {
  id: string;
  uid?: string;
}

export interface EventStore {
  findByIdentity(uid: string): Promise<RemoteEvent | null>;
  create(payload: RemoteEventPayload): Promise<string>;
  update(id: string, payload: RemoteEventPayload): Promise<string>;
}
