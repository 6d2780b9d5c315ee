import type { CalendarEvent } from "../../src/schemas/google-calendar-api.js";

/**
 * In-memory calendar backing the Google Calendar mock handlers.
 * Reset after every test by tests/setup.ts.
 */
export class CalendarStore {
  private readonly events = new Map<string, CalendarEvent>();
  private nextId = 1;

  seed(events: CalendarEvent[]): void {
    for (const event of events) {
      const id = event.id ?? this.allocateId();
      this.events.set(id, { ...event, id });
    }
  }

  allocateId(): string {
    return `evt-${String(this.nextId++).padStart(3, "0")}`;
  }

  get(id: string): CalendarEvent | undefined {
    return this.events.get(id);
  }

  put(id: string, event: CalendarEvent): CalendarEvent {
    const stored = { ...event, id };
    this.events.set(id, stored);
    return stored;
  }

  delete(id: string): boolean {
    return this.events.delete(id);
  }

  /** Events ordered by start, as `orderBy=startTime` returns them. */
  list(): CalendarEvent[] {
    return [...this.events.values()].sort((a, b) =>
      startKey(a).localeCompare(startKey(b)),
    );
  }

  reset(): void {
    this.events.clear();
    this.nextId = 1;
  }
}

function startKey(event: CalendarEvent): string {
  return event.start?.dateTime ?? event.start?.date ?? "";
}

export const calendarStore = new CalendarStore();
