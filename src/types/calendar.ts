export interface CalendarEventInput {
  summary: string;
  start: string;
  end: string;
  timezone: string;
  description?: string;
}

export type CalendarCreateResult =
  | { success: true; eventId: string; htmlLink?: string }
  | { success: false; error: string };

export interface CalendarAdapter {
  createEvent(event: CalendarEventInput): Promise<CalendarCreateResult>;
}
