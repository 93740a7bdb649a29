import { google, calendar_v3 } from 'googleapis';
import { CalendarAdapter, CalendarCreateResult, CalendarEventInput } from '../../types/calendar';
import { env } from '../../config/env';
import { logger } from '../../utils/logger';
import { ConfigurationError, ExternalServiceError, toError } from '../../utils/errors';
import { createGoogleAuth } from '../google/credentials';

export class GoogleCalendarAdapter implements CalendarAdapter {
  private calendar: calendar_v3.Calendar | null = null;
  private calendarId: string;

  constructor(calendarId: string = env.GOOGLE_CALENDAR_ID) {
    this.calendarId = calendarId;
  }

  private client(): calendar_v3.Calendar {
    if (!this.calendar) {
      const auth = createGoogleAuth('Google Calendar', ['https://www.googleapis.com/auth/calendar.events']);
      this.calendar = google.calendar({ version: 'v3', auth });
    }
    return this.calendar;
  }

  async createEvent(event: CalendarEventInput): Promise<CalendarCreateResult> {
    try {
      const result = await this.client().events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: event.summary,
          description: event.description ?? '',
          start: { dateTime: event.start, timeZone: event.timezone },
          end: { dateTime: event.end, timeZone: event.timezone },
        },
      });

      const eventId = result.data.id ?? '';
      logger.info('Google Calendar event created', { eventId, start: event.start });

      return { success: true, eventId, htmlLink: result.data.htmlLink ?? undefined };
    } catch (error: unknown) {
      if (error instanceof ConfigurationError) {
        logger.warn('Calendar unavailable', { error: error.message });
        return { success: false, error: error.message };
      }

      const failure = new ExternalServiceError('GoogleCalendar', 'createEvent', toError(error));
      logger.error('Google Calendar event creation failed', { error: failure.message });
      return { success: false, error: failure.message };
    }
  }
}
