export interface Contact {
  name: string;
  phone: string;
  email: string;
}

export type Weekday = 'Monday' | 'Tuesday' | 'Wednesday' | 'Thursday' | 'Friday';

export interface Slot {
  /** Local-naive ISO 8601, e.g. 2026-10-22T09:00:00 */
  start: string;
  end: string;
  weekday: Weekday;
  hour: number;
  label: string;
}

export interface SlotPreferences {
  preferredDate?: string;
  preferredTime?: string;
  earliestAcceptableDate?: string;
}

export interface SlotOffer {
  slots: Slot[];
  message: string;
  declined: boolean;
}

export type ReminderPreference = 'email' | 'sms' | 'both' | 'none';

export type NotificationChannel = 'email' | 'sms';

export interface BookingRequest {
  summary: string;
  start: string;
  end?: string;
  attendee: Contact;
  reminderPreference: ReminderPreference;
  description?: string;
}

export interface Booking {
  readonly eventId: string;
  readonly summary: string;
  readonly start: string;
  readonly end: string;
  readonly timezone: string;
  readonly attendee: Readonly<Contact>;
  readonly reminderPreference: ReminderPreference;
  readonly description: string;
}

export interface BookingResult {
  booked: boolean;
  confirmed: boolean;
  reminderScheduled: boolean;
  message: string;
  eventId?: string;
  confirmationChannels: NotificationChannel[];
  reminderChannels: NotificationChannel[];
}

export type DeliveryStatus = 'sent' | 'skipped' | 'failed';

export type ConfirmationOutcome = Record<NotificationChannel, DeliveryStatus>;
