import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';
import { Slot, SlotOffer, SlotPreferences, Weekday } from '../types/booking';
import { endSentence, spokenDateTime, toLocalIso } from '../utils/time';
import { logger } from '../utils/logger';

export const SLOT_HOURS = [9, 10, 11, 13, 14, 15, 16] as const;
export const MEETING_MINUTES = 30;

const MAX_SLOTS = 6;
const MAX_DAYS_SCANNED = 14;
const FALLBACK_HOUR = 14;
const FIRST_HOUR = SLOT_HOURS[0];
const LAST_HOUR = SLOT_HOURS[SLOT_HOURS.length - 1];

const WEEKDAY_NAMES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];
const SLOT_WEEKDAYS: Weekday[] = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday'];

const CLOCK_PATTERN = /(?:\b(after|from|before|until|by)\s+)?\b(\d{1,2})(?::\d{2})?\s*([ap])\.?m\b/;
const OUT_OF_HOURS_PATTERN = /\b(evening|tonight|night)\b/;

interface TimePreference {
  outOfHours: boolean;
  accepts: (hour: number) => boolean;
}

const ANY_HOUR: TimePreference = { outOfHours: false, accepts: () => true };
const OUT_OF_HOURS: TimePreference = { outOfHours: true, accepts: () => false };

function interpretTime(preferredTime?: string): TimePreference {
  const text = preferredTime?.toLowerCase().trim();
  if (!text) return ANY_HOUR;

  if (OUT_OF_HOURS_PATTERN.test(text)) return OUT_OF_HOURS;

  const clock = text.match(CLOCK_PATTERN);
  if (clock) {
    const qualifier = clock[1];
    const hour = (parseInt(clock[2], 10) % 12) + (clock[3] === 'p' ? 12 : 0);

    if (qualifier === 'after' || qualifier === 'from') {
      return hour > LAST_HOUR ? OUT_OF_HOURS : { outOfHours: false, accepts: (h) => h >= hour };
    }
    if (qualifier) {
      return hour <= FIRST_HOUR ? OUT_OF_HOURS : { outOfHours: false, accepts: (h) => h < hour };
    }
    if (hour < FIRST_HOUR || hour > LAST_HOUR) return OUT_OF_HOURS;
    return { outOfHours: false, accepts: (h) => h === hour };
  }

  if (text.includes('morning')) return { outOfHours: false, accepts: (h) => h < 12 };
  if (text.includes('afternoon')) return { outOfHours: false, accepts: (h) => h >= 12 };

  return ANY_HOUR;
}

function parseExplicitDate(text: string, now: DateTime): DateTime | null {
  const iso = DateTime.fromISO(text, { zone: now.zone });
  if (iso.isValid) return iso.startOf('day');

  const parsed: Date | null = chrono.parseDate(
    text,
    { instant: now.toJSDate(), timezone: now.offset },
    { forwardDate: true }
  );
  if (!parsed) return null;

  return DateTime.fromJSDate(parsed, { zone: now.zone }).startOf('day');
}

/**
 * Resolves a spoken day phrase to the start of that day.
 * Returns null when the phrase names no recognisable day.
 */
export function resolveDay(phrase: string, now: DateTime): DateTime | null {
  const text = phrase.toLowerCase().trim();
  const today = now.startOf('day');
  const weekdayIndex = today.weekday - 1; // Monday = 0

  if (text.includes('next week')) {
    const daysUntilMonday = (7 - weekdayIndex) % 7 || 7;
    return today.plus({ days: daysUntilMonday });
  }
  if (text.includes('next month')) return today.plus({ days: 30 });
  if (text.includes('tomorrow')) return today.plus({ days: 1 });
  if (text.includes('today')) return today;

  const named = WEEKDAY_NAMES.findIndex((day) => text.includes(day));
  if (named >= 0) {
    let daysAhead = named - weekdayIndex;
    if (daysAhead <= 0 || text.includes('next')) daysAhead += 7;
    return today.plus({ days: daysAhead });
  }

  return parseExplicitDate(text, now);
}

function resolveSearchFloor(prefs: SlotPreferences, now: DateTime): DateTime {
  let floor = now.startOf('day').plus({ days: 1 });

  if (prefs.earliestAcceptableDate?.trim()) {
    floor = resolveDay(prefs.earliestAcceptableDate, now) ?? floor;
  }

  if (prefs.preferredDate?.trim()) {
    const preferred = resolveDay(prefs.preferredDate, now);
    if (preferred && preferred >= floor) {
      floor = preferred;
    }
  }

  return floor;
}

function toSlot(start: DateTime, now: DateTime): Slot {
  return {
    start: toLocalIso(start),
    end: toLocalIso(start.plus({ minutes: MEETING_MINUTES })),
    weekday: SLOT_WEEKDAYS[start.weekday - 1],
    hour: start.hour,
    label: spokenDateTime(start, now),
  };
}

/** Next weekday after today at two P.M. */
export function fallbackSlot(now: DateTime): Slot {
  let day = now.startOf('day').plus({ days: 1 });
  while (day.weekday > 5) {
    day = day.plus({ days: 1 });
  }
  return toSlot(day.set({ hour: FALLBACK_HOUR }), now);
}

export function outOfHoursMessage(now: DateTime): string {
  return `Oh, we're actually closed then. Our latest appointments start at four P.M. How about ${fallbackSlot(now).label} instead?`;
}

function offerMessage(slots: Slot[]): string {
  const labels = slots.map((slot) => slot.label);

  if (labels.length >= 3) {
    return `Okay, let me see what we have available... I can offer you ${labels[0]}, ${labels[1]}, or ${endSentence(labels[2])} Which of those works best for you?`;
  }
  if (labels.length === 2) {
    return `Alright, I have ${labels[0]} or ${labels[1]} available. Which would you prefer?`;
  }
  return `I have ${labels[0]} available. Would that work for you?`;
}

/**
 * Candidate appointment slots for the caller's preferences. `now` must already be in the
 * business timezone; slot timestamps are local-naive in that zone.
 */
export function generateSlots(prefs: SlotPreferences, now: DateTime): SlotOffer {
  const time = interpretTime(prefs.preferredTime);

  if (time.outOfHours) {
    logger.debug('Out-of-hours time requested', { preferredTime: prefs.preferredTime });
    return { slots: [fallbackSlot(now)], message: outOfHoursMessage(now), declined: true };
  }

  const floor = resolveSearchFloor(prefs, now);
  const slots: Slot[] = [];
  let day = floor;

  for (let scanned = 0; scanned < MAX_DAYS_SCANNED && slots.length < MAX_SLOTS; scanned++) {
    if (day.weekday <= 5) {
      for (const hour of SLOT_HOURS) {
        if (slots.length >= MAX_SLOTS) break;
        if (!time.accepts(hour)) continue;

        const start = day.set({ hour, minute: 0, second: 0, millisecond: 0 });
        if (start <= now) continue;

        slots.push(toSlot(start, now));
      }
    }
    day = day.plus({ days: 1 });
  }

  logger.debug('Slots generated', { ...prefs, floor: floor.toISODate(), count: slots.length });

  if (slots.length === 0) {
    const fallback = fallbackSlot(now);
    return {
      slots: [fallback],
      message: `Hmm, let me check our schedule... How about ${fallback.label}? Would that suit you?`,
      declined: false,
    };
  }

  return { slots, message: offerMessage(slots), declined: false };
}
