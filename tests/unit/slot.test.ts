jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { DateTime } from 'luxon';
import { fallbackSlot, generateSlots, resolveDay, SLOT_HOURS } from '../../src/services/slot.service';
import { SlotPreferences } from '../../src/types/booking';

const ZONE = 'Europe/Paris';

// Wednesday
const now = DateTime.fromISO('2026-10-21T10:00:00', { zone: ZONE });

describe('resolveDay', () => {
  it('resolves "next week" on a Wednesday to the Monday five days ahead', () => {
    expect(resolveDay('next week', now)?.toISODate()).toBe('2026-10-26');
  });

  it('resolves "next week" on a Monday to the following Monday', () => {
    const monday = DateTime.fromISO('2026-10-19T10:00:00', { zone: ZONE });
    expect(resolveDay('sometime next week', monday)?.toISODate()).toBe('2026-10-26');
  });

  it('resolves relative words', () => {
    expect(resolveDay('tomorrow', now)?.toISODate()).toBe('2026-10-22');
    expect(resolveDay('today', now)?.toISODate()).toBe('2026-10-21');
    expect(resolveDay('next month', now)?.toISODate()).toBe('2026-11-20');
  });

  it('resolves weekday names to the next occurrence', () => {
    expect(resolveDay('friday', now)?.toISODate()).toBe('2026-10-23');
    expect(resolveDay('on Monday', now)?.toISODate()).toBe('2026-10-26');
    expect(resolveDay('wednesday', now)?.toISODate()).toBe('2026-10-28');
    expect(resolveDay('next friday', now)?.toISODate()).toBe('2026-10-30');
  });

  it('accepts ISO dates', () => {
    expect(resolveDay('2026-11-02', now)?.toISODate()).toBe('2026-11-02');
  });

  it('returns null for phrases without a day', () => {
    expect(resolveDay('whenever suits', now)).toBeNull();
  });
});

describe('generateSlots', () => {
  it('never returns an empty offer and keeps every slot inside business hours', () => {
    const cases: SlotPreferences[] = [
      {},
      { preferredTime: 'morning' },
      { preferredTime: 'afternoon' },
      { preferredTime: 'evening' },
      { preferredTime: 'after 3pm' },
      { preferredTime: 'before 9am' },
      { preferredTime: '10pm' },
      { preferredDate: 'saturday' },
      { preferredDate: 'next month' },
      { preferredDate: 'whenever', preferredTime: 'whenever' },
    ];

    for (const prefs of cases) {
      const offer = generateSlots(prefs, now);
      expect(offer.slots.length).toBeGreaterThanOrEqual(1);
      expect(offer.slots.length).toBeLessThanOrEqual(6);

      for (const slot of offer.slots) {
        const start = DateTime.fromISO(slot.start, { zone: ZONE });
        expect(start.weekday).toBeLessThanOrEqual(5);
        expect(SLOT_HOURS).toContain(start.hour);
        expect(slot.end).toBe(start.plus({ minutes: 30 }).toFormat("yyyy-MM-dd'T'HH:mm:ss"));
      }
    }
  });

  it('starts the search on the Monday of next week', () => {
    const offer = generateSlots({ preferredDate: 'next week' }, now);

    expect(offer.slots.map((slot) => slot.start)).toEqual([
      '2026-10-26T09:00:00',
      '2026-10-26T10:00:00',
      '2026-10-26T11:00:00',
      '2026-10-26T13:00:00',
      '2026-10-26T14:00:00',
      '2026-10-26T15:00:00',
    ]);
    expect(offer.message).toBe(
      'Okay, let me see what we have available... I can offer you Monday at nine A.M., Monday at ten A.M., or Monday at eleven A.M. Which of those works best for you?'
    );
    expect(offer.declined).toBe(false);
  });

  it('declines evening requests with the fixed redirect message', () => {
    const offer = generateSlots({ preferredTime: 'evening' }, now);

    expect(offer.declined).toBe(true);
    expect(offer.message).toBe(
      "Oh, we're actually closed then. Our latest appointments start at four P.M. How about tomorrow at two P.M. instead?"
    );
    expect(offer.slots).toHaveLength(1);
    expect(offer.slots[0].start).toBe('2026-10-22T14:00:00');
  });

  it('declines explicit times outside the slot hours', () => {
    expect(generateSlots({ preferredTime: '10pm' }, now).declined).toBe(true);
    expect(generateSlots({ preferredTime: 'before 9am' }, now).declined).toBe(true);
    expect(generateSlots({ preferredTime: 'after 5pm' }, now).declined).toBe(true);
  });

  it('keeps morning slots only', () => {
    const offer = generateSlots({ preferredTime: 'in the morning' }, now);

    expect(offer.slots.map((slot) => slot.hour)).toEqual([9, 10, 11, 9, 10, 11]);
    expect(offer.slots[0].label).toBe('tomorrow at nine A.M.');
    expect(offer.slots[3].label).toBe('Friday at nine A.M.');
  });

  it('honours "after" times', () => {
    const offer = generateSlots({ preferredTime: 'after 3pm' }, now);

    expect(offer.slots.map((slot) => slot.start)).toEqual([
      '2026-10-22T15:00:00',
      '2026-10-22T16:00:00',
      '2026-10-23T15:00:00',
      '2026-10-23T16:00:00',
      '2026-10-26T15:00:00',
      '2026-10-26T16:00:00',
    ]);
  });

  it('offers an exact hour across the following weekdays', () => {
    const offer = generateSlots({ preferredTime: '2pm' }, now);

    expect(offer.slots.map((slot) => slot.start.slice(0, 10))).toEqual([
      '2026-10-22',
      '2026-10-23',
      '2026-10-26',
      '2026-10-27',
      '2026-10-28',
      '2026-10-29',
    ]);
    expect(offer.slots.every((slot) => slot.hour === 14)).toBe(true);
  });

  it('never goes below the earliest acceptable date', () => {
    const offer = generateSlots({ preferredDate: 'today', earliestAcceptableDate: 'tomorrow' }, now);
    expect(offer.slots[0].start).toBe('2026-10-22T09:00:00');
  });

  it('starts from the earliest acceptable date on its own', () => {
    const offer = generateSlots({ earliestAcceptableDate: 'next week' }, now);

    expect(offer.slots.map((slot) => slot.start)).toEqual([
      '2026-10-26T09:00:00',
      '2026-10-26T10:00:00',
      '2026-10-26T11:00:00',
      '2026-10-26T13:00:00',
      '2026-10-26T14:00:00',
      '2026-10-26T15:00:00',
    ]);
  });

  it('ignores a preferred date earlier than the earliest acceptable date', () => {
    const offer = generateSlots({ preferredDate: 'tomorrow', earliestAcceptableDate: 'next week' }, now);

    expect(offer.slots[0].start).toBe('2026-10-26T09:00:00');
    expect(offer.slots.every((slot) => slot.start.startsWith('2026-10-26'))).toBe(true);
  });

  it('moves to a preferred date after the earliest acceptable date', () => {
    const offer = generateSlots({ preferredDate: 'next friday', earliestAcceptableDate: 'next week' }, now);

    expect(offer.slots[0].start).toBe('2026-10-30T09:00:00');
    expect(offer.slots[0].weekday).toBe('Friday');
  });

  it('uses a later preferred date as the floor', () => {
    const offer = generateSlots({ preferredDate: 'friday' }, now);

    expect(offer.slots).toHaveLength(6);
    expect(offer.slots.every((slot) => slot.start.startsWith('2026-10-23'))).toBe(true);
    expect(offer.slots[0].weekday).toBe('Friday');
  });

  it('labels far dates with the full date', () => {
    const offer = generateSlots({ preferredDate: '2026-11-02' }, now);

    expect(offer.slots[0].start).toBe('2026-11-02T09:00:00');
    expect(offer.slots[0].label).toBe('Monday, November 2 at nine A.M.');
  });
});

describe('fallbackSlot', () => {
  it('skips the weekend', () => {
    const friday = DateTime.fromISO('2026-10-23T10:00:00', { zone: ZONE });
    const slot = fallbackSlot(friday);

    expect(slot.start).toBe('2026-10-26T14:00:00');
    expect(slot.label).toBe('Monday at two P.M.');
  });
});
