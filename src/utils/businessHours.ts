import { DateTime } from 'luxon';

interface OpeningHours {
  open: string;
  close: string;
}

export interface BusinessHoursConfig {
  monday: OpeningHours | null;
  tuesday: OpeningHours | null;
  wednesday: OpeningHours | null;
  thursday: OpeningHours | null;
  friday: OpeningHours | null;
  saturday: OpeningHours | null;
  sunday: OpeningHours | null;
}

export const DEFAULT_BUSINESS_HOURS: BusinessHoursConfig = {
  monday: { open: '09:00', close: '18:00' },
  tuesday: { open: '09:00', close: '18:00' },
  wednesday: { open: '09:00', close: '18:00' },
  thursday: { open: '09:00', close: '18:00' },
  friday: { open: '09:00', close: '18:00' },
  saturday: null,
  sunday: null,
};

const DAY_NAMES: (keyof BusinessHoursConfig)[] = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
];

function toMinutes(hhmm: string): number {
  const [hours, minutes] = hhmm.split(':').map(Number);
  return hours * 60 + minutes;
}

function hoursFor(moment: DateTime, config: BusinessHoursConfig): OpeningHours | null {
  // Luxon weekday is 1-based (Mon=1)
  return config[DAY_NAMES[moment.weekday - 1]];
}

export function isWithinBusinessHours(
  now: DateTime,
  timezone: string,
  config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS
): boolean {
  const local = now.setZone(timezone);
  const dayHours = hoursFor(local, config);
  if (!dayHours) return false;

  const nowMinutes = local.hour * 60 + local.minute;
  return nowMinutes >= toMinutes(dayHours.open) && nowMinutes < toMinutes(dayHours.close);
}

export function getNextOpening(
  now: DateTime,
  timezone: string,
  config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS
): DateTime | null {
  const local = now.setZone(timezone);
  let check = local;

  for (let i = 0; i < 8; i++) {
    const dayHours = hoursFor(check, config);

    if (dayHours) {
      const [openH, openM] = dayHours.open.split(':').map(Number);
      const start = check.set({ hour: openH, minute: openM, second: 0, millisecond: 0 });

      if (start > local) {
        return start;
      }
    }

    check = check.plus({ days: 1 }).startOf('day');
  }

  return null;
}
