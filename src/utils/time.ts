import { DateTime } from 'luxon';

const SPOKEN_NUMBERS = [
  'twelve', 'one', 'two', 'three', 'four', 'five', 'six',
  'seven', 'eight', 'nine', 'ten', 'eleven',
];

/** Tool-boundary timestamp format: local-naive ISO 8601 without offset. */
export function toLocalIso(moment: DateTime): string {
  return moment.toFormat("yyyy-MM-dd'T'HH:mm:ss");
}

export function fromLocalIso(value: string, timezone: string): DateTime {
  return DateTime.fromISO(value, { zone: timezone });
}

/** 14:00 -> "two P.M.", 9:30 -> "nine thirty A.M." */
export function spokenTime(moment: DateTime): string {
  const base = SPOKEN_NUMBERS[moment.hour % 12];
  const minutes = moment.minute === 30 ? ' thirty' : moment.minute > 0 ? ` ${moment.toFormat('mm')}` : '';
  return `${base}${minutes} ${moment.hour < 12 ? 'A.M.' : 'P.M.'}`;
}

/** "today", "tomorrow", "Thursday" within the week, otherwise "Monday, November 2". */
export function spokenDay(moment: DateTime, now: DateTime): string {
  const days = Math.round(moment.startOf('day').diff(now.startOf('day'), 'days').days);
  const english = moment.setLocale('en');

  if (days === 0) return 'today';
  if (days === 1) return 'tomorrow';
  if (days > 1 && days < 7) return english.toFormat('cccc');
  return english.toFormat('cccc, LLLL d');
}

export function spokenDateTime(moment: DateTime, now: DateTime): string {
  return `${spokenDay(moment, now)} at ${spokenTime(moment)}`;
}

/** Adds a closing period unless the text already ends with one ("two P.M."). */
export function endSentence(text: string): string {
  return text.endsWith('.') ? text : `${text}.`;
}
