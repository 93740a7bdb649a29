import { Contact, ReminderPreference, Slot } from '../types/booking';

export interface DialogueFields {
  name: string;
  phone: string;
  email: string;
  topic: string;
  chosenSlot: Slot;
  reminderPreference: ReminderPreference;
}

export type DialogueField = keyof DialogueFields;

export const CONTACT_FIELDS: DialogueField[] = ['name', 'phone', 'email'];

const ORDINALS = ['first', 'second', 'third', 'fourth', 'fifth', 'sixth'];

const FIELD_LABELS: [DialogueField, string][] = [
  ['name', 'Name'],
  ['phone', 'Phone'],
  ['email', 'Email'],
  ['topic', 'Meeting topic'],
  ['chosenSlot', 'Chosen time'],
  ['reminderPreference', 'Reminder preference'],
];

/**
 * What the caller has already told us during one call. The dialogue layer checks it
 * before asking a question so nothing is asked twice.
 */
export class DialogueState {
  private fields: Partial<DialogueFields> = {};
  private offeredSlots: Slot[] = [];

  get<K extends DialogueField>(field: K): DialogueFields[K] | undefined {
    return this.fields[field];
  }

  set<K extends DialogueField>(field: K, value: DialogueFields[K]): void {
    this.fields[field] = value;
  }

  unset(field: DialogueField): void {
    delete this.fields[field];
  }

  has(field: DialogueField): boolean {
    const value = this.fields[field];
    return typeof value === 'string' ? value.trim().length > 0 : value !== undefined;
  }

  hasAll(fields: DialogueField[]): boolean {
    return fields.every((field) => this.has(field));
  }

  missing(fields: DialogueField[]): DialogueField[] {
    return fields.filter((field) => !this.has(field));
  }

  contact(): Partial<Contact> {
    return { name: this.fields.name, phone: this.fields.phone, email: this.fields.email };
  }

  setSlots(slots: Slot[]): void {
    this.offeredSlots = [...slots];
  }

  slots(): Slot[] {
    return [...this.offeredSlots];
  }

  /** Matches a caller's choice against the last offered slots. */
  resolveSlot(choice: string): Slot | null {
    const text = choice.toLowerCase().trim();
    if (!text || this.offeredSlots.length === 0) return null;

    const exact = this.offeredSlots.find((slot) => slot.start === choice.trim());
    if (exact) return exact;

    const byLabel = this.offeredSlots.find((slot) => text.includes(slot.label.toLowerCase()));
    if (byLabel) return byLabel;

    // A fragment such as "monday" only counts when it fits a single offered slot
    const partial = this.offeredSlots.filter((slot) => slot.label.toLowerCase().includes(text));
    if (partial.length === 1) return partial[0];

    if (/\blast\b/.test(text)) return this.offeredSlots[this.offeredSlots.length - 1];

    const ordinal = ORDINALS.findIndex((word) => new RegExp(`\\b${word}\\b`).test(text));
    if (ordinal >= 0) return this.offeredSlots[ordinal] ?? null;

    const index = text.match(/^(?:option\s+|number\s+)?(\d)$/);
    if (index) return this.offeredSlots[parseInt(index[1], 10) - 1] ?? null;

    return null;
  }

  snapshot(): Partial<DialogueFields> {
    return { ...this.fields };
  }

  /** Summary of collected fields for the dialogue instructions. */
  describe(): string {
    const lines = FIELD_LABELS
      .filter(([field]) => this.has(field))
      .map(([field, label]) => {
        const value = this.fields[field];
        const text = typeof value === 'object' ? value.label : value;
        return `- ${label}: ${text}`;
      });

    return lines.length > 0 ? `Already collected (do not ask again):\n${lines.join('\n')}` : '';
  }

  clear(): void {
    this.fields = {};
    this.offeredSlots = [];
  }
}
