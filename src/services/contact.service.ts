import { Contact } from '../types/booking';

export const MIN_PHONE_DIGITS = 7;
const MIN_NAME_CHARACTERS = 2;

export type ContactField = keyof Contact;

export interface ValidationIssue {
  field: ContactField;
  problem: 'missing' | 'too_short' | 'malformed';
  prompt: string;
}

export interface ContactValidation {
  complete: boolean;
  issues: ValidationIssue[];
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;

export function countDigits(phone: string): number {
  return phone.replace(/\D/g, '').length;
}

function checkName(name: string): ValidationIssue | null {
  const trimmed = name.trim();
  if (!trimmed) {
    return { field: 'name', problem: 'missing', prompt: 'Could I get your full name, please?' };
  }

  const tokens = trimmed.split(/\s+/).filter((token) => /\p{L}/u.test(token));
  const letters = trimmed.replace(/[^\p{L}]/gu, '').length;
  if (tokens.length >= 2 || letters >= MIN_NAME_CHARACTERS) return null;

  return { field: 'name', problem: 'too_short', prompt: 'Um, sorry, could you give me your full name?' };
}

function checkPhone(phone: string): ValidationIssue | null {
  if (!phone.trim()) {
    return { field: 'phone', problem: 'missing', prompt: "What's the best phone number to reach you on?" };
  }
  if (countDigits(phone) >= MIN_PHONE_DIGITS) return null;

  return {
    field: 'phone',
    problem: 'too_short',
    prompt: 'Hmm, that phone number seems a bit short - can you repeat it?',
  };
}

function checkEmail(email: string): ValidationIssue | null {
  const trimmed = email.trim();
  if (!trimmed) {
    return { field: 'email', problem: 'missing', prompt: 'And what email address should we use?' };
  }
  if (EMAIL_PATTERN.test(trimmed)) return null;

  return {
    field: 'email',
    problem: 'malformed',
    prompt: "Sorry, I didn't quite catch the email. Could you spell it out for me, including the part after the at sign?",
  };
}

/**
 * Flags incomplete or implausible contact fields. Never rejects: the dialogue layer
 * asks the clarifying prompt and re-validates on the next turn.
 */
export function validateContact(contact: Partial<Contact>): ContactValidation {
  const issues = [
    checkName(contact.name ?? ''),
    checkPhone(contact.phone ?? ''),
    checkEmail(contact.email ?? ''),
  ].filter((issue): issue is ValidationIssue => issue !== null);

  return { complete: issues.length === 0, issues };
}
