import { DateTime } from 'luxon';
import { Contact } from '../types/booking';
import { RecordStore } from '../types/call';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { validateContact, ValidationIssue } from './contact.service';
import { GoogleSheetsStore } from './sheets/google-sheets.adapter';

export const ROW_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export const LEAD_SAVE_FAILED_MESSAGE = "I'm sorry, I'm having a technical issue saving your details right now.";

export interface LeadResult {
  saved: boolean;
  issues: ValidationIssue[];
  message: string;
}

export class LeadService {
  constructor(
    private store: RecordStore = new GoogleSheetsStore(),
    private clock: () => DateTime = () => DateTime.now().setZone(env.BUSINESS_TIMEZONE)
  ) {}

  async saveLead(contact: Partial<Contact>): Promise<LeadResult> {
    const validation = validateContact(contact);
    if (!validation.complete) {
      return { saved: false, issues: validation.issues, message: validation.issues[0].prompt };
    }

    const name = (contact.name ?? '').trim();
    const phone = (contact.phone ?? '').trim();
    const email = (contact.email ?? '').trim();

    try {
      await this.store.appendLead({
        timestamp: this.clock().toFormat(ROW_TIMESTAMP_FORMAT),
        name,
        phone,
        email,
      });
    } catch (error: unknown) {
      logger.error('Failed to save lead', {
        name,
        error: error instanceof Error ? error.message : String(error),
      });
      return { saved: false, issues: [], message: LEAD_SAVE_FAILED_MESSAGE };
    }

    const firstName = name.split(/\s+/)[0];
    return { saved: true, issues: [], message: `Got it, I've saved your details, ${firstName}.` };
  }
}
