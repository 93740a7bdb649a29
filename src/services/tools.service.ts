import { DateTime } from 'luxon';
import { BookingResult, ReminderPreference, Slot, SlotOffer, SlotPreferences } from '../types/booking';
import { EscalationDecision } from '../types/call';
import { logger } from '../utils/logger';
import { CallContext } from './call-session.service';
import { BookingService } from './booking.service';
import { validateContact } from './contact.service';
import { CONTACT_FIELDS, DialogueField, DialogueState } from './dialogue-state.service';
import { detectSignal, EscalationService } from './escalation.service';
import { LeadResult, LeadService } from './leads.service';
import { generateSlots } from './slot.service';

export interface ToolDependencies {
  leads: Pick<LeadService, 'saveLead'>;
  booking: Pick<BookingService, 'finalize'>;
  escalation: Pick<EscalationService, 'decide'>;
  clock: () => DateTime;
}

export interface DetailsInput {
  name?: string;
  phone?: string;
  email?: string;
  topic?: string;
  reminderPreference?: ReminderPreference;
}

export interface BookingInput {
  summary?: string;
  description?: string;
  reminderPreference?: ReminderPreference;
  callerConfirmed: boolean;
}

export interface DetailsReply {
  message: string;
  missing: DialogueField[];
}

export interface SlotChoiceReply {
  message: string;
  slot: Slot | null;
}

export interface BookingReply {
  status: 'needs_info' | 'needs_confirmation' | 'finished';
  message: string;
  result?: BookingResult;
}

export interface EscalationReply {
  message: string;
  decision: EscalationDecision;
  endSession: boolean;
}

export const REMINDER_QUESTION =
  'Would you like a reminder before the appointment by email, text message, both, or no reminder?';

const TEXT_FIELDS: ('name' | 'phone' | 'email' | 'topic')[] = ['name', 'phone', 'email', 'topic'];

/**
 * Tool surface one call hands to the voice runtime. Every tool returns the text the
 * assistant should say next.
 */
export class CallTools {
  private deps: ToolDependencies;

  constructor(
    private context: CallContext,
    deps: Partial<ToolDependencies> = {}
  ) {
    this.deps = {
      leads: deps.leads ?? new LeadService(),
      booking: deps.booking ?? new BookingService(),
      escalation: deps.escalation ?? new EscalationService(),
      clock: deps.clock ?? (() => DateTime.now().setZone(context.timezone)),
    };
  }

  private get state(): DialogueState {
    return this.context.state;
  }

  private now(): DateTime {
    return this.deps.clock().setZone(this.context.timezone);
  }

  rememberDetails(details: DetailsInput): DetailsReply {
    for (const field of TEXT_FIELDS) {
      const value = details[field]?.trim();
      if (value) this.state.set(field, value);
    }
    if (details.reminderPreference) {
      this.state.set('reminderPreference', details.reminderPreference);
    }

    const missing = this.state.missing(CONTACT_FIELDS);
    return {
      missing,
      message: missing.length > 0 ? `Noted. Still needed: ${missing.join(', ')}.` : 'Noted. I have everything I need.',
    };
  }

  /** Saves the caller as a lead once name, phone and email all pass validation. */
  async saveContactInfo(details: Pick<DetailsInput, 'name' | 'phone' | 'email'>): Promise<LeadResult> {
    this.rememberDetails(details);
    const result = await this.deps.leads.saveLead(this.state.contact());

    // Flagged values are dropped so the caller is asked for them again
    for (const issue of result.issues) {
      if (issue.problem !== 'missing') this.state.unset(issue.field);
    }

    return result;
  }

  checkAvailableTimeSlots(prefs: SlotPreferences): SlotOffer {
    const offer = generateSlots(prefs, this.now());
    this.state.setSlots(offer.slots);
    return offer;
  }

  chooseSlot(choice: string): SlotChoiceReply {
    if (this.state.slots().length === 0) {
      return { slot: null, message: 'Let me check which times we have available first.' };
    }

    const slot = this.state.resolveSlot(choice);
    if (!slot) {
      return { slot: null, message: 'Sorry, which of those times would you like?' };
    }

    this.state.set('chosenSlot', slot);
    return { slot, message: `Great, ${slot.label} it is.` };
  }

  async bookAppointment(input: BookingInput): Promise<BookingReply> {
    if (input.reminderPreference) {
      this.state.set('reminderPreference', input.reminderPreference);
    }

    const validation = validateContact(this.state.contact());
    if (!validation.complete) {
      return { status: 'needs_info', message: validation.issues[0].prompt };
    }

    const slot = this.state.get('chosenSlot');
    if (!slot) {
      return { status: 'needs_info', message: 'Which time would work best for you? I can check what we have available.' };
    }

    const reminderPreference = this.state.get('reminderPreference');
    if (!reminderPreference) {
      return { status: 'needs_info', message: REMINDER_QUESTION };
    }

    const { name, phone, email } = this.state.contact();
    const attendee = { name: name ?? '', phone: phone ?? '', email: email ?? '' };
    const summary = input.summary?.trim() || this.state.get('topic') || `Meeting with ${attendee.name}`;

    if (!input.callerConfirmed) {
      return {
        status: 'needs_confirmation',
        message: `Just to confirm: "${summary}" ${slot.label}, for ${attendee.name}, phone ${attendee.phone}, email ${attendee.email}. Shall I book that?`,
      };
    }

    const result = await this.deps.booking.finalize({
      summary,
      start: slot.start,
      end: slot.end,
      attendee,
      reminderPreference,
      description: input.description,
    });

    if (result.booked) {
      this.state.unset('chosenSlot');
      this.state.setSlots([]);
    }

    logger.info('Booking tool finished', { callSid: this.context.callSid, booked: result.booked });
    return { status: 'finished', message: result.message, result };
  }

  /**
   * With no explicit flag the runtime called the tool on purpose, unless an utterance is
   * given and the keyword detector finds nothing in it.
   */
  async requestHumanAgent(utterance?: string, signalDetected?: boolean): Promise<EscalationReply> {
    const signal = signalDetected ?? (utterance === undefined ? true : detectSignal(utterance) !== null);
    const decision = await this.deps.escalation.decide(signal, this.now(), this.context.timezone, this.context.callSid);

    if (decision.action === 'continue') {
      return { decision, endSession: false, message: "Of course, I'm happy to keep helping. What else can I do for you?" };
    }

    return { decision, endSession: decision.action === 'transfer', message: decision.message };
  }
}
