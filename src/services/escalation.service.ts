import { DateTime } from 'luxon';
import { EscalationDecision, StatusReporter } from '../types/call';
import { env } from '../config/env';
import { getNextOpening, isWithinBusinessHours } from '../utils/businessHours';
import { endSentence, spokenDateTime } from '../utils/time';
import { logger } from '../utils/logger';
import { HttpStatusReporter } from './status-reporter.service';

export type EscalationSignal = 'human_request' | 'frustration' | 'emergency';

// A request verb followed closely by someone to talk to
const HUMAN_REQUEST_PATTERNS: RegExp[] = [
  /\b(speak|talk|get me|put me through|transfer me|connect me)\b[\w\s']{0,20}?\b(human|person|someone|somebody|manager|supervisor|operator|representative)\b/,
  /\b(real|live) (person|human|agent)\b/,
  /\bhuman agent\b/,
];

const FRUSTRATION_KEYWORDS = [
  'this is ridiculous', 'this is stupid', 'waste of time', 'useless', 'not helping',
  "you're not listening", 'you are not listening', 'terrible', 'horrible', 'awful',
];

const EMERGENCY_KEYWORDS = ['emergency', 'urgent', 'flooding', 'gas leak', 'fire', 'burst pipe'];

function wholePhrase(keyword: string): RegExp {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`);
}

const FRUSTRATION_PATTERNS = FRUSTRATION_KEYWORDS.map(wholePhrase);
const EMERGENCY_PATTERNS = EMERGENCY_KEYWORDS.map(wholePhrase);

export const TRANSFER_MESSAGE = "Of course. Let me connect you with someone from our team. One moment, please.";

export function declineMessage(now: DateTime, timezone: string, contactEmail: string): string {
  const nextOpening = getNextOpening(now, timezone);
  const reopen = nextOpening ? ` We're back ${endSentence(spokenDateTime(nextOpening, now.setZone(timezone)))}` : '';
  return (
    "I'm sorry, there's no one available to take your call right now - our team works Monday to Friday, nine A.M. to six P.M." +
    `${reopen} You can email us at ${contactEmail}, or I can take your details and have someone call you back.`
  );
}

/** Keyword detector for runtimes that have no intent layer of their own. */
export function detectSignal(utterance: string): EscalationSignal | null {
  const text = utterance.toLowerCase();

  if (HUMAN_REQUEST_PATTERNS.some((pattern) => pattern.test(text))) return 'human_request';
  if (EMERGENCY_PATTERNS.some((pattern) => pattern.test(text))) return 'emergency';

  // A single complaint is not enough on its own
  const frustration = FRUSTRATION_PATTERNS.filter((pattern) => pattern.test(text));
  if (frustration.length >= 2) return 'frustration';

  return null;
}

export class EscalationService {
  constructor(
    private reporter: StatusReporter = new HttpStatusReporter(),
    private contactEmail: string = env.FALLBACK_CONTACT_EMAIL
  ) {}

  /**
   * Transfer inside business hours, otherwise decline with a contact channel. Both
   * branches report `escalation_requested`; a failed report never changes the decision.
   */
  async decide(signalDetected: boolean, now: DateTime, timezone: string, callSid: string): Promise<EscalationDecision> {
    if (!signalDetected) {
      return { action: 'continue' };
    }

    const decision: EscalationDecision = isWithinBusinessHours(now, timezone)
      ? { action: 'transfer', message: TRANSFER_MESSAGE }
      : {
          action: 'decline_with_contact',
          message: declineMessage(now, timezone, this.contactEmail),
          contact: this.contactEmail,
        };

    try {
      await this.reporter.report(callSid, 'escalation_requested');
    } catch (error: unknown) {
      logger.warn('Escalation status report failed', {
        callSid,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    logger.info('Escalation decided', { callSid, action: decision.action });
    return decision;
  }
}
