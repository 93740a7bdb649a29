import { ExpiringKeyValue, redisKeyValue } from '../config/redis';
import { CallStatus } from '../types/call';
import { logger } from '../utils/logger';

const STATUS_TTL = 3600; // 1 hour
const KEY_PREFIX = 'call-status:';

const CALL_STATUSES: readonly CallStatus[] = ['in_progress', 'escalation_requested', 'completed_normally'];

export function isCallStatus(value: unknown): value is CallStatus {
  return typeof value === 'string' && CALL_STATUSES.some((status) => status === value);
}

/** Final call status reported by the agent, read back when Twilio ends the stream. */
export class CallStatusStore {
  constructor(private store: ExpiringKeyValue = redisKeyValue) {}

  async set(callSid: string, status: CallStatus): Promise<void> {
    await this.store.set(`${KEY_PREFIX}${callSid}`, status, STATUS_TTL);
    logger.info('Call status stored', { callSid, status });
  }

  /** Unknown or unreadable status reads as a normal completion. */
  async get(callSid: string): Promise<CallStatus> {
    try {
      const value = await this.store.get(`${KEY_PREFIX}${callSid}`);
      return isCallStatus(value) ? value : 'completed_normally';
    } catch (error: unknown) {
      logger.warn('Call status read failed', {
        callSid,
        error: error instanceof Error ? error.message : String(error),
      });
      return 'completed_normally';
    }
  }

  async clear(callSid: string): Promise<void> {
    try {
      await this.store.del(`${KEY_PREFIX}${callSid}`);
    } catch (error: unknown) {
      logger.warn('Call status clear failed', {
        callSid,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
