export type SMSProvider = 'twilio' | 'bandwidth';

export interface SMSAdapter {
  readonly provider: SMSProvider;
  sendSMS(to: string, message: string): Promise<void>;
}

export interface SMSConfig {
  provider: SMSProvider;
  credentials: Record<string, string | undefined>;
  /** Base delay between send attempts; doubles on each retry. */
  retryDelayMs?: number;
}

export const SMS_MAX_ATTEMPTS = 3;

export function backoff(baseMs: number, attempt: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, baseMs * Math.pow(2, attempt - 1)));
}
