import { CallStatus, StatusReporter } from '../types/call';
import { env } from '../config/env';
import { ExternalServiceError, toError } from '../utils/errors';
import { logger } from '../utils/logger';

/** Posts the agent's final call status to the call-routing webhook. */
export class HttpStatusReporter implements StatusReporter {
  constructor(
    private baseUrl: string = env.WEBHOOK_BASE_URL,
    private apiKey: string | undefined = env.STATUS_API_KEY,
    private send: typeof fetch = (input, init) => fetch(input, init)
  ) {}

  async report(callSid: string, status: CallStatus): Promise<void> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/report-status`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }

    let res: Awaited<ReturnType<typeof fetch>>;
    try {
      res = await this.send(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ call_sid: callSid, status }),
      });
    } catch (error: unknown) {
      throw new ExternalServiceError('StatusWebhook', 'report', toError(error));
    }

    if (!res.ok) {
      throw new ExternalServiceError('StatusWebhook', 'report', new Error(`HTTP ${res.status}`), res.status >= 500);
    }

    logger.info('Call status reported', { callSid, status });
  }
}
