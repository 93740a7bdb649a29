jest.mock('../../src/config/env', () => ({
  env: {
    NODE_ENV: 'test',
    BUSINESS_TIMEZONE: 'Europe/Paris',
    FALLBACK_CONTACT_EMAIL: 'help@example.com',
    WEBHOOK_BASE_URL: 'https://calls.example.com',
    STATUS_API_KEY: 'test-key',
  },
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { DateTime } from 'luxon';
import { detectSignal, EscalationService, TRANSFER_MESSAGE } from '../../src/services/escalation.service';
import { HttpStatusReporter } from '../../src/services/status-reporter.service';
import { logger } from '../../src/utils/logger';

const ZONE = 'Europe/Paris';

describe('EscalationService', () => {
  const reporter = { report: jest.fn() };
  let service: EscalationService;

  beforeEach(() => {
    reporter.report.mockResolvedValue(undefined);
    service = new EscalationService(reporter, 'help@example.com');
  });

  it('transfers on a Tuesday at 10:00', async () => {
    const tuesday = DateTime.fromISO('2026-10-20T10:00:00', { zone: ZONE });

    const decision = await service.decide(true, tuesday, ZONE, 'CA123');

    expect(decision).toEqual({ action: 'transfer', message: TRANSFER_MESSAGE });
    expect(reporter.report).toHaveBeenCalledWith('CA123', 'escalation_requested');
  });

  it('declines with a contact channel on a Saturday at 10:00', async () => {
    const saturday = DateTime.fromISO('2026-10-24T10:00:00', { zone: ZONE });

    const decision = await service.decide(true, saturday, ZONE, 'CA123');

    expect(decision).toEqual({
      action: 'decline_with_contact',
      contact: 'help@example.com',
      message:
        "I'm sorry, there's no one available to take your call right now - our team works Monday to Friday, nine A.M. to six P.M. We're back Monday at nine A.M. You can email us at help@example.com, or I can take your details and have someone call you back.",
    });
    expect(reporter.report).toHaveBeenCalledWith('CA123', 'escalation_requested');
  });

  it('declines after closing time on a weekday', async () => {
    const evening = DateTime.fromISO('2026-10-20T18:30:00', { zone: ZONE });

    const decision = await service.decide(true, evening, ZONE, 'CA123');

    expect(decision.action).toBe('decline_with_contact');
    expect(decision.action === 'decline_with_contact' && decision.message).toContain("We're back tomorrow at nine A.M.");
  });

  it('continues without reporting when no signal was detected', async () => {
    const tuesday = DateTime.fromISO('2026-10-20T10:00:00', { zone: ZONE });

    expect(await service.decide(false, tuesday, ZONE, 'CA123')).toEqual({ action: 'continue' });
    expect(reporter.report).not.toHaveBeenCalled();
  });

  it('keeps the decision when the status report fails', async () => {
    reporter.report.mockRejectedValueOnce(new Error('webhook down'));
    const tuesday = DateTime.fromISO('2026-10-20T10:00:00', { zone: ZONE });

    const decision = await service.decide(true, tuesday, ZONE, 'CA123');

    expect(decision.action).toBe('transfer');
    expect(logger.warn).toHaveBeenCalledWith('Escalation status report failed', {
      callSid: 'CA123',
      error: 'webhook down',
    });
  });
});

describe('detectSignal', () => {
  it('detects explicit requests for a human', () => {
    expect(detectSignal('Can I talk to a person please?')).toBe('human_request');
    expect(detectSignal('Get me your MANAGER')).toBe('human_request');
  });

  it('detects emergencies', () => {
    expect(detectSignal('There is a gas leak in the kitchen')).toBe('emergency');
  });

  it('needs two frustration cues', () => {
    expect(detectSignal('this is useless')).toBeNull();
    expect(detectSignal('this is ridiculous and useless')).toBe('frustration');
  });

  it('ignores ordinary questions', () => {
    expect(detectSignal('What are your opening hours?')).toBeNull();
  });

  it('matches whole words only', () => {
    expect(detectSignal('Does the plan include a firewall?')).toBeNull();
    expect(detectSignal('There is a fire in the office')).toBe('emergency');
  });

  it('needs someone to talk to after a request verb', () => {
    expect(detectSignal('Is the property manager included?')).toBeNull();
    expect(detectSignal('Can you connect me with pricing info?')).toBeNull();
    expect(detectSignal('Can you connect me with someone in sales?')).toBe('human_request');
    expect(detectSignal("I'd like to speak to a real person")).toBe('human_request');
  });
});

describe('HttpStatusReporter', () => {
  const mockFetch = jest.fn();

  it('posts the status with the API key', async () => {
    mockFetch.mockResolvedValue({ ok: true, status: 200 });

    await new HttpStatusReporter('https://calls.example.com/', 'test-key', mockFetch).report('CA123', 'escalation_requested');

    expect(mockFetch).toHaveBeenCalledWith('https://calls.example.com/report-status', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-api-key': 'test-key' },
      body: JSON.stringify({ call_sid: 'CA123', status: 'escalation_requested' }),
    });
  });

  it('rejects on a non-2xx response', async () => {
    mockFetch.mockResolvedValue({ ok: false, status: 500 });

    await expect(
      new HttpStatusReporter('https://calls.example.com', 'test-key', mockFetch).report('CA123', 'escalation_requested')
    ).rejects.toThrow('StatusWebhook.report failed: HTTP 500');
  });
});
