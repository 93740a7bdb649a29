jest.mock('../../src/config/env', () => ({
  env: {
    NODE_ENV: 'production',
    API_KEYS: 'test-key, second-key',
    TWILIO_AUTH_TOKEN: 'test-token',
    WEBHOOK_BASE_URL: 'https://calls.example.com',
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

jest.mock('twilio', () => ({
  validateRequest: (...args: unknown[]) => mockValidateRequest(...args),
}));

import express, { NextFunction, Request, Response } from 'express';
import request from 'supertest';
import { apiKeyAuth, parseApiKeys, requireApiKey } from '../../src/middleware/auth';
import { errorHandler, notFoundHandler } from '../../src/middleware/errorHandler';
import { twilioWebhookValidator, validateTwilioWebhook } from '../../src/middleware/twilio.validator';
import { ConfigurationError, SMSError, ValidationError } from '../../src/utils/errors';

const mockValidateRequest = jest.fn();

function failingApp(error: Error) {
  const app = express();
  app.get('/boom', (_req: Request, _res: Response, next: NextFunction) => next(error));
  app.use(errorHandler);
  return app;
}

describe('apiKeyAuth', () => {
  const app = express();
  app.get('/secure', apiKeyAuth, (_req, res) => res.json({ ok: true }));

  it('accepts any configured key', async () => {
    const res = await request(app).get('/secure').set('x-api-key', 'second-key');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('answers 401 without a key and 403 with a wrong one', async () => {
    expect((await request(app).get('/secure')).status).toBe(401);
    expect((await request(app).get('/secure').set('x-api-key', 'nope')).status).toBe(403);
  });

  it('rejects every key when none are configured', async () => {
    const locked = express();
    locked.get('/secure', requireApiKey([]), (_req, res) => res.json({ ok: true }));

    expect((await request(locked).get('/secure').set('x-api-key', 'test-key')).status).toBe(403);
  });

  it('parses a comma separated key list', () => {
    expect(parseApiKeys(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
    expect(parseApiKeys(undefined)).toEqual([]);
  });
});

describe('validateTwilioWebhook', () => {
  const app = express();
  app.use(express.urlencoded({ extended: false }));
  app.post('/handle-call', validateTwilioWebhook, (_req, res) => res.send('ok'));

  it('rejects requests without a signature', async () => {
    const res = await request(app).post('/handle-call').type('form').send({ CallSid: 'CA123' });

    expect(res.status).toBe(403);
    expect(res.body).toEqual({ error: 'Missing signature' });
  });

  it('checks the signature against the public URL', async () => {
    mockValidateRequest.mockReturnValue(true);

    const res = await request(app)
      .post('/handle-call')
      .set('x-twilio-signature', 'sig')
      .type('form')
      .send({ CallSid: 'CA123' });

    expect(res.status).toBe(200);
    expect(mockValidateRequest).toHaveBeenCalledWith('test-token', 'sig', 'https://calls.example.com/handle-call', {
      CallSid: 'CA123',
    });
  });

  it('can be switched off', async () => {
    const open = express();
    open.post('/handle-call', twilioWebhookValidator({ enabled: false }), (_req, res) => res.send('ok'));

    const res = await request(open).post('/handle-call').type('form').send({ CallSid: 'CA123' });

    expect(res.status).toBe(200);
    expect(mockValidateRequest).not.toHaveBeenCalled();
  });

  it('refuses to validate without an auth token', async () => {
    const unconfigured = express();
    unconfigured.post('/handle-call', twilioWebhookValidator({ enabled: true, authToken: '' }), (_req, res) =>
      res.send('ok')
    );

    const res = await request(unconfigured).post('/handle-call').set('x-twilio-signature', 'sig');

    expect(res.status).toBe(503);
  });

  it('rejects invalid signatures', async () => {
    mockValidateRequest.mockReturnValue(false);

    const res = await request(app)
      .post('/handle-call')
      .set('x-twilio-signature', 'forged')
      .type('form')
      .send({ CallSid: 'CA123' });

    expect(res.status).toBe(403);
    expect(res.body).toEqual({ error: 'Invalid signature' });
  });
});

describe('errorHandler', () => {
  it('maps provider failures to 502', async () => {
    const res = await request(failingApp(new SMSError('twilio', 'sendSMS', new Error('down')))).get('/boom');

    expect(res.status).toBe(502);
    expect(res.body).toEqual({ success: false, error: 'SMS provider error' });
  });

  it('maps missing configuration to 503', async () => {
    const res = await request(failingApp(new ConfigurationError('Google Calendar', 'GOOGLE_CALENDAR_ID'))).get('/boom');

    expect(res.status).toBe(503);
  });

  it('keeps the status of application errors', async () => {
    const res = await request(failingApp(new ValidationError('Bad input'))).get('/boom');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: 'Bad input' });
  });

  it('hides unexpected errors in production', async () => {
    const res = await request(failingApp(new Error('secret detail'))).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, error: 'Internal server error' });
  });

  it('answers 400 for malformed JSON', async () => {
    const app = express();
    app.use(express.json());
    app.post('/report-status', (_req, res) => res.json({ success: true }));
    app.use(errorHandler);

    const res = await request(app).post('/report-status').set('Content-Type', 'application/json').send('{"call_sid":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: 'Malformed JSON body' });
  });
});

describe('notFoundHandler', () => {
  it('answers unknown routes with JSON', async () => {
    const app = express();
    app.use(notFoundHandler);

    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'No route for GET /nope' });
  });
});
