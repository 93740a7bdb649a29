jest.mock('twilio', () => jest.fn(() => ({ messages: { create: mockCreate } })));

jest.mock('@bandwidth/messaging', () => ({
  Client: jest.fn(),
  ApiController: jest.fn().mockImplementation(() => ({ createMessage: mockCreateMessage })),
}));

jest.mock('../../src/config/env', () => ({
  env: {
    NODE_ENV: 'test',
    SMS_PROVIDER: 'twilio',
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

import { SMSError } from '../../src/utils/errors';
import { TwilioAdapter } from '../../src/services/sms/twilio.adapter';
import { BandwidthAdapter } from '../../src/services/sms/bandwidth.adapter';
import { SMSFactory } from '../../src/services/sms/sms.factory';

const mockCreate = jest.fn();
const mockCreateMessage = jest.fn();

const twilioCredentials = {
  TWILIO_ACCOUNT_SID: 'AC-test',
  TWILIO_AUTH_TOKEN: 'test-token',
  TWILIO_PHONE_NUMBER: '+15550000000',
};

const bandwidthCredentials = {
  BANDWIDTH_ACCOUNT_ID: 'account',
  BANDWIDTH_API_TOKEN: 'test-token',
  BANDWIDTH_API_SECRET: 'test-secret',
  BANDWIDTH_APPLICATION_ID: 'app',
  BANDWIDTH_PHONE_NUMBER: '+15550000001',
};

describe('SMS Adapters', () => {
  it('factory returns Twilio adapter', () => {
    const adapter = SMSFactory.create({ provider: 'twilio', credentials: twilioCredentials });

    expect(adapter).toBeInstanceOf(TwilioAdapter);
    expect(adapter.provider).toBe('twilio');
  });

  it('factory returns Bandwidth adapter', () => {
    const adapter = SMSFactory.create({ provider: 'bandwidth', credentials: bandwidthCredentials });

    expect(adapter).toBeInstanceOf(BandwidthAdapter);
  });

  it('rejects incomplete credentials', () => {
    expect(() =>
      SMSFactory.create({
        provider: 'twilio',
        credentials: { TWILIO_ACCOUNT_SID: 'AC-test', TWILIO_AUTH_TOKEN: 'test-token' },
      })
    ).toThrow(SMSError);
  });

  it('fromEnv returns null when the provider is not configured', () => {
    expect(SMSFactory.fromEnv()).toBeNull();
  });

  it('twilio adapter retries and succeeds', async () => {
    mockCreate
      .mockRejectedValueOnce(new Error('fail1'))
      .mockRejectedValueOnce(new Error('fail2'))
      .mockResolvedValueOnce({ sid: 'SM123' });

    const adapter = new TwilioAdapter({ provider: 'twilio', credentials: twilioCredentials, retryDelayMs: 0 });

    await adapter.sendSMS('+15551234567', 'hello');

    expect(mockCreate).toHaveBeenCalledTimes(3);
    expect(mockCreate).toHaveBeenLastCalledWith({ to: '+15551234567', from: '+15550000000', body: 'hello' });
  });

  it('twilio adapter throws SMSError after three attempts', async () => {
    mockCreate.mockRejectedValue(new Error('fail'));

    const adapter = new TwilioAdapter({ provider: 'twilio', credentials: twilioCredentials, retryDelayMs: 0 });

    await expect(adapter.sendSMS('+15551234567', 'hello')).rejects.toBeInstanceOf(SMSError);
    expect(mockCreate).toHaveBeenCalledTimes(3);
  });

  it('bandwidth adapter sends message', async () => {
    mockCreateMessage.mockResolvedValue({ result: { id: 'msg' } });

    const adapter = new BandwidthAdapter({ provider: 'bandwidth', credentials: bandwidthCredentials });

    await adapter.sendSMS('+15551234567', 'hello');

    expect(mockCreateMessage).toHaveBeenCalledWith('account', {
      applicationId: 'app',
      to: ['+15551234567'],
      from: '+15550000001',
      text: 'hello',
    });
  });
});
