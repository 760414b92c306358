jest.mock('../../src/utils/logger', () => ({
  logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

const mockCreate = jest.fn();

jest.mock('twilio', () => ({
  __esModule: true,
  default: jest.fn(() => ({
    messages: { create: (...args: unknown[]) => mockCreate(...args) },
  })),
}));

import twilio from 'twilio';
import { TwilioService } from '../../src/services/twilio.service';
import { ServiceError } from '../../src/utils/errors';

const credentials = { accountSid: 'ACtest', authToken: 'test-token', retryDelayMs: 0 };

describe('TwilioService', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('should refuse to start without credentials', () => {
    expect(() => new TwilioService({ accountSid: '', authToken: 'test-token' })).toThrow(ServiceError);
  });

  it('should build the client from the account credentials', () => {
    new TwilioService(credentials);

    expect(twilio).toHaveBeenCalledWith('ACtest', 'test-token');
  });

  it('should prefix both WhatsApp addresses', async () => {
    mockCreate.mockResolvedValue({ sid: 'SM123' });
    const service = new TwilioService({ ...credentials, whatsappFrom: '+5511900000000' });

    await expect(service.sendMessage('5511999990000', 'Olá!', 'whatsapp')).resolves.toBe('SM123');

    expect(mockCreate).toHaveBeenCalledWith({
      to: 'whatsapp:+5511999990000',
      from: 'whatsapp:+5511900000000',
      body: 'Olá!',
    });
  });

  it('should send SMS in E.164 form', async () => {
    mockCreate.mockResolvedValue({ sid: 'SM456' });
    const service = new TwilioService({ ...credentials, smsFrom: '+15550001111' });

    await service.sendMessage('5511999990000', 'Olá!', 'sms');

    expect(mockCreate).toHaveBeenCalledWith({ to: '+5511999990000', from: '+15550001111', body: 'Olá!' });
  });

  it('should fail when the channel has no sender number', async () => {
    const service = new TwilioService({ ...credentials, smsFrom: '+15550001111' });

    await expect(service.sendMessage('5511999990000', 'Olá!', 'whatsapp')).rejects.toThrow(
      'Twilio.sendMessage failed: No sender number configured for whatsapp'
    );
    expect(mockCreate).not.toHaveBeenCalled();
  });

  it('should retry transient failures', async () => {
    mockCreate.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce({ sid: 'SM789' });
    const service = new TwilioService({ ...credentials, smsFrom: '+15550001111' });

    await expect(service.sendMessage('5511999990000', 'Olá!', 'sms')).resolves.toBe('SM789');
    expect(mockCreate).toHaveBeenCalledTimes(2);
  });

  it('should not retry an invalid recipient', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('Invalid To number'), { code: 21211 }));
    const service = new TwilioService({ ...credentials, smsFrom: '+15550001111' });

    await expect(service.sendMessage('5511999990000', 'Olá!', 'sms')).rejects.toThrow(
      'Twilio.sendMessage failed: Invalid To number'
    );
    expect(mockCreate).toHaveBeenCalledTimes(1);
  });

  it('should give up after three attempts', async () => {
    mockCreate.mockRejectedValue(new Error('service unavailable'));
    const service = new TwilioService({ ...credentials, smsFrom: '+15550001111' });

    await expect(service.sendMessage('5511999990000', 'Olá!', 'sms')).rejects.toBeInstanceOf(ServiceError);
    expect(mockCreate).toHaveBeenCalledTimes(3);
  });
});
