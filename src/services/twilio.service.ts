import twilio from 'twilio';
import { ServiceError, toError } from '../utils/errors';
import { toE164 } from '../utils/phone';
import { logger } from '../utils/logger';

export type MessageChannel = 'sms' | 'whatsapp';

export interface MessageSender {
  sendMessage(phone: string, body: string, channel: MessageChannel): Promise<string>;
}

export interface TwilioConfig {
  accountSid: string;
  authToken: string;
  smsFrom?: string;
  whatsappFrom?: string;
  retryDelayMs?: number;
}

// Invalid "to" number and unreachable WhatsApp recipient.
const NON_RETRYABLE_CODES = new Set([21211, 21614, 63003]);
const MAX_RETRIES = 3;

function errorCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

function withWhatsAppPrefix(address: string): string {
  return address.startsWith('whatsapp:') ? address : `whatsapp:${toE164(address)}`;
}

export class TwilioService implements MessageSender {
  private client: ReturnType<typeof twilio>;

  constructor(private readonly config: TwilioConfig) {
    if (!config.accountSid || !config.authToken) {
      throw new ServiceError('Twilio', 'init', new Error('Missing Twilio credentials'), false);
    }
    this.client = twilio(config.accountSid, config.authToken);
  }

  async sendMessage(phone: string, body: string, channel: MessageChannel): Promise<string> {
    const from = channel === 'whatsapp' ? this.config.whatsappFrom : this.config.smsFrom;
    if (!from) {
      throw new ServiceError('Twilio', 'sendMessage', new Error(`No sender number configured for ${channel}`), false);
    }

    const to = channel === 'whatsapp' ? withWhatsAppPrefix(phone) : toE164(phone);
    const sender = channel === 'whatsapp' ? withWhatsAppPrefix(from) : from;
    const retryDelayMs = this.config.retryDelayMs ?? 1000;

    for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
      try {
        const result = await this.client.messages.create({ to, from: sender, body });
        logger.info('Message sent', { channel, to, messageSid: result.sid, attempt });
        return result.sid;
      } catch (error) {
        const cause = toError(error);
        const code = errorCode(error);

        if (attempt === MAX_RETRIES || (code !== undefined && NON_RETRYABLE_CODES.has(code))) {
          throw new ServiceError('Twilio', 'sendMessage', cause, false);
        }

        logger.warn('Twilio send failed, retrying', { channel, to, attempt, code, error: cause.message });
        await new Promise((resolve) => setTimeout(resolve, retryDelayMs * Math.pow(2, attempt - 1)));
      }
    }

    throw new Error('Unreachable');
  }
}
