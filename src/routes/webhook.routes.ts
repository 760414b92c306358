import { Router, Request, Response, NextFunction } from 'express';
import twilio from 'twilio';
import { z } from 'zod';
import { QualificationService } from '../services/qualification.service';
import { MessageSender } from '../services/twilio.service';
import { validateTwilioWebhook } from '../middleware/twilio.validator';
import { CRMLeadData, QualificationResult } from '../types/qualification';
import { ValidationError, toError } from '../utils/errors';
import { normalizePhone } from '../utils/phone';
import { logger } from '../utils/logger';

export type LeadClosedHandler = (crmData: CRMLeadData) => Promise<unknown>;

export interface WebhookRouterDeps {
  engine: QualificationService;
  sender?: MessageSender | null;
  onLeadClosed: LeadClosedHandler;
}

const whatsappSchema = z.object({
  phone: z.string().min(1),
  message: z.string().min(1).max(5000),
  name: z.string().max(255).optional(),
});

const twilioInboundSchema = z.object({
  From: z.string().min(1),
  Body: z.string().max(5000).default(''),
  ProfileName: z.string().optional(),
});

export async function forwardClosedLead(result: QualificationResult, onLeadClosed: LeadClosedHandler): Promise<void> {
  if (!result.should_send_to_crm || !result.crm_data) return;

  try {
    await onLeadClosed(result.crm_data);
  } catch (error) {
    logger.error('Failed to forward closed lead', { phone: result.crm_data.phone, error: toError(error).message });
  }
}

function emptyTwiml(res: Response) {
  res.type('text/xml').send(new twilio.twiml.MessagingResponse().toString());
}

export function createWebhookRouter(deps: WebhookRouterDeps): Router {
  const router = Router();

  router.post('/whatsapp', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = whatsappSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join(', '));
      }

      const { phone, message, name } = parsed.data;
      const result = await deps.engine.processMessage(phone, message, { name, channel: 'whatsapp' });

      if (!result.success) {
        return res.status(400).json({ success: false, error: result.metadata.error });
      }

      await forwardClosedLead(result, deps.onLeadClosed);

      let delivered = false;
      const to = normalizePhone(phone);
      if (deps.sender && to && result.response) {
        try {
          await deps.sender.sendMessage(to, result.response, 'whatsapp');
          delivered = true;
        } catch (error) {
          logger.error('WhatsApp reply delivery failed', { phone: to, error: toError(error).message });
        }
      }

      res.json({
        success: true,
        status: result.status,
        response: result.response,
        score: result.score,
        should_send_to_crm: result.should_send_to_crm,
        delivered,
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ success: false, error: error.message });
      }
      next(error);
    }
  });

  // Twilio posts form-encoded bodies and reads the reply from TwiML.
  router.post('/sms', validateTwilioWebhook, async (req: Request, res: Response) => {
    try {
      const parsed = twilioInboundSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Missing From or Body' });
      }

      const { From: from, Body: body, ProfileName: name } = parsed.data;
      const channel = from.startsWith('whatsapp:') ? 'whatsapp' : 'sms';
      logger.info('Inbound message received', { from, channel });

      const result = await deps.engine.processMessage(from, body, { name, channel });
      await forwardClosedLead(result, deps.onLeadClosed);

      const twiml = new twilio.twiml.MessagingResponse();
      if (result.success && result.response) {
        twiml.message(result.response);
      }
      res.type('text/xml').send(twiml.toString());
    } catch (error) {
      logger.error('Twilio webhook error', { error: toError(error).message });
      // Always 200 to Twilio to prevent retries
      emptyTwiml(res);
    }
  });

  return router;
}
