import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { QualificationService } from '../services/qualification.service';
import { QualificationStatus } from '../types/conversation';
import { QualificationResult } from '../types/qualification';
import { NotFoundError, ValidationError } from '../utils/errors';
import { forwardClosedLead, LeadClosedHandler } from './webhook.routes';

export interface QualificationRouterDeps {
  engine: QualificationService;
  onLeadClosed: LeadClosedHandler;
}

const endSchema = z.object({
  reason: z.string().min(1).max(500).default('manual'),
  status: z
    .enum([
      QualificationStatus.QUALIFIED,
      QualificationStatus.DISQUALIFIED,
      QualificationStatus.ESCALATED,
      QualificationStatus.TIMEOUT,
    ])
    .default(QualificationStatus.DISQUALIFIED),
});

const escalateSchema = z.object({
  reason: z.string().min(1).max(500).default('manual'),
});

const testMessageSchema = z.object({
  phone: z.string().min(1),
  message: z.string().min(1).max(5000),
  name: z.string().max(255).optional(),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join(', '));
  }
  return parsed.data;
}

export function createQualificationRouter(deps: QualificationRouterDeps): Router {
  const router = Router();
  const { engine } = deps;

  const sendClosing = async (res: Response, result: QualificationResult | null) => {
    if (!result) {
      throw new NotFoundError('Conversation not found');
    }
    if (!result.success) {
      return res.status(409).json({ success: false, error: result.metadata.error, status: result.status });
    }
    await forwardClosedLead(result, deps.onLeadClosed);
    res.json(result);
  };

  router.get('/stats', (_req: Request, res: Response) => {
    const stats = engine.getStats();
    const total = Object.values(stats).reduce((sum, count) => sum + count, 0);
    res.json({ success: true, total, stats, provider: engine.getProviderStats() });
  });

  router.get('/conversations/active', (_req: Request, res: Response) => {
    const conversations = engine.listActive();
    res.json({ success: true, count: conversations.length, conversations });
  });

  router.get('/conversations/:phone', (req: Request, res: Response, next: NextFunction) => {
    const conversation = engine.getConversation(String(req.params.phone));
    if (!conversation) {
      return next(new NotFoundError('Conversation not found'));
    }
    res.json({ success: true, conversation });
  });

  router.post('/conversations/:phone/end', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { reason, status } = parseBody(endSchema, req.body);
      await sendClosing(res, await engine.endConversation(String(req.params.phone), reason, status));
    } catch (error) {
      next(error);
    }
  });

  router.post('/conversations/:phone/escalate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { reason } = parseBody(escalateSchema, req.body);
      await sendClosing(res, await engine.escalate(String(req.params.phone), reason));
    } catch (error) {
      next(error);
    }
  });

  router.post('/test', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { phone, message, name } = parseBody(testMessageSchema, req.body);
      const result = await engine.processMessage(phone, message, { name, channel: 'test' });
      if (!result.success) {
        return res.status(400).json({ success: false, error: result.metadata.error });
      }
      await forwardClosedLead(result, deps.onLeadClosed);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/config', (_req: Request, res: Response) => {
    res.json({ success: true, criteria: engine.getCriteria() });
  });

  router.put('/config', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, criteria: engine.updateCriteria(req.body) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/health', async (_req: Request, res: Response) => {
    const healthy = await engine.healthCheck();
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      provider: engine.getProviderStats(),
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
