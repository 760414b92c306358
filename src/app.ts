import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { createWebhookRouter, LeadClosedHandler } from './routes/webhook.routes';
import { createQualificationRouter } from './routes/qualification.routes';
import { QualificationService } from './services/qualification.service';
import { MessageSender } from './services/twilio.service';

export interface AppDeps {
  engine: QualificationService;
  sender?: MessageSender | null;
  onLeadClosed: LeadClosedHandler;
  /** Installed before the final error handler, e.g. Sentry's. */
  beforeErrorHandler?: (app: Express) => void;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  // Twilio posts form-encoded; the WhatsApp bridge posts JSON
  app.use('/webhook', express.urlencoded({ extended: false }));
  app.use(express.json());

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Auth (skips webhooks and health)
  app.use(apiKeyAuth);

  app.use('/webhook', createWebhookRouter(deps));
  app.use('/api/ai', createQualificationRouter(deps));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  deps.beforeErrorHandler?.(app);
  app.use(errorHandler);

  return app;
}
