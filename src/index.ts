import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { criteriaFromEnv } from './config/criteria';
import { pool } from './config/database';
import { addLeadHandoffJob, leadHandoffQueue } from './config/queue';
import { createApp } from './app';
import { AIFactory } from './services/ai/ai.factory';
import { QualificationService } from './services/qualification.service';
import { TwilioService } from './services/twilio.service';
import { createLeadHandoffWorker } from './workers/lead-handoff.worker';
import { TimeoutReaper } from './workers/timeout.worker';
import { toError } from './utils/errors';
import { logger } from './utils/logger';
import { closeAll } from './utils/shutdown';

if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

function buildSender(): TwilioService | null {
  if (!env.TWILIO_ACCOUNT_SID || !env.TWILIO_AUTH_TOKEN) {
    logger.warn('Twilio not configured, outbound replies disabled');
    return null;
  }
  return new TwilioService({
    accountSid: env.TWILIO_ACCOUNT_SID,
    authToken: env.TWILIO_AUTH_TOKEN,
    smsFrom: env.TWILIO_PHONE_NUMBER,
    whatsappFrom: env.TWILIO_WHATSAPP_NUMBER,
  });
}

async function start() {
  try {
    const provider = AIFactory.create(env.AI_PROVIDER, {
      apiKey: env.AI_PROVIDER === 'openai' ? env.OPENAI_API_KEY : env.ANTHROPIC_API_KEY,
      organization: env.OPENAI_ORG_ID,
      model: env.AI_PROVIDER === 'openai' ? env.OPENAI_MODEL : env.ANTHROPIC_MODEL,
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      retryDelayMs: env.PROVIDER_RETRY_DELAY_MS,
      maxConcurrency: env.PROVIDER_MAX_CONCURRENCY,
    });

    const engine = new QualificationService({ provider, criteria: criteriaFromEnv(env) });
    const onLeadClosed = addLeadHandoffJob;

    const app = createApp({
      engine,
      sender: buildSender(),
      onLeadClosed,
      beforeErrorHandler: env.SENTRY_DSN ? (instance) => Sentry.setupExpressErrorHandler(instance) : undefined,
    });

    const worker = createLeadHandoffWorker();
    const reaper = new TimeoutReaper(
      engine,
      (result) => (result.crm_data ? onLeadClosed(result.crm_data) : undefined),
      env.REAPER_INTERVAL_MS
    );
    reaper.start();

    const server = app.listen(parseInt(env.PORT, 10), () => {
      logger.info(`Server running on port ${env.PORT}`, {
        env: env.NODE_ENV,
        provider: provider.name,
        model: provider.model,
      });
    });

    const shutdown = async (signal: string) => {
      logger.info('Shutting down', { signal });
      reaper.stop();

      const clean = await closeAll([
        {
          name: 'HTTP server',
          close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
        },
        { name: 'lead handoff worker', close: () => worker.close() },
        { name: 'lead handoff queue', close: () => leadHandoffQueue.close() },
        { name: 'database pool', close: () => pool.end() },
      ]);

      process.exit(clean ? 0 : 1);
    };
    process.once('SIGTERM', (signal) => void shutdown(signal));
    process.once('SIGINT', (signal) => void shutdown(signal));
  } catch (error) {
    logger.error('Failed to start server', { error: toError(error).message });
    process.exit(1);
  }
}

void start();
