import { Queue } from 'bullmq';
import { env } from './env';
import { CRMLeadData } from '../types/qualification';
import { toError } from '../utils/errors';
import { logger } from '../utils/logger';

export const QUEUE_NAMES = {
  LEAD_HANDOFF: 'lead-handoff',
} as const;

export interface RedisConnection {
  host: string;
  port: number;
  password?: string;
  tls?: Record<string, never>;
}

export function parseRedisUrl(redisUrl: string): RedisConnection {
  const url = new URL(redisUrl);
  const connection: RedisConnection = {
    host: url.hostname,
    port: url.port ? Number(url.port) : 6379,
    password: url.password ? decodeURIComponent(url.password) : undefined,
  };
  if (url.protocol === 'rediss:') {
    connection.tls = {};
  }
  return connection;
}

export const connection = parseRedisUrl(env.REDIS_URL);

export interface LeadHandoffJobData {
  crmData: CRMLeadData;
}

export const leadHandoffQueue = new Queue<LeadHandoffJobData>(QUEUE_NAMES.LEAD_HANDOFF, {
  connection,
  defaultJobOptions: {
    attempts: 3,
    backoff: { type: 'exponential', delay: 2000 },
    removeOnComplete: 100,
    removeOnFail: 500,
  },
});

leadHandoffQueue.on('error', (err) => {
  logger.error('Lead handoff queue error', { error: err.message });
});

/** Queues a closed lead for persistence. Failures are logged, never thrown. */
export async function addLeadHandoffJob(crmData: CRMLeadData): Promise<boolean> {
  try {
    await leadHandoffQueue.add('handoff', { crmData }, { jobId: `${crmData.phone}-${Date.parse(crmData.qualified_at)}` });
    logger.info('Lead handoff job queued', { phone: crmData.phone, status: crmData.status });
    return true;
  } catch (error) {
    logger.error('Failed to queue lead handoff job', { phone: crmData.phone, error: toError(error).message });
    return false;
  }
}
