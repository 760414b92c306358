import { Job, Worker } from 'bullmq';
import { connection, LeadHandoffJobData, QUEUE_NAMES } from '../config/queue';
import { DatabaseService } from '../services/database.service';
import { toError } from '../utils/errors';
import { logger } from '../utils/logger';

export type LeadHandoffJob = Pick<Job<LeadHandoffJobData>, 'id' | 'data'>;

export async function processLeadHandoff(
  job: LeadHandoffJob,
  db: DatabaseService = new DatabaseService()
): Promise<number | null> {
  const { crmData } = job.data;

  logger.info('Lead handoff job started', { jobId: job.id, phone: crmData.phone, status: crmData.status });

  try {
    const leadId = await db.createLead(crmData);

    if (leadId === null) {
      logger.info('Lead handoff skipped: already stored', { jobId: job.id, phone: crmData.phone });
    } else {
      logger.info('Lead handoff completed', { jobId: job.id, phone: crmData.phone, leadId });
    }

    return leadId;
  } catch (error) {
    logger.error('Lead handoff failed', { jobId: job.id, phone: crmData.phone, error: toError(error).message });
    throw error; // Re-throw for BullMQ retry
  }
}

export function createLeadHandoffWorker(): Worker<LeadHandoffJobData> {
  const db = new DatabaseService();
  const worker = new Worker<LeadHandoffJobData>(QUEUE_NAMES.LEAD_HANDOFF, (job) => processLeadHandoff(job, db), {
    connection,
    concurrency: 5,
  });

  worker.on('completed', (job) => {
    logger.debug('Lead handoff job completed', { jobId: job.id });
  });

  worker.on('failed', (job, err) => {
    logger.error('Lead handoff job failed', {
      jobId: job?.id,
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Lead handoff worker error', { error: err.message });
  });

  return worker;
}
