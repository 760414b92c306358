jest.mock('../../src/utils/logger', () => ({
  logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import { TimeoutReaper } from '../../src/workers/timeout.worker';
import { QualificationStatus } from '../../src/types/conversation';
import { QualificationResult } from '../../src/types/qualification';
import { logger } from '../../src/utils/logger';
import { T0 } from '../helpers/conversations';

function timedOut(phone: string): QualificationResult {
  return {
    success: true,
    status: QualificationStatus.TIMEOUT,
    response: 'Oi! Como não tivemos retorno, vou encerrar este atendimento por aqui.',
    collected_data: {},
    score: 6,
    should_send_to_crm: true,
    crm_data: {
      phone,
      name: 'Não informado',
      status: QualificationStatus.TIMEOUT,
      source: 'ai_qualification',
      priority: 'low',
      tags: ['ai_qualified'],
      custom_fields: { attempts: 1, business_type: 'default' },
      notes: 'Score: 6/100 | Prioridade: LOW',
      qualification_score: 6,
      qualified_at: T0.toISOString(),
      started_at: T0.toISOString(),
    },
    metadata: { phone, reason: 'inactivity' },
  };
}

describe('TimeoutReaper', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should hand every expired conversation to the handler', async () => {
    const results = [timedOut('5511000000001'), timedOut('5511000000002')];
    const engine = { expireConversations: jest.fn().mockResolvedValue(results) };
    const onTimeout = jest.fn();
    const reaper = new TimeoutReaper(engine, onTimeout, 60000, () => T0);

    await expect(reaper.runOnce()).resolves.toBe(2);

    expect(engine.expireConversations).toHaveBeenCalledWith(T0);
    expect(onTimeout.mock.calls).toEqual([[results[0]], [results[1]]]);
  });

  it('should join a sweep that is already running', async () => {
    let finish: (results: QualificationResult[]) => void = () => undefined;
    const engine = {
      expireConversations: jest.fn(
        () =>
          new Promise<QualificationResult[]>((resolve) => {
            finish = resolve;
          })
      ),
    };
    const reaper = new TimeoutReaper(engine, jest.fn());

    const first = reaper.runOnce();
    const second = reaper.runOnce();
    finish([timedOut('5511000000001')]);

    await expect(Promise.all([first, second])).resolves.toEqual([1, 1]);
    expect(engine.expireConversations).toHaveBeenCalledTimes(1);
  });

  it('should keep going when one handoff fails', async () => {
    const engine = {
      expireConversations: jest.fn().mockResolvedValue([timedOut('5511000000001'), timedOut('5511000000002')]),
    };
    const onTimeout = jest.fn().mockRejectedValueOnce(new Error('queue down')).mockResolvedValueOnce(true);
    const reaper = new TimeoutReaper(engine, onTimeout);

    await expect(reaper.runOnce()).resolves.toBe(2);

    expect(onTimeout).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith('Timeout handoff failed', {
      phone: '5511000000001',
      error: 'queue down',
    });
  });

  it('should sweep on every interval until stopped', async () => {
    jest.useFakeTimers();
    const engine = { expireConversations: jest.fn().mockResolvedValue([]) };
    const reaper = new TimeoutReaper(engine, jest.fn(), 1000);

    reaper.start();
    reaper.start();
    expect(reaper.isRunning).toBe(true);

    await jest.advanceTimersByTimeAsync(2500);
    expect(engine.expireConversations).toHaveBeenCalledTimes(2);

    reaper.stop();
    expect(reaper.isRunning).toBe(false);

    await jest.advanceTimersByTimeAsync(5000);
    expect(engine.expireConversations).toHaveBeenCalledTimes(2);
  });
});
