import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import * as asyncUtils from '../common/async.utils';
import { PIPELINE_CONFIG } from '../config/pipeline.config';
import { DeadLetter } from '../database/entities/dead-letter.entity';
import { BatchProcessorService } from './batch-processor.service';
import { DeadLetterService } from './dead-letters/dead-letter.service';
import { DeliveryService } from './delivery.service';
import { BatchProcessingError } from './interfaces/pipeline.errors';
import { BatchIntakeEvent, BatchResult } from './interfaces/pipeline.types';
import { deadLetterId, InMemoryDeadLetterRepository } from '../../test/utils/in-memory-dead-letter.repository';
import { createTestConfig } from '../../test/utils/mock-data';

function batchResult(event: BatchIntakeEvent, settled: boolean): BatchResult {
  return {
    batchLocator: event.batchLocator,
    deliveryAttempt: event.deliveryAttempt,
    state: settled ? 'SETTLED' : 'FAILED',
    transitions: ['RECEIVED', 'VALIDATING', 'CLASSIFYING', 'WRITING', settled ? 'SETTLED' : 'FAILED'],
    recordsReceived: 2,
    recordsValid: 2,
    recordsSkipped: 0,
    recordsUnclassifiable: 0,
    recordsWritten: settled ? 2 : 1,
    recordsFailed: settled ? 0 : 1,
    anomalies: 0,
    alertsSent: 0,
    alertsFailed: 0,
    errors: [],
    durationMs: 1,
  };
}

const failing = (event: BatchIntakeEvent): Promise<BatchResult> =>
  Promise.reject(
    new BatchProcessingError('1 of 2 records failed to write', batchResult(event, false)),
  );

const settling = (event: BatchIntakeEvent): Promise<BatchResult> =>
  Promise.resolve(batchResult(event, true));

describe('DeliveryService', () => {
  let service: DeliveryService;
  let repository: InMemoryDeadLetterRepository;
  let mockProcessor: { process: jest.Mock<Promise<BatchResult>, [BatchIntakeEvent]> };

  beforeEach(async () => {
    repository = new InMemoryDeadLetterRepository();
    mockProcessor = { process: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DeliveryService,
        DeadLetterService,
        { provide: BatchProcessorService, useValue: mockProcessor },
        { provide: getRepositoryToken(DeadLetter), useValue: repository },
        { provide: PIPELINE_CONFIG, useValue: createTestConfig({ retryBaseDelayMs: 100 }) },
      ],
    }).compile();

    service = module.get<DeliveryService>(DeliveryService);
    jest.spyOn(asyncUtils, 'sleep').mockResolvedValue(undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('deliver', () => {
    it('should return the result of a batch that settles on the first attempt', async () => {
      mockProcessor.process.mockImplementation(settling);

      const outcome = await service.deliver({ batchLocator: 'raw/batch-1.json', deliveryAttempt: 1 });

      expect(outcome.outcome).toBe('settled');
      expect(outcome.attempts).toBe(1);
      expect(mockProcessor.process).toHaveBeenCalledTimes(1);
      expect(repository.envelopes).toHaveLength(0);
    });

    it('should redeliver the whole batch until it settles', async () => {
      mockProcessor.process
        .mockImplementationOnce(failing)
        .mockImplementationOnce(failing)
        .mockImplementation(settling);

      const outcome = await service.deliver({ batchLocator: 'raw/batch-1.json', deliveryAttempt: 1 });

      expect(outcome).toMatchObject({ outcome: 'settled', attempts: 3 });
      expect(mockProcessor.process.mock.calls.map(([event]) => event)).toEqual([
        { batchLocator: 'raw/batch-1.json', deliveryAttempt: 1 },
        { batchLocator: 'raw/batch-1.json', deliveryAttempt: 2 },
        { batchLocator: 'raw/batch-1.json', deliveryAttempt: 3 },
      ]);
    });

    it('should back off exponentially between attempts', async () => {
      mockProcessor.process.mockImplementation(failing);

      await service.deliver({ batchLocator: 'raw/batch-1.json', deliveryAttempt: 1 });

      expect(jest.mocked(asyncUtils.sleep).mock.calls).toEqual([[100], [200]]);
    });

    it('should dead-letter the original locator once the budget is spent', async () => {
      mockProcessor.process.mockImplementation(failing);
      const locator = 'raw/energy data #7 (ü).json';

      const outcome = await service.deliver({ batchLocator: locator, deliveryAttempt: 1 });

      expect(mockProcessor.process).toHaveBeenCalledTimes(3);
      expect(outcome.outcome).toBe('dead_lettered');
      expect(repository.envelopes).toHaveLength(1);
      expect(repository.envelopes[0]).toMatchObject({
        id: deadLetterId(1),
        originalBatchLocator: locator,
        attemptCount: 3,
        lastError: '1 of 2 records failed to write',
        replayedAt: null,
      });
      if (outcome.outcome === 'dead_lettered') {
        expect(outcome.deadLetter).toBe(repository.envelopes[0]);
        expect(outcome.result?.state).toBe('DEAD_LETTERED');
        expect(outcome.result?.transitions.slice(-2)).toEqual(['FAILED', 'DEAD_LETTERED']);
      }
    });

    it('should only use the remaining budget for a redelivered event', async () => {
      mockProcessor.process.mockImplementation(failing);

      const outcome = await service.deliver({ batchLocator: 'raw/batch-1.json', deliveryAttempt: 3 });

      expect(mockProcessor.process).toHaveBeenCalledTimes(1);
      expect(outcome.attempts).toBe(3);
      expect(repository.envelopes[0].attemptCount).toBe(3);
    });

    it('should dead-letter without a result when the failure carries none', async () => {
      mockProcessor.process.mockRejectedValue(new Error('unexpected'));

      const outcome = await service.deliver({ batchLocator: 'raw/batch-1.json', deliveryAttempt: 1 });

      expect(outcome).toMatchObject({ outcome: 'dead_lettered', result: null });
      expect(repository.envelopes[0].lastError).toBe('unexpected');
    });
  });

  describe('replay', () => {
    it('should redeliver the dead-lettered batch from attempt 1 and mark it replayed', async () => {
      mockProcessor.process.mockImplementation(failing);
      await service.deliver({ batchLocator: 'raw/batch-1.json', deliveryAttempt: 1 });
      mockProcessor.process.mockReset();
      mockProcessor.process.mockImplementation(settling);

      const outcome = await service.replay(deadLetterId(1));

      expect(outcome.outcome).toBe('settled');
      expect(mockProcessor.process).toHaveBeenCalledWith({
        batchLocator: 'raw/batch-1.json',
        deliveryAttempt: 1,
      });
      expect(repository.envelopes[0].replayedAt).toBeInstanceOf(Date);
    });

    it('should leave the envelope pending and capture a new one when the replay fails', async () => {
      mockProcessor.process.mockImplementation(failing);
      await service.deliver({ batchLocator: 'raw/batch-1.json', deliveryAttempt: 1 });

      const outcome = await service.replay(deadLetterId(1));

      expect(outcome.outcome).toBe('dead_lettered');
      expect(repository.envelopes.map((envelope) => envelope.id)).toEqual([deadLetterId(1), deadLetterId(2)]);
      expect(repository.envelopes[0].replayedAt).toBeNull();
    });

    it('should throw NotFoundException for an unknown envelope', async () => {
      await expect(service.replay(deadLetterId(404))).rejects.toThrow(NotFoundException);
      expect(mockProcessor.process).not.toHaveBeenCalled();
    });
  });
});
