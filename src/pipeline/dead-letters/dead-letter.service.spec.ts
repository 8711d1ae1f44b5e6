import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { IsNull } from 'typeorm';
import { DeadLetter } from '../../database/entities/dead-letter.entity';
import { DeadLetterService } from './dead-letter.service';
import { deadLetterId, InMemoryDeadLetterRepository } from '../../../test/utils/in-memory-dead-letter.repository';

describe('DeadLetterService', () => {
  let service: DeadLetterService;
  let repository: InMemoryDeadLetterRepository;

  beforeEach(async () => {
    repository = new InMemoryDeadLetterRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DeadLetterService,
        { provide: getRepositoryToken(DeadLetter), useValue: repository },
      ],
    }).compile();

    service = module.get<DeadLetterService>(DeadLetterService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('capture', () => {
    it('should persist the envelope with the locator untouched', async () => {
      const envelope = await service.capture(' raw/batch 1.json ', 3, 'Batch not found');

      expect(envelope).toMatchObject({
        id: deadLetterId(1),
        originalBatchLocator: ' raw/batch 1.json ',
        attemptCount: 3,
        lastError: 'Batch not found',
        replayedAt: null,
      });
      expect(envelope.failedAt).toBeInstanceOf(Date);
    });
  });

  describe('list', () => {
    it('should list envelopes newest first', async () => {
      const older = await service.capture('raw/a.json', 3, 'boom');
      const newer = await service.capture('raw/b.json', 3, 'boom');
      older.failedAt = new Date('2025-06-20T10:00:00Z');
      newer.failedAt = new Date('2025-06-20T11:00:00Z');

      const envelopes = await service.list();

      expect(envelopes.map((envelope) => envelope.originalBatchLocator)).toEqual([
        'raw/b.json',
        'raw/a.json',
      ]);
    });

    it('should hide replayed envelopes when only pending ones are asked for', async () => {
      const findSpy = jest.spyOn(repository, 'find');
      const replayed = await service.capture('raw/a.json', 3, 'boom');
      await service.capture('raw/b.json', 3, 'boom');
      await service.markReplayed(replayed);

      const envelopes = await service.list({ pendingOnly: true });

      expect(envelopes.map((envelope) => envelope.originalBatchLocator)).toEqual(['raw/b.json']);
      expect(findSpy).toHaveBeenCalledWith({
        where: { replayedAt: IsNull() },
        order: { failedAt: 'DESC' },
      });
    });
  });

  describe('findById', () => {
    it('should return the envelope or null', async () => {
      const envelope = await service.capture('raw/a.json', 3, 'boom');

      await expect(service.findById(envelope.id)).resolves.toBe(envelope);
      await expect(service.findById(deadLetterId(404))).resolves.toBeNull();
    });
  });

  describe('markReplayed', () => {
    it('should stamp replayedAt', async () => {
      const envelope = await service.capture('raw/a.json', 3, 'boom');

      const replayed = await service.markReplayed(envelope);

      expect(replayed.replayedAt).toBeInstanceOf(Date);
      expect(repository.envelopes).toHaveLength(1);
    });
  });
});
