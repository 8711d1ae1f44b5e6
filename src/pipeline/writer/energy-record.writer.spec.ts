import { Test, TestingModule } from '@nestjs/testing';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/pipeline.config';
import { EnergyRecordStore } from '../../storage/energy-record.store';
import { RecordWriteError } from '../interfaces/pipeline.errors';
import { EnergyRecordWriter } from './energy-record.writer';
import { InMemoryEnergyRecordStore } from '../../../test/utils/in-memory-energy-record.store';
import { classifiedRecord, createTestConfig } from '../../../test/utils/mock-data';

describe('EnergyRecordWriter', () => {
  let store: InMemoryEnergyRecordStore;

  async function createWriter(
    overrides: Partial<PipelineConfig> = {},
  ): Promise<EnergyRecordWriter> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EnergyRecordWriter,
        { provide: EnergyRecordStore, useValue: store },
        { provide: PIPELINE_CONFIG, useValue: createTestConfig(overrides) },
      ],
    }).compile();

    return module.get<EnergyRecordWriter>(EnergyRecordWriter);
  }

  beforeEach(() => {
    store = new InMemoryEnergyRecordStore();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('upsert', () => {
    it('should store the record under its natural key', async () => {
      const writer = await createWriter();

      const outcome = await writer.upsert(classifiedRecord());

      expect(outcome.ok).toBe(true);
      expect(store.rows.get('site-alpha@2025-06-20T10:00:00.000Z')).toEqual({
        siteId: 'site-alpha',
        timestamp: new Date('2025-06-20T10:00:00.000Z'),
        energyGeneratedKwh: 100,
        energyConsumedKwh: 40,
        netEnergyKwh: 60,
        anomaly: false,
      });
    });

    it('should leave the store unchanged when the same record is written twice', async () => {
      const writer = await createWriter();

      await writer.upsert(classifiedRecord());
      const before = [...store.rows.entries()];
      await writer.upsert(classifiedRecord());

      expect([...store.rows.entries()]).toEqual(before);
    });

    it('should overwrite an existing key with the new values', async () => {
      const writer = await createWriter();

      await writer.upsert(classifiedRecord());
      await writer.upsert(classifiedRecord({ energyConsumedKwh: 120, netEnergyKwh: -20, anomaly: true }));

      expect(store.rows.size).toBe(1);
      expect(store.rows.get('site-alpha@2025-06-20T10:00:00.000Z')?.anomaly).toBe(true);
    });

    it('should report a store failure as RecordWriteError', async () => {
      const writer = await createWriter();
      store.failWhen = () => true;

      const outcome = await writer.upsert(classifiedRecord());

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(RecordWriteError);
        expect(outcome.error.message).toBe(
          'Failed to write site-alpha@2025-06-20T10:00:00.000Z: store unavailable for site-alpha',
        );
      }
    });

    it('should report a write that exceeds the timeout', async () => {
      const writer = await createWriter({ writeTimeoutMs: 10 });
      jest.spyOn(store, 'upsertRows').mockReturnValue(new Promise<void>(() => {}));

      const outcome = await writer.upsert(classifiedRecord());

      expect(outcome.ok || outcome.error.message).toBe(
        'Failed to write site-alpha@2025-06-20T10:00:00.000Z: upsert site-alpha@2025-06-20T10:00:00.000Z timed out after 10ms',
      );
    });
  });

  describe('upsertMany', () => {
    const at = (minute: number) =>
      `2025-06-20T10:${String(minute).padStart(2, '0')}:00.000Z`;

    it('should write in chunks of the configured size', async () => {
      const writer = await createWriter({ writeChunkSize: 2 });
      const records = [0, 1, 2, 3, 4].map((minute) => classifiedRecord({ timestamp: at(minute) }));

      const outcomes = await writer.upsertMany(records);

      expect(store.upsertCalls.map((rows) => rows.length)).toEqual([2, 2, 1]);
      expect(outcomes.every((outcome) => outcome.ok)).toBe(true);
      expect(store.rows.size).toBe(5);
    });

    it('should retry a failed chunk record by record and report each outcome', async () => {
      const writer = await createWriter();
      store.failWhen = (row) => row.siteId === 'site-broken';
      const records = [
        classifiedRecord({ timestamp: at(0) }),
        classifiedRecord({ siteId: 'site-broken', timestamp: at(1) }),
        classifiedRecord({ timestamp: at(2) }),
      ];

      const outcomes = await writer.upsertMany(records);

      expect(outcomes.map((outcome) => outcome.ok)).toEqual([true, false, true]);
      expect(outcomes.map((outcome) => outcome.record)).toEqual(records);
      expect(store.upsertCalls.map((rows) => rows.length)).toEqual([3, 1, 1, 1]);
      expect(store.rows.size).toBe(2);
    });

    it('should let the last record win when keys repeat', async () => {
      const writer = await createWriter();
      const first = classifiedRecord();
      const second = classifiedRecord({ energyConsumedKwh: 150, netEnergyKwh: -50, anomaly: true });

      const outcomes = await writer.upsertMany([first, second]);

      expect(store.upsertCalls).toHaveLength(1);
      expect(store.upsertCalls[0]).toHaveLength(1);
      expect(store.rows.get('site-alpha@2025-06-20T10:00:00.000Z')?.netEnergyKwh).toBe(-50);
      expect(outcomes).toEqual([
        { ok: true, record: first, superseded: true },
        { ok: true, record: second },
      ]);
    });

    it('should not touch the store for an empty list', async () => {
      const writer = await createWriter();

      await expect(writer.upsertMany([])).resolves.toEqual([]);
      expect(store.upsertCalls).toHaveLength(0);
    });
  });
});
