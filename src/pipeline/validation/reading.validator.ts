import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { parseIsoInstant } from '../../common/date.utils';
import { ValidatedReading } from '../interfaces/pipeline.types';

/** JSON number, or a string holding one ("12.5", " 3 ", "1e3") */
const NUMERIC_STRING = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;

const energyValue = z
  .union([z.number(), z.string().trim().regex(NUMERIC_STRING, 'must be numeric').transform(Number)], {
    errorMap: (_issue, ctx) => ({
      message: ctx.data === undefined ? 'is required' : 'must be numeric',
    }),
  })
  .pipe(
    z
      .number()
      .finite({ message: 'must be finite' })
      .nonnegative({ message: 'must not be negative' }),
  );

/**
 * Wire shape of one batch entry.
 */
export const rawReadingSchema = z.object(
  {
    site_id: z
      .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
      .trim()
      .min(1, 'must not be empty')
      .max(64, 'must be at most 64 characters'),
    timestamp: z
      .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
      .refine((value) => parseIsoInstant(value) !== null, {
        message: 'must be an ISO-8601 instant with a UTC designator or offset',
      }),
    energy_generated_kwh: energyValue,
    energy_consumed_kwh: energyValue,
  },
  { required_error: 'must be an object', invalid_type_error: 'must be an object' },
);

export type RawReading = z.input<typeof rawReadingSchema>;

export type ReadingValidationResult =
  | { ok: true; index: number; reading: ValidatedReading }
  | { ok: false; index: number; errors: string[] };

export interface BatchValidationSummary {
  /** One entry per input entry, in input order */
  results: ReadingValidationResult[];
  valid: ValidatedReading[];
  skipped: number;
}

/**
 * Thrown when the payload as a whole is not a list of entries.
 */
export class MalformedBatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedBatchError';
  }
}

/**
 * ReadingValidator - turns untrusted batch entries into typed readings
 *
 * Skip-and-count: a malformed entry fails only itself. The rest of the
 * batch is unaffected and the number of skipped entries is reported back.
 */
@Injectable()
export class ReadingValidator {
  validateBatch(payload: unknown): BatchValidationSummary {
    if (!Array.isArray(payload)) {
      throw new MalformedBatchError(
        `Batch payload must be a JSON array, received ${payload === null ? 'null' : typeof payload}`,
      );
    }

    const results = payload.map((entry: unknown, index) =>
      this.validateEntry(entry, index),
    );
    const valid: ValidatedReading[] = [];
    for (const result of results) {
      if (result.ok) {
        valid.push(result.reading);
      }
    }

    return { results, valid, skipped: results.length - valid.length };
  }

  validateEntry(entry: unknown, index: number): ReadingValidationResult {
    const parsed = rawReadingSchema.safeParse(entry);
    if (!parsed.success) {
      return {
        ok: false,
        index,
        errors: parsed.error.issues.map(
          (issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'entry'} ${issue.message}`,
        ),
      };
    }

    const data = parsed.data;
    const instant = parseIsoInstant(data.timestamp);
    if (instant === null) {
      return { ok: false, index, errors: ['timestamp must be an ISO-8601 instant'] };
    }

    return {
      ok: true,
      index,
      reading: {
        siteId: data.site_id,
        timestamp: instant.toISOString(),
        energyGeneratedKwh: data.energy_generated_kwh,
        energyConsumedKwh: data.energy_consumed_kwh,
      },
    };
  }
}
