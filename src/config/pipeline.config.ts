import { ConfigService } from '@nestjs/config';
import { z } from 'zod';

/**
 * Injection token for the typed pipeline configuration.
 */
export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

/**
 * Classifier thresholds. Passed to the classifier at construction so the
 * same rules can run against different threshold sets side by side.
 */
export interface AnomalyThresholds {
  /** Readings at or above this value (kWh) on either side are implausible */
  maxEnergyKwh: number;
  /** Net energy strictly below this value (kWh) is anomalous */
  minNetEnergyKwh: number;
}

export type AlertChannelKind = 'log' | 'webhook';

export interface PipelineConfig {
  batchRootDir: string;
  thresholds: AnomalyThresholds;
  writeChunkSize: number;
  writeTimeoutMs: number;
  alertTimeoutMs: number;
  maxDeliveryAttempts: number;
  retryBaseDelayMs: number;
  alertChannel: AlertChannelKind;
  alertWebhookUrl: string | null;
}

const envShape = z.object({
  BATCH_ROOT_DIR: z.string().min(1).default('./data/batches'),
  ANOMALY_MAX_ENERGY_KWH: z.coerce.number().positive().default(10000),
  ANOMALY_MIN_NET_ENERGY_KWH: z.coerce.number().default(0),
  WRITE_CHUNK_SIZE: z.coerce.number().int().positive().default(500),
  WRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ALERT_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  MAX_DELIVERY_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  ALERT_CHANNEL: z.enum(['log', 'webhook']).default('log'),
  ALERT_WEBHOOK_URL: z.string().url().optional(),
});

const envSchema = envShape.refine(
  (env) => env.ALERT_CHANNEL !== 'webhook' || env.ALERT_WEBHOOK_URL !== undefined,
  {
    message: 'ALERT_WEBHOOK_URL is required when ALERT_CHANNEL=webhook',
    path: ['ALERT_WEBHOOK_URL'],
  },
);

/**
 * Build the pipeline configuration from the environment.
 *
 * Throws on malformed values instead of falling back to defaults.
 */
export function loadPipelineConfig(configService: ConfigService): PipelineConfig {
  const raw: Record<string, unknown> = {};
  for (const key of Object.keys(envShape.shape)) {
    const value = configService.get<unknown>(key);
    // Empty strings from .env files count as unset
    raw[key] = value === '' ? undefined : value;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid pipeline configuration: ${details}`);
  }

  const env = parsed.data;
  return {
    batchRootDir: env.BATCH_ROOT_DIR,
    thresholds: {
      maxEnergyKwh: env.ANOMALY_MAX_ENERGY_KWH,
      minNetEnergyKwh: env.ANOMALY_MIN_NET_ENERGY_KWH,
    },
    writeChunkSize: env.WRITE_CHUNK_SIZE,
    writeTimeoutMs: env.WRITE_TIMEOUT_MS,
    alertTimeoutMs: env.ALERT_TIMEOUT_MS,
    maxDeliveryAttempts: env.MAX_DELIVERY_ATTEMPTS,
    retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
    alertChannel: env.ALERT_CHANNEL,
    alertWebhookUrl: env.ALERT_WEBHOOK_URL ?? null,
  };
}
