#!/usr/bin/env npx ts-node
/**
 * Mock Batch Generator
 *
 * Writes one batch of readings for a fixed set of sites into BATCH_ROOT_DIR:
 * - 5-15 readings per site, stepping back 15 seconds from now
 * - 10% chance per site that all of its readings are anomalous
 *   (consumption above generation, or generation at the ceiling)
 *
 * Usage:
 *   npm run generate:batch
 *   npm run generate:batch -- --deliver http://localhost:3000
 *
 * With --deliver, the batch locator is POSTed to <url>/intake afterwards.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

const SITES = [
  'site-alpha-pv-farm-01',
  'site-beta-wind-turbine-03',
  'site-gamma-hydro-plant-01',
  'site-delta-solar-roof-02',
  'site-epsilon-geothermal-01',
];

const READING_INTERVAL_MS = 15_000;
const ANOMALY_CHANCE = 0.1;
const CEILING_KWH = Number(process.env.ANOMALY_MAX_ENERGY_KWH ?? 10000);

interface MockReading {
  site_id: string;
  timestamp: string;
  energy_generated_kwh: number;
  energy_consumed_kwh: number;
}

function randomBetween(min: number, max: number): number {
  return min + Math.random() * (max - min);
}

function randomInt(min: number, max: number): number {
  return Math.floor(randomBetween(min, max + 1));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function generateEnergy(anomalous: boolean): {
  generated: number;
  consumed: number;
} {
  if (!anomalous) {
    const generated = randomBetween(50, 500);
    return { generated, consumed: randomBetween(10, generated * 0.8) };
  }
  if (Math.random() < 0.5) {
    // Net energy below zero
    const generated = randomBetween(10, 50);
    return { generated, consumed: randomBetween(60, 120) };
  }
  return { generated: CEILING_KWH, consumed: randomBetween(10, 100) };
}

function generateSiteReadings(siteId: string, now: Date): MockReading[] {
  const count = randomInt(5, 15);
  const anomalous = Math.random() < ANOMALY_CHANCE;
  const readings: MockReading[] = [];

  for (let i = 0; i < count; i++) {
    const { generated, consumed } = generateEnergy(anomalous);
    readings.push({
      site_id: siteId,
      timestamp: new Date(now.getTime() - i * READING_INTERVAL_MS).toISOString(),
      energy_generated_kwh: round2(generated),
      energy_consumed_kwh: round2(consumed),
    });
  }

  console.log(
    `  ${siteId}: ${count} readings${anomalous ? ' (anomalous)' : ''}`,
  );
  return readings;
}

function batchFileName(now: Date): string {
  // 2025-06-20T10:00:00.000Z -> 2025-06-20-10-00-00
  const stamp = now
    .toISOString()
    .slice(0, 19)
    .replace('T', '-')
    .replace(/:/g, '-');
  return `energy_data_${stamp}.json`;
}

function parseDeliverUrl(argv: string[]): string | null {
  const index = argv.indexOf('--deliver');
  if (index === -1) {
    return null;
  }
  const url = argv[index + 1];
  if (!url) {
    throw new Error('--deliver requires a base URL');
  }
  return url.replace(/\/+$/, '');
}

async function deliver(baseUrl: string, locator: string): Promise<void> {
  console.log(`\nDelivering ${locator} to ${baseUrl}/intake...`);
  const response = await fetch(`${baseUrl}/intake`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ batch_locator: locator, delivery_attempt: 1 }),
  });
  const body = await response.text();
  if (!response.ok) {
    throw new Error(`Intake responded with ${response.status}: ${body}`);
  }
  console.log(`Intake responded with ${response.status}: ${body}`);
}

async function generateBatch(): Promise<void> {
  const rootDir = process.env.BATCH_ROOT_DIR ?? './data/batches';
  const deliverUrl = parseDeliverUrl(process.argv.slice(2));
  const now = new Date();

  console.log(`Generating readings for ${SITES.length} sites...`);
  const readings = SITES.flatMap((siteId) => generateSiteReadings(siteId, now));

  const locator = `raw/${batchFileName(now)}`;
  await mkdir(join(rootDir, 'raw'), { recursive: true });
  await writeFile(join(rootDir, locator), JSON.stringify(readings, null, 2));

  console.log(`\n========================================`);
  console.log(`Readings written: ${readings.length}`);
  console.log(`Batch locator: ${locator}`);
  console.log(`========================================`);

  if (deliverUrl) {
    await deliver(deliverUrl, locator);
  }
}

void (async () => {
  try {
    await generateBatch();
    process.exit(0);
  } catch (error) {
    console.error('Batch generation failed:', error);
    process.exit(1);
  }
})();
