import { AnomalyThresholds } from '../../config/pipeline.config';
import { ClassificationError } from '../interfaces/pipeline.errors';

export type AnomalyRule =
  | 'NET_ENERGY_BELOW_MINIMUM'
  | 'GENERATION_AT_CEILING'
  | 'CONSUMPTION_AT_CEILING';

export interface Classification {
  netEnergyKwh: number;
  anomaly: boolean;
  /** Rules that fired, in evaluation order */
  rules: AnomalyRule[];
  /** Human-readable explanation, null when no rule fired */
  reason: string | null;
}

/**
 * Pure anomaly rules.
 *
 * A reading is anomalous when:
 * - net energy (generated - consumed) is below `minNetEnergyKwh`
 *   (default 0: consumption exceeds generation), or
 * - either input is at or above `maxEnergyKwh` (implausible sensor value)
 */
export function classify(
  generatedKwh: number,
  consumedKwh: number,
  thresholds: AnomalyThresholds,
): Classification {
  if (!Number.isFinite(generatedKwh) || !Number.isFinite(consumedKwh)) {
    throw new ClassificationError(
      `Cannot classify non-finite energy values (generated=${generatedKwh}, consumed=${consumedKwh})`,
    );
  }

  const netEnergyKwh = generatedKwh - consumedKwh;
  if (!Number.isFinite(netEnergyKwh)) {
    throw new ClassificationError(
      `Net energy is not finite (generated=${generatedKwh}, consumed=${consumedKwh})`,
    );
  }

  const rules: AnomalyRule[] = [];
  const details: string[] = [];

  if (netEnergyKwh < thresholds.minNetEnergyKwh) {
    rules.push('NET_ENERGY_BELOW_MINIMUM');
    details.push(
      `net energy ${netEnergyKwh} kWh is below ${thresholds.minNetEnergyKwh} kWh`,
    );
  }
  if (generatedKwh >= thresholds.maxEnergyKwh) {
    rules.push('GENERATION_AT_CEILING');
    details.push(
      `generated energy ${generatedKwh} kWh reaches the ${thresholds.maxEnergyKwh} kWh ceiling`,
    );
  }
  if (consumedKwh >= thresholds.maxEnergyKwh) {
    rules.push('CONSUMPTION_AT_CEILING');
    details.push(
      `consumed energy ${consumedKwh} kWh reaches the ${thresholds.maxEnergyKwh} kWh ceiling`,
    );
  }

  return {
    netEnergyKwh,
    anomaly: rules.length > 0,
    rules,
    reason: details.length > 0 ? details.join('; ') : null,
  };
}

/**
 * AnomalyClassifier - binds the pure rules to one threshold set
 *
 * Registered through a factory provider that reads PipelineConfig.
 */
export class AnomalyClassifier {
  constructor(private readonly thresholds: AnomalyThresholds) {}

  classify(generatedKwh: number, consumedKwh: number): Classification {
    return classify(generatedKwh, consumedKwh, this.thresholds);
  }
}
