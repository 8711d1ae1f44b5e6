import { AlertEvent } from '../interfaces/pipeline.types';

/**
 * Wire payload published for one alert.
 */
export interface AlertPayload {
  subject: string;
  site_id: string;
  timestamp: string;
  energy_generated_kwh: number;
  energy_consumed_kwh: number;
  net_energy_kwh: number;
  reason: string;
}

export function toAlertPayload(alert: AlertEvent): AlertPayload {
  return {
    subject: `Anomaly Detected for Site: ${alert.siteId}`,
    site_id: alert.siteId,
    timestamp: alert.timestamp,
    energy_generated_kwh: alert.energyGeneratedKwh,
    energy_consumed_kwh: alert.energyConsumedKwh,
    net_energy_kwh: alert.netEnergyKwh,
    reason: alert.reason,
  };
}

/**
 * NotificationChannel - outbound transport for alerts
 *
 * `publish` resolves once the channel has accepted the alert and rejects
 * otherwise. Delivery beyond acceptance is the channel's responsibility.
 */
export abstract class NotificationChannel {
  abstract readonly name: string;

  abstract publish(alert: AlertEvent): Promise<void>;
}
