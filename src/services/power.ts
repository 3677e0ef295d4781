import type { MetricSet } from '../types/snapshot.js';
import { deviceRole } from './fusionsolar/device-types.js';

export interface DeviceMetrics {
  devTypeId: number;
  metrics: MetricSet;
}

function numeric(metrics: MetricSet, key: string): number | undefined {
  const value = metrics[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Derives a plant's power flows (W) from its inverter, battery and meter
 * readings. Returns an empty set unless both production and meter are known.
 *
 * Meter sign follows the device: negative while feeding the grid.
 * Battery power is positive while charging.
 */
export function computePlantPower(devices: DeviceMetrics[]): MetricSet {
  let production: number | undefined;
  let charge: number | undefined;
  let discharge: number | undefined;
  let meter: number | undefined;

  for (const device of devices) {
    switch (deviceRole(device.devTypeId)) {
      case 'production': {
        // kW
        const mppt = numeric(device.metrics, 'mppt_power');
        if (mppt !== undefined) production = (production ?? 0) + mppt * 1000;
        break;
      }
      case 'battery': {
        const power = numeric(device.metrics, 'ch_discharge_power');
        if (power !== undefined) {
          charge = (charge ?? 0) + Math.max(power, 0);
          discharge = (discharge ?? 0) + Math.max(-power, 0);
        }
        break;
      }
      case 'meter': {
        const power = numeric(device.metrics, 'active_power');
        if (power !== undefined) meter = (meter ?? 0) + power;
        break;
      }
      default:
        break;
    }
  }

  if (production === undefined || meter === undefined) {
    return {};
  }

  const consumption = production - meter - (charge ?? 0) + (discharge ?? 0);
  const result: MetricSet = {
    power_production: production,
    power_consumption: consumption,
    power_consumption_pv: Math.min(production, consumption + (charge ?? 0)),
  };

  if (charge !== undefined && discharge !== undefined) {
    result.power_ch_battery = charge;
    result.power_dis_battery = discharge;
  }

  return result;
}
