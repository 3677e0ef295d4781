import type { MetricSet, RealtimeCollections } from '../types/snapshot.js';
import { logDebug, logWarn } from '../utils/logger/index.js';
import type { FusionSolarApi } from './fusionsolar/client.js';
import { supportsRealtime } from './fusionsolar/device-types.js';
import type { DataItemMap } from './fusionsolar/schemas.js';
import type { DeviceInfo, PlantInfo } from './inventory.js';
import { computePlantPower, type DeviceMetrics } from './power.js';

const COMPONENT = 'Realtime';

const HEALTH_STATES: Record<number, string> = {
  1: 'disconnected',
  2: 'faulty',
  3: 'healthy',
};

/** Drops the items FusionSolar reports as null */
export function toMetricSet(items: DataItemMap): MetricSet {
  const metrics: MetricSet = {};
  for (const [key, value] of Object.entries(items)) {
    if (value !== null) metrics[key] = value;
  }
  return metrics;
}

export function plantMetrics(items: DataItemMap): MetricSet {
  const { real_health_state: health, ...rest } = items;
  const metrics = toMetricSet(rest);
  const code = typeof health === 'string' && health.trim() !== '' ? Number(health) : health;
  const state = typeof code === 'number' ? HEALTH_STATES[code] : undefined;
  if (state) {
    metrics.health_state = state;
  } else if (health !== null && health !== undefined) {
    metrics.real_health_state = health;
  }
  return metrics;
}

export function deviceEntityName(plant: PlantInfo, device: DeviceInfo): string {
  return `${plant.name}.${device.name}`;
}

/**
 * Current readings for every plant and every supported device of the
 * inventory. Client errors propagate unchanged.
 */
export async function fetchRealtimeData(
  api: FusionSolarApi,
  plants: PlantInfo[]
): Promise<RealtimeCollections> {
  const plantKpis = new Map(
    (await api.getPlantRealtimeKpi(plants.map((plant) => plant.code))).map(
      (record) => [record.stationCode, record.dataItemMap]
    )
  );

  const devicesByType = new Map<number, DeviceInfo[]>();
  for (const device of plants.flatMap((plant) => plant.devices)) {
    if (!supportsRealtime(device.devTypeId)) {
      logDebug(COMPONENT, `Skipping ${device.name}: no realtime data for type ${device.devTypeId}`);
      continue;
    }
    const group = devicesByType.get(device.devTypeId) ?? [];
    group.push(device);
    devicesByType.set(device.devTypeId, group);
  }

  const deviceKpis = new Map<number, MetricSet>();
  for (const [devTypeId, devices] of devicesByType) {
    const records = await api.getDeviceRealtimeKpi(
      devTypeId,
      devices.map((device) => device.id)
    );
    for (const record of records) {
      deviceKpis.set(record.devId, toMetricSet(record.dataItemMap));
    }
  }

  const result: RealtimeCollections = { plants: [], devices: [] };

  for (const plant of plants) {
    const readings: DeviceMetrics[] = [];
    for (const device of plant.devices) {
      const metrics = deviceKpis.get(device.id);
      if (!metrics) continue;
      readings.push({ devTypeId: device.devTypeId, metrics });
      result.devices.push({ name: deviceEntityName(plant, device), metrics });
    }

    const items = plantKpis.get(plant.code);
    if (!items) {
      logWarn(COMPONENT, `No realtime data returned for plant ${plant.name}`);
      continue;
    }
    result.plants.push({
      name: plant.name,
      metrics: { ...plantMetrics(items), ...computePlantPower(readings) },
    });
  }

  return result;
}
