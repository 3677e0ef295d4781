import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { logError, logInfo } from '../utils/logger/index.js';
import type { FusionSolarApi } from './fusionsolar/client.js';

const COMPONENT = 'Inventory';

const deviceInfoSchema = z.object({
  id: z.number(),
  name: z.string(),
  devTypeId: z.number(),
  esnCode: z.string().nullish(),
});

const plantInfoSchema = z.object({
  code: z.string(),
  name: z.string(),
  devices: z.array(deviceInfoSchema),
});

const inventorySchema = z.array(plantInfoSchema);

export type DeviceInfo = z.infer<typeof deviceInfoSchema>;
export type PlantInfo = z.infer<typeof plantInfoSchema>;

async function readInventoryFile(deviceFile: string): Promise<PlantInfo[] | undefined> {
  let text: string;
  try {
    text = await readFile(deviceFile, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }

  try {
    const parsed = inventorySchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data;
    logError(COMPONENT, `Unable to read file ${deviceFile}`, parsed.error);
  } catch (error) {
    logError(COMPONENT, `Unable to read file ${deviceFile}`, error);
  }
  return undefined;
}

export async function requestInventory(api: FusionSolarApi): Promise<PlantInfo[]> {
  const plants = await api.getPlantList();
  const devices = await api.getDeviceList(plants.map((plant) => plant.plantCode));

  return plants.map((plant) => ({
    code: plant.plantCode,
    name: plant.plantName,
    devices: devices
      .filter((device) => device.stationCode === plant.plantCode)
      .map((device) => ({
        id: device.id,
        name: device.devName,
        devTypeId: device.devTypeId,
        esnCode: device.esnCode,
      })),
  }));
}

/**
 * Plants and their devices, from the device file when it holds a valid list,
 * otherwise from FusionSolar (and then saved to the device file).
 */
export async function loadInventory(
  api: FusionSolarApi,
  deviceFile: string
): Promise<PlantInfo[]> {
  const cached = await readInventoryFile(deviceFile);
  if (cached) {
    logInfo(COMPONENT, `Reading list of devices from file ${deviceFile}`);
    logInfo(COMPONENT, 'Remove this file if you want to refresh the list of devices');
    return cached;
  }

  logInfo(COMPONENT, 'Requesting list of devices');
  const plants = await requestInventory(api);
  await writeFile(deviceFile, `${JSON.stringify(plants, null, 2)}\n`, 'utf8');
  logInfo(COMPONENT, `Saved ${plants.length} plants to ${deviceFile}`);
  return plants;
}
