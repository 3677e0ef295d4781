import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { FusionSolarApi } from '../services/fusionsolar/client.js';
import { loadInventory, type PlantInfo } from '../services/inventory.js';

function fakeApi(): FusionSolarApi {
  return {
    getPlantList: vi.fn(async () => [
      { plantCode: 'NE=1', plantName: 'Home' },
      { plantCode: 'NE=2', plantName: 'Barn' },
    ]),
    getDeviceList: vi.fn(async () => [
      { id: 11, devName: 'Inverter', stationCode: 'NE=1', devTypeId: 38, esnCode: 'ESN11' },
      { id: 21, devName: 'Meter', stationCode: 'NE=2', devTypeId: 47, esnCode: 'ESN21' },
    ]),
    getPlantRealtimeKpi: vi.fn(async () => []),
    getDeviceRealtimeKpi: vi.fn(async () => []),
  };
}

const EXPECTED: PlantInfo[] = [
  {
    code: 'NE=1',
    name: 'Home',
    devices: [{ id: 11, name: 'Inverter', devTypeId: 38, esnCode: 'ESN11' }],
  },
  {
    code: 'NE=2',
    name: 'Barn',
    devices: [{ id: 21, name: 'Meter', devTypeId: 47, esnCode: 'ESN21' }],
  },
];

describe('loadInventory', () => {
  let dir: string;
  let deviceFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fusionsolar-devices-'));
    deviceFile = join(dir, 'devices.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should request plants and devices and save them', async () => {
    const api = fakeApi();

    const plants = await loadInventory(api, deviceFile);

    expect(plants).toEqual(EXPECTED);
    expect(api.getDeviceList).toHaveBeenCalledWith(['NE=1', 'NE=2']);
    expect(JSON.parse(await readFile(deviceFile, 'utf8'))).toEqual(EXPECTED);
  });

  it('should use the device file when it exists', async () => {
    await writeFile(deviceFile, JSON.stringify(EXPECTED), 'utf8');
    const api = fakeApi();

    const plants = await loadInventory(api, deviceFile);

    expect(plants).toEqual(EXPECTED);
    expect(api.getPlantList).not.toHaveBeenCalled();
  });

  it('should replace a device file that cannot be read', async () => {
    await writeFile(deviceFile, '{ not json', 'utf8');
    const api = fakeApi();

    const plants = await loadInventory(api, deviceFile);

    expect(plants).toEqual(EXPECTED);
    expect(api.getPlantList).toHaveBeenCalledTimes(1);
    expect(JSON.parse(await readFile(deviceFile, 'utf8'))).toEqual(EXPECTED);
  });

  it('should replace a device file with an unexpected shape', async () => {
    await writeFile(deviceFile, JSON.stringify([{ code: 'NE=1' }]), 'utf8');
    const api = fakeApi();

    await loadInventory(api, deviceFile);

    expect(api.getPlantList).toHaveBeenCalledTimes(1);
  });
});
