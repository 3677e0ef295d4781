/**
 * FusionSolar device type ids that /getDevRealKpi answers for.
 */
export const REALTIME_DEVICE_TYPES: ReadonlyMap<number, string> = new Map([
  [1, 'String inverter'],
  [10, 'EMI'],
  [17, 'Grid meter'],
  [38, 'Residential inverter'],
  [39, 'Battery'],
  [41, 'C&I and utility ESS'],
  [47, 'Power sensor'],
  [60001, 'Mains'],
  [60003, 'Genset'],
  [60010, 'AC output power distribution'],
  [60014, 'Lithium battery rack'],
  [60043, 'SSU group'],
  [60044, 'SSU'],
  [60092, 'Power converter'],
]);

export type DeviceRole = 'production' | 'battery' | 'meter';

const DEVICE_ROLES: ReadonlyMap<number, DeviceRole> = new Map([
  [1, 'production'],
  [38, 'production'],
  [39, 'battery'],
  [17, 'meter'],
  [47, 'meter'],
]);

export function supportsRealtime(devTypeId: number): boolean {
  return REALTIME_DEVICE_TYPES.has(devTypeId);
}

export function deviceRole(devTypeId: number): DeviceRole | undefined {
  return DEVICE_ROLES.get(devTypeId);
}
