import type { RealtimeCollections } from '../types/snapshot.js';

export function sampleCollections(): RealtimeCollections {
  return {
    plants: [
      {
        name: 'Home',
        metrics: { day_power: 12.5, health_state: 'healthy', online: true },
      },
    ],
    devices: [
      {
        name: 'Home.Inverter',
        metrics: { run_state: 1, active_power: 2.1 },
      },
      {
        name: 'Home.Battery',
        metrics: { ch_discharge_power: -300, battery_soc: 80 },
      },
    ],
  };
}
