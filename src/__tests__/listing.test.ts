import { describe, it, expect } from 'vitest';
import { formatListing } from '../services/listing.js';
import { flattenCollections } from '../services/snapshot.js';
import { sampleCollections } from './fixtures.js';

describe('formatListing', () => {
  it('should print one aligned line per metric under the root topic', () => {
    const output = formatListing('fusionsolar', flattenCollections(sampleCollections()));

    expect(output.split('\n')).toEqual([
      'fusionsolar:',
      '  devices/Home.Battery/battery_soc       : 80',
      '  devices/Home.Battery/ch_discharge_power: -300',
      '  devices/Home.Inverter/active_power     : 2.1',
      '  devices/Home.Inverter/run_state        : 1',
      '  plants/Home/day_power                  : 12.5',
      '  plants/Home/health_state               : healthy',
      '  plants/Home/online                     : true',
    ]);
  });

  it('should print only the root topic for an empty snapshot', () => {
    expect(formatListing('solar', { plants: {}, devices: {} })).toBe('solar:');
  });
});
