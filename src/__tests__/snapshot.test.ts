import { describe, it, expect } from 'vitest';
import { flattenCollections, toMetricRecords, topicPath } from '../services/snapshot.js';
import { TopicCollisionError } from '../utils/errors.js';
import { sampleCollections } from './fixtures.js';

describe('flattenCollections', () => {
  it('should nest metrics by category and entity', () => {
    const snapshot = flattenCollections(sampleCollections());

    expect(snapshot).toEqual({
      plants: {
        Home: { day_power: 12.5, health_state: 'healthy', online: true },
      },
      devices: {
        'Home.Inverter': { run_state: 1, active_power: 2.1 },
        'Home.Battery': { ch_discharge_power: -300, battery_soc: 80 },
      },
    });
  });

  it('should be deterministic for the same input', () => {
    const first = flattenCollections(sampleCollections());
    const second = flattenCollections(sampleCollections());

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('should keep both categories when they are empty', () => {
    expect(flattenCollections({ plants: [], devices: [] })).toEqual({
      plants: {},
      devices: {},
    });
  });

  it('should reject two entities with the same name', () => {
    const collections = sampleCollections();
    collections.plants.push({ name: 'Home', metrics: {} });

    expect(() => flattenCollections(collections)).toThrow(TopicCollisionError);
    expect(() => flattenCollections(collections)).toThrow(
      'Duplicate topic path in snapshot: plants/Home'
    );
  });

  it('should reject names that render to an existing topic path', () => {
    expect(() =>
      flattenCollections({
        plants: [
          { name: 'Roof/East', metrics: { power: 1 } },
          { name: 'Roof', metrics: { 'East/power': 2 } },
        ],
        devices: [],
      })
    ).toThrow('Duplicate topic path in snapshot: plants/Roof/East/power');
  });

  it('should survive a JSON round trip unchanged', () => {
    const snapshot = flattenCollections(sampleCollections());

    expect(JSON.parse(JSON.stringify(snapshot))).toEqual(snapshot);
  });
});

describe('toMetricRecords', () => {
  it('should order records by topic path', () => {
    const records = toMetricRecords(flattenCollections(sampleCollections()));

    expect(records.map(topicPath)).toEqual([
      'devices/Home.Battery/battery_soc',
      'devices/Home.Battery/ch_discharge_power',
      'devices/Home.Inverter/active_power',
      'devices/Home.Inverter/run_state',
      'plants/Home/day_power',
      'plants/Home/health_state',
      'plants/Home/online',
    ]);
  });

  it('should produce unique topic paths', () => {
    const paths = toMetricRecords(flattenCollections(sampleCollections())).map(topicPath);

    expect(new Set(paths).size).toBe(paths.length);
  });

  it('should carry the value of each metric', () => {
    const records = toMetricRecords(flattenCollections(sampleCollections()));

    expect(records[0]).toEqual({
      category: 'devices',
      entity: 'Home.Battery',
      metric: 'battery_soc',
      value: 80,
    });
  });
});
