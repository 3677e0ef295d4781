import {
  CATEGORIES,
  type EntityReading,
  type MetricRecord,
  type MetricSet,
  type MetricValue,
  type RealtimeCollections,
  type Snapshot,
} from '../types/snapshot.js';
import { TopicCollisionError } from '../utils/errors.js';

export function topicPath(record: Pick<MetricRecord, 'category' | 'entity' | 'metric'>): string {
  return `${record.category}/${record.entity}/${record.metric}`;
}

/**
 * Builds the nested payload shared by the MQTT and --list outputs.
 * Throws TopicCollisionError when two metrics would render to the same path.
 */
export function flattenCollections(collections: RealtimeCollections): Snapshot {
  const seen = new Set<string>();

  const build = (category: keyof RealtimeCollections, readings: EntityReading[]) => {
    const entries: Array<[string, MetricSet]> = [];
    const names = new Set<string>();
    for (const reading of readings) {
      if (names.has(reading.name)) {
        throw new TopicCollisionError(`${category}/${reading.name}`);
      }
      names.add(reading.name);

      const metrics: Array<[string, MetricValue]> = [];
      for (const [metric, value] of Object.entries(reading.metrics)) {
        const path = topicPath({ category, entity: reading.name, metric });
        if (seen.has(path)) {
          throw new TopicCollisionError(path);
        }
        seen.add(path);
        metrics.push([metric, value]);
      }
      entries.push([reading.name, Object.fromEntries(metrics)]);
    }
    return Object.fromEntries(entries);
  };

  return {
    plants: build('plants', collections.plants),
    devices: build('devices', collections.devices),
  };
}

/**
 * Snapshot as flat records, ordered by topic path.
 */
export function toMetricRecords(snapshot: Snapshot): MetricRecord[] {
  const records: MetricRecord[] = [];
  for (const category of CATEGORIES) {
    for (const [entity, metrics] of Object.entries(snapshot[category])) {
      for (const [metric, value] of Object.entries(metrics)) {
        records.push({ category, entity, metric, value });
      }
    }
  }

  return records
    .map((record) => ({ record, path: topicPath(record) }))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .map(({ record }) => record);
}
