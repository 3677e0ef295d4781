import type { Snapshot } from '../types/snapshot.js';
import { toMetricRecords, topicPath } from './snapshot.js';

/**
 * Renders the snapshot for --list: the root topic, then one
 * `path: value` line per metric with the paths padded to a common width.
 */
export function formatListing(rootTopic: string, snapshot: Snapshot): string {
  const rows = toMetricRecords(snapshot).map((record) => ({
    path: topicPath(record),
    value: String(record.value),
  }));
  const width = Math.max(0, ...rows.map((row) => row.path.length));

  return [
    `${rootTopic}:`,
    ...rows.map((row) => `  ${row.path.padEnd(width)}: ${row.value}`),
  ].join('\n');
}
