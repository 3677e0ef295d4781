export type MetricValue = number | string | boolean;

/** Metric name to value, for one plant or device */
export type MetricSet = Record<string, MetricValue>;

export interface EntityReading {
  name: string;
  metrics: MetricSet;
}

export interface RealtimeCollections {
  plants: EntityReading[];
  devices: EntityReading[];
}

export const CATEGORIES = ['plants', 'devices'] as const;

export type Category = (typeof CATEGORIES)[number];

/**
 * Published payload: category -> entity name -> metric name -> value.
 */
export type Snapshot = Record<Category, Record<string, MetricSet>>;

export interface MetricRecord {
  category: Category;
  entity: string;
  metric: string;
  value: MetricValue;
}
