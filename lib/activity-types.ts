export interface SplitMetrics {
  cadenceSpm: number;
  heartRate: number;
  gradePct: number;
}

/** Seconds spent in heart-rate zones 1 through 5. */
export type ZoneSeconds = [number, number, number, number, number];

export interface ActivityMetrics {
  efficiencyFactor: number;
  decouplingPct: number;
  avgCadenceSpm: number;
  avgHeartRate: number;
  trainingLoad: number;
  totalTrainingEffect: number;
  totalAnaerobicTrainingEffect: number;
  heartRateRecoverySeries: number[];
  distanceMi?: number;
  pace?: string;
  zone2FloorBpm?: number;
  zoneSeconds?: ZoneSeconds;
  splits?: SplitMetrics[];
}

export interface MetricRecord {
  contentHash: string;
  filename: string;
  date: string;
  sessionId: number;
  metrics: ActivityMetrics;
}

export interface StoredActivity extends MetricRecord {
  importedAt: string | null;
}
