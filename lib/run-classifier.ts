import type { ActivityMetrics, SplitMetrics, ZoneSeconds } from "./activity-types";
import {
  VERDICT_TAXONOMY,
  type DecouplingKey,
  type FormVerdictKey,
  type LoadCategoryKey,
  type LoadMixKey,
  type SplitBucketKey,
  type TrainingEffectKey,
  type Verdict,
  type VerdictTaxonomy,
} from "./verdict-taxonomy";

export class InvalidMetricInputError extends Error {
  readonly metric: string;
  readonly value: unknown;

  constructor(metric: string, value: unknown, detail = "must be a finite, non-negative number") {
    super(`invalid metric input: ${metric} ${detail}, got ${JSON.stringify(value)}`);
    this.name = "InvalidMetricInputError";
    this.metric = metric;
    this.value = value;
  }
}

export interface ClassifierThresholds {
  readonly form: {
    readonly eliteMinSpm: number;
    readonly goodMinSpm: number;
    readonly hikingBelowSpm: number;
    readonly heavyFeetBelowSpm: number;
  };
  readonly split: {
    readonly highQualityMinSpm: number;
    readonly maxGradePct: number;
    readonly structuralBelowSpm: number;
  };
  readonly trainingEffect: {
    readonly maxPowerAnaerobic: number;
    readonly anaerobicMin: number;
    readonly anaerobicCloseness: number;
    readonly vo2MaxAerobic: number;
    readonly thresholdAerobic: number;
  };
  readonly load: {
    readonly baseMin: number;
    readonly overloadMin: number;
    readonly overreachingMin: number;
  };
  /** Shares of total zone time, 0..1. */
  readonly loadMix: {
    readonly highIntensityShare: number;
    readonly zone3Share: number;
    readonly easyShare: number;
    readonly tempoShare: number;
  };
  readonly decoupling: {
    readonly excellentBelowPct: number;
    readonly moderateMaxPct: number;
  };
}

export type ThresholdOverrides = {
  [G in keyof ClassifierThresholds]?: Partial<ClassifierThresholds[G]>;
};

function freezeThresholds(t: ClassifierThresholds): Readonly<ClassifierThresholds> {
  return Object.freeze({
    form: Object.freeze({ ...t.form }),
    split: Object.freeze({ ...t.split }),
    trainingEffect: Object.freeze({ ...t.trainingEffect }),
    load: Object.freeze({ ...t.load }),
    loadMix: Object.freeze({ ...t.loadMix }),
    decoupling: Object.freeze({ ...t.decoupling }),
  });
}

export const CLASSIFIER_THRESHOLDS: Readonly<ClassifierThresholds> = freezeThresholds({
  form: {
    eliteMinSpm: 170,
    goodMinSpm: 160,
    hikingBelowSpm: 135,
    heavyFeetBelowSpm: 155,
  },
  split: {
    highQualityMinSpm: 160,
    maxGradePct: 8,
    structuralBelowSpm: 140,
  },
  trainingEffect: {
    maxPowerAnaerobic: 3.5,
    anaerobicMin: 2.5,
    anaerobicCloseness: 0.5,
    vo2MaxAerobic: 4.2,
    thresholdAerobic: 3.5,
  },
  load: {
    baseMin: 75,
    overloadMin: 150,
    overreachingMin: 300,
  },
  loadMix: {
    highIntensityShare: 0.25,
    zone3Share: 0.3,
    easyShare: 0.8,
    tempoShare: 0.5,
  },
  decoupling: {
    excellentBelowPct: 5,
    moderateMaxPct: 10,
  },
});

/** Overrides win per key; the result and each of its groups are frozen. */
export function mergeThresholds(
  base: Readonly<ClassifierThresholds>,
  overrides: ThresholdOverrides,
): Readonly<ClassifierThresholds> {
  return freezeThresholds({
    form: { ...base.form, ...overrides.form },
    split: { ...base.split, ...overrides.split },
    trainingEffect: { ...base.trainingEffect, ...overrides.trainingEffect },
    load: { ...base.load, ...overrides.load },
    loadMix: { ...base.loadMix, ...overrides.loadMix },
    decoupling: { ...base.decoupling, ...overrides.decoupling },
  });
}

function requireNonNegative(metric: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new InvalidMetricInputError(metric, value);
  }
  return value;
}

function requireFinite(metric: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidMetricInputError(metric, value, "must be a finite number");
  }
  return value;
}

export interface ActivityVerdicts {
  form: Verdict<FormVerdictKey>;
  load: Verdict<LoadCategoryKey>;
  trainingEffect: Verdict<TrainingEffectKey> | null;
  decoupling: Verdict<DecouplingKey>;
  /** Null when the zone 2 floor is unknown for this activity. */
  splits: Verdict<SplitBucketKey>[] | null;
}

export interface RunClassifier {
  readonly thresholds: Readonly<ClassifierThresholds>;
  readonly taxonomy: Readonly<VerdictTaxonomy>;
  classifyForm(cadenceSpm: number): FormVerdictKey;
  classifySplit(cadenceSpm: number, heartRate: number, zone2Floor: number, gradePct: number): SplitBucketKey;
  classifyTrainingEffect(aerobicTE: number, anaerobicTE: number): TrainingEffectKey | null;
  classifyLoad(trimpScore: number): LoadCategoryKey;
  classifyLoadMix(zoneTime: ZoneSeconds): LoadMixKey;
  classifyDecoupling(decouplingPct: number): DecouplingKey;
  classifyActivity(metrics: ActivityMetrics): ActivityVerdicts;
}

export function createClassifier(
  thresholds: Readonly<ClassifierThresholds> = CLASSIFIER_THRESHOLDS,
  taxonomy: Readonly<VerdictTaxonomy> = VERDICT_TAXONOMY,
): RunClassifier {
  const t = thresholds;

  // Upper bands are tested first; 134 never reaches the heavy-feet check.
  function classifyForm(cadenceSpm: number): FormVerdictKey {
    const spm = requireNonNegative("cadenceSpm", cadenceSpm);
    if (spm >= t.form.eliteMinSpm) return "ELITE_FORM";
    if (spm >= t.form.goodMinSpm) return "GOOD_FORM";
    if (spm < t.form.hikingBelowSpm) return "HIKING_REST";
    if (spm < t.form.heavyFeetBelowSpm) return "HEAVY_FEET";
    return "PLODDING";
  }

  // Cadence 140-159 at zone 2+ on low grade matches neither clause and lands in BROKEN.
  function classifySplit(
    cadenceSpm: number,
    heartRate: number,
    zone2Floor: number,
    gradePct: number,
  ): SplitBucketKey {
    const spm = requireNonNegative("cadenceSpm", cadenceSpm);
    const hr = requireNonNegative("heartRate", heartRate);
    const floor = requireNonNegative("zone2Floor", zone2Floor);
    const grade = requireFinite("gradePct", gradePct);

    if (spm >= t.split.highQualityMinSpm && hr > floor && grade <= t.split.maxGradePct) {
      return "HIGH_QUALITY";
    }
    if (grade > t.split.maxGradePct || spm < t.split.structuralBelowSpm || hr < floor) {
      return "STRUCTURAL";
    }
    return "BROKEN";
  }

  function classifyTrainingEffect(aerobicTE: number, anaerobicTE: number): TrainingEffectKey | null {
    const aerobic = requireNonNegative("totalTrainingEffect", aerobicTE);
    const anaerobic = requireNonNegative("totalAnaerobicTrainingEffect", anaerobicTE);
    const te = t.trainingEffect;

    if (anaerobic >= te.maxPowerAnaerobic) return "MAX_POWER";
    if (anaerobic >= te.anaerobicMin && anaerobic >= aerobic - te.anaerobicCloseness) return "ANAEROBIC";
    if (aerobic >= te.vo2MaxAerobic) return "VO2_MAX";
    if (aerobic >= te.thresholdAerobic) return "THRESHOLD";
    return null;
  }

  function classifyLoad(trimpScore: number): LoadCategoryKey {
    const load = requireNonNegative("trainingLoad", trimpScore);
    if (load < t.load.baseMin) return "RECOVERY";
    if (load < t.load.overloadMin) return "BASE";
    if (load < t.load.overreachingMin) return "OVERLOAD";
    return "OVERREACHING";
  }

  function classifyLoadMix(zoneTime: ZoneSeconds): LoadMixKey {
    if (!Array.isArray(zoneTime) || zoneTime.length !== 5) {
      throw new InvalidMetricInputError("zoneSeconds", zoneTime, "must list seconds for exactly 5 zones");
    }
    const secs = zoneTime.map((s, i) => requireNonNegative(`zoneSeconds[${i}]`, s));
    const total = secs.reduce((a, b) => a + b, 0);
    if (total === 0) {
      throw new InvalidMetricInputError("zoneSeconds", zoneTime, "must contain some recorded time");
    }

    const [z1, z2, z3, z4, z5] = secs.map((s) => s / total);
    const mix = t.loadMix;

    if (z4 + z5 >= mix.highIntensityShare) return "ZONE_4_THRESHOLD_ADDICT";
    if (z3 >= mix.zone3Share) return "ZONE_3_JUNK";
    if (z1 + z2 >= mix.easyShare) return "ZONE_2_BASE";
    if (z3 + z4 + z5 >= mix.tempoShare) return "TEMPO_HEAVY";
    return "TEMPO_THRESHOLD";
  }

  function classifyDecoupling(decouplingPct: number): DecouplingKey {
    // Negative drift (second half faster per beat) is valid and counts as excellent.
    const pct = requireFinite("decouplingPct", decouplingPct);
    if (pct < t.decoupling.excellentBelowPct) return "EXCELLENT";
    if (pct <= t.decoupling.moderateMaxPct) return "MODERATE";
    return "HIGH_FATIGUE";
  }

  function classifySplits(splits: SplitMetrics[] | undefined, zone2Floor: number | undefined) {
    if (zone2Floor == null) return null;
    return (splits ?? []).map((s) =>
      taxonomy.split[classifySplit(s.cadenceSpm, s.heartRate, zone2Floor, s.gradePct)],
    );
  }

  function classifyActivity(metrics: ActivityMetrics): ActivityVerdicts {
    const te = classifyTrainingEffect(metrics.totalTrainingEffect, metrics.totalAnaerobicTrainingEffect);
    return {
      form: taxonomy.form[classifyForm(metrics.avgCadenceSpm)],
      load: taxonomy.load[classifyLoad(metrics.trainingLoad)],
      trainingEffect: te === null ? null : taxonomy.trainingEffect[te],
      decoupling: taxonomy.decoupling[classifyDecoupling(metrics.decouplingPct)],
      splits: classifySplits(metrics.splits, metrics.zone2FloorBpm),
    };
  }

  return {
    thresholds,
    taxonomy,
    classifyForm,
    classifySplit,
    classifyTrainingEffect,
    classifyLoad,
    classifyLoadMix,
    classifyDecoupling,
    classifyActivity,
  };
}

const defaultClassifier = createClassifier();

export const classifyForm = defaultClassifier.classifyForm;
export const classifySplit = defaultClassifier.classifySplit;
export const classifyTrainingEffect = defaultClassifier.classifyTrainingEffect;
export const classifyLoad = defaultClassifier.classifyLoad;
export const classifyLoadMix = defaultClassifier.classifyLoadMix;
export const classifyDecoupling = defaultClassifier.classifyDecoupling;
export const classifyActivity = defaultClassifier.classifyActivity;
