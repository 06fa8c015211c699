export type VerdictPresentation = Readonly<Record<string, string>>;

export interface Verdict<K extends string = string> {
  readonly key: K;
  readonly label: string;
  readonly presentation: VerdictPresentation;
}

export type Taxonomy<K extends string> = Readonly<Record<K, Verdict<K>>>;

function freezeTable<K extends string>(table: Record<K, Verdict<K>>): Taxonomy<K> {
  for (const key of Object.keys(table) as K[]) {
    Object.freeze(table[key].presentation);
    Object.freeze(table[key]);
  }
  return Object.freeze(table);
}

export type FormVerdictKey =
  | "ELITE_FORM"
  | "GOOD_FORM"
  | "HIKING_REST"
  | "HEAVY_FEET"
  | "PLODDING";

export type SplitBucketKey = "HIGH_QUALITY" | "STRUCTURAL" | "BROKEN";

export type LoadCategoryKey = "RECOVERY" | "BASE" | "OVERLOAD" | "OVERREACHING";

export type TrainingEffectKey = "MAX_POWER" | "ANAEROBIC" | "VO2_MAX" | "THRESHOLD";

export type LoadMixKey =
  | "ZONE_2_BASE"
  | "ZONE_3_JUNK"
  | "ZONE_4_THRESHOLD_ADDICT"
  | "TEMPO_HEAVY"
  | "TEMPO_THRESHOLD";

export type DecouplingKey = "EXCELLENT" | "MODERATE" | "HIGH_FATIGUE";

export type QuadrantKey =
  | "RACE_READY"
  | "EXPENSIVE_SPEED"
  | "BASE_MAINTENANCE"
  | "STRUGGLING";

// Cadence thresholds live in the classifier config; prescriptions surface as
// the coaching cue on the running form card.
export const FORM_VERDICT: Taxonomy<FormVerdictKey> = freezeTable<FormVerdictKey>({
  ELITE_FORM: {
    key: "ELITE_FORM",
    label: "ELITE FORM",
    presentation: {
      color: "text-emerald-400",
      bg: "border-emerald-500/30",
      icon: "verified",
      prescription: "Pro-level mechanics. Excellent turnover.",
    },
  },
  GOOD_FORM: {
    key: "GOOD_FORM",
    label: "GOOD FORM",
    presentation: {
      color: "text-blue-400",
      bg: "border-blue-500/30",
      icon: "check_circle",
      prescription: "Balanced mechanics. Solid turnover.",
    },
  },
  HIKING_REST: {
    key: "HIKING_REST",
    label: "HIKING / REST",
    presentation: {
      color: "text-blue-400",
      bg: "border-blue-500/30",
      icon: "hiking",
      prescription: "Power hiking or recovery interval.",
    },
  },
  HEAVY_FEET: {
    key: "HEAVY_FEET",
    label: "HEAVY FEET",
    presentation: {
      color: "text-orange-400",
      bg: "border-orange-500/30",
      icon: "warning",
      prescription: "Cadence is low. Focus on quick turnover.",
    },
  },
  PLODDING: {
    key: "PLODDING",
    label: "PLODDING",
    presentation: {
      color: "text-yellow-400",
      bg: "border-yellow-500/30",
      icon: "do_not_step",
      prescription: "Turnover is sluggish. Pick up your feet.",
    },
  },
});

/**
 * Per-split quality. STRUCTURAL is intentional volume (hills, hiking, sub-Z2
 * shuffles), not junk; BROKEN is high effort with collapsing mechanics.
 */
export const SPLIT_BUCKET: Taxonomy<SplitBucketKey> = freezeTable<SplitBucketKey>({
  HIGH_QUALITY: {
    key: "HIGH_QUALITY",
    label: "High Quality",
    presentation: {
      color: "#10b981",
      subtitle: "Dialed Mechanics",
    },
  },
  STRUCTURAL: {
    key: "STRUCTURAL",
    label: "Structural",
    presentation: {
      color: "#3b82f6",
      subtitle: "Valid Base/Hills",
    },
  },
  BROKEN: {
    key: "BROKEN",
    label: "Broken",
    presentation: {
      color: "#f43f5e",
      subtitle: "Mechanical Failure",
    },
  },
});

export const LOAD_CATEGORY: Taxonomy<LoadCategoryKey> = freezeTable<LoadCategoryKey>({
  RECOVERY: {
    key: "RECOVERY",
    label: "Recovery",
    presentation: {
      color: "#60a5fa",
      emoji: "\u{1F9D8}",
      description: "Low stress, promotes adaptation",
    },
  },
  BASE: {
    key: "BASE",
    label: "Base",
    presentation: {
      color: "#10B981",
      emoji: "\u{1F537}",
      description: "Steady load, builds aerobic fitness",
    },
  },
  OVERLOAD: {
    key: "OVERLOAD",
    label: "Overload",
    presentation: {
      color: "#f97316",
      emoji: "\u{1F525}",
      description: "High stimulus, needs recovery between sessions",
    },
  },
  OVERREACHING: {
    key: "OVERREACHING",
    label: "Overreaching",
    presentation: {
      color: "#ef4444",
      emoji: "\u{1F6A8}",
      description: "Very high stress, needs recovery",
    },
  },
});

// Base and recovery sessions carry no label at all, so there is no entry for them here.
export const TRAINING_EFFECT_LABEL: Taxonomy<TrainingEffectKey> = freezeTable<TrainingEffectKey>({
  MAX_POWER: {
    key: "MAX_POWER",
    label: "MAX POWER",
    presentation: {
      color: "text-purple-400",
      icon: "\u{1F680}",
    },
  },
  ANAEROBIC: {
    key: "ANAEROBIC",
    label: "ANAEROBIC",
    presentation: {
      color: "text-orange-400",
      icon: "\u{1F50B}",
    },
  },
  VO2_MAX: {
    key: "VO2_MAX",
    label: "VO2 MAX",
    presentation: {
      color: "text-red-400",
      icon: "\u{1FAC0}",
    },
  },
  THRESHOLD: {
    key: "THRESHOLD",
    label: "THRESHOLD",
    presentation: {
      color: "text-emerald-400",
      icon: "\u{1F4C8}",
    },
  },
});

export const LOAD_MIX_VERDICT: Taxonomy<LoadMixKey> = freezeTable<LoadMixKey>({
  ZONE_2_BASE: {
    key: "ZONE_2_BASE",
    label: "ZONE 2 BASE",
    presentation: {
      description: "Nearly all Zone 1-2. Great for base building, but one hard session per week rounds it out.",
    },
  },
  ZONE_3_JUNK: {
    key: "ZONE_3_JUNK",
    label: "ZONE 3 JUNK",
    presentation: {
      description: "Too much time in the moderate zone without enough easy. Swap some tempo runs for true easy days.",
    },
  },
  ZONE_4_THRESHOLD_ADDICT: {
    key: "ZONE_4_THRESHOLD_ADDICT",
    label: "ZONE 4 THRESHOLD ADDICT",
    presentation: {
      description: "Too much high-end effort. Back off and rebuild your aerobic base; the speed will come back faster.",
    },
  },
  TEMPO_HEAVY: {
    key: "TEMPO_HEAVY",
    label: "TEMPO HEAVY",
    presentation: {
      description: "Strong tempo/threshold stimulus with a higher recovery cost. Treat these as hard days and do not stack them.",
    },
  },
  TEMPO_THRESHOLD: {
    key: "TEMPO_THRESHOLD",
    label: "TEMPO / THRESHOLD",
    presentation: {
      description: "High intensity speed work that builds race-pace durability. Expect higher cardiac strain.",
    },
  },
});

export const DECOUPLING_STATUS: Taxonomy<DecouplingKey> = freezeTable<DecouplingKey>({
  EXCELLENT: {
    key: "EXCELLENT",
    label: "Excellent",
    presentation: {
      icon: "✅",
      description: "< 5%: Excellent aerobic endurance",
    },
  },
  MODERATE: {
    key: "MODERATE",
    label: "Moderate",
    presentation: {
      icon: "⚠️",
      description: "5-10%: Some cardiac drift",
    },
  },
  HIGH_FATIGUE: {
    key: "HIGH_FATIGUE",
    label: "High Fatigue",
    presentation: {
      icon: "\u{1F6D1}",
      description: "> 10%: High Fatigue / Undeveloped Base",
    },
  },
});

export const QUADRANT_VERDICT: Taxonomy<QuadrantKey> = freezeTable<QuadrantKey>({
  RACE_READY: {
    key: "RACE_READY",
    label: "Race Ready",
    presentation: {
      color: "#2CC985",
      description: "Fast & Stable",
    },
  },
  EXPENSIVE_SPEED: {
    key: "EXPENSIVE_SPEED",
    label: "Expensive Speed",
    presentation: {
      color: "#ff9900",
      description: "Fast but Drifted",
    },
  },
  BASE_MAINTENANCE: {
    key: "BASE_MAINTENANCE",
    label: "Base Maintenance",
    presentation: {
      color: "#e6e600",
      description: "Slow & Stable",
    },
  },
  STRUGGLING: {
    key: "STRUGGLING",
    label: "Struggling",
    presentation: {
      color: "#ff0000",
      description: "Slow & Drifted",
    },
  },
});

export interface VerdictTaxonomy {
  form: Taxonomy<FormVerdictKey>;
  split: Taxonomy<SplitBucketKey>;
  load: Taxonomy<LoadCategoryKey>;
  trainingEffect: Taxonomy<TrainingEffectKey>;
  loadMix: Taxonomy<LoadMixKey>;
  decoupling: Taxonomy<DecouplingKey>;
  quadrant: Taxonomy<QuadrantKey>;
}

export const VERDICT_TAXONOMY: Readonly<VerdictTaxonomy> = Object.freeze({
  form: FORM_VERDICT,
  split: SPLIT_BUCKET,
  load: LOAD_CATEGORY,
  trainingEffect: TRAINING_EFFECT_LABEL,
  loadMix: LOAD_MIX_VERDICT,
  decoupling: DECOUPLING_STATUS,
  quadrant: QUADRANT_VERDICT,
});

export function verdictFor<K extends string>(taxonomy: Taxonomy<K>, key: K): Verdict<K> {
  return taxonomy[key];
}

export const SUPPORTED_SPORTS: ReadonlySet<string> = new Set(["running", "trail_running"]);

export const TIMEFRAME_OPTIONS = [
  "Last Import",
  "Last 30 Days",
  "Last 90 Days",
  "This Year",
  "All Time",
] as const;

export type Timeframe = (typeof TIMEFRAME_OPTIONS)[number];

export const DEFAULT_TIMEFRAME: Timeframe = "Last 30 Days";

export function isTimeframe(value: unknown): value is Timeframe {
  return TIMEFRAME_OPTIONS.some((option) => option === value);
}
