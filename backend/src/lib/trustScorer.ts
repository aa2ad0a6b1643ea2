import {
  AlertWindowCount,
  Decision,
  RiskAssessment,
  SIGNAL_TYPES,
  SignalWeights,
  StrideCategory,
  ValidatedVector
} from "../types/models";
import { ScoringConfig } from "./env";
import { ConfigError } from "./errors";
import { REASON_INCREMENTS, REASON_STRIDE, STRIDE_ORDER, strideCategoriesOf } from "./taxonomy";

/** Σweights at which coverage saturates. */
const FULL_WEIGHT_MASS = 2.5;
const COVERAGE_SHARE = 0.6;
const BREADTH_SHARE = 0.4;

const MAX_CONFIDENCE_DAMPEN = 0.05;
const DAMPEN_RATIO = 0.25;
const MAX_UNCERTAINTY_BUMP = 0.05;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function count(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

export function confidenceOf(weights: SignalWeights): number {
  let mass = 0;
  let usable = 0;
  for (const type of SIGNAL_TYPES) {
    const weight = weights[type] ?? 0;
    mass += weight;
    if (weight > 0) usable += 1;
  }
  const coverage = Math.min(1, mass / FULL_WEIGHT_MASS);
  const breadth = usable / SIGNAL_TYPES.length;
  return round(COVERAGE_SHARE * coverage + BREADTH_SHARE * breadth, 3);
}

/**
 * Bounded shift driven by confidence alone: at most a quarter of the raw risk
 * (and never more than 0.05) comes off for a well-covered vector, and at most
 * 0.05 is added for an uncovered one.
 */
export function confidenceAdjustment(raw: number, confidence: number): number {
  const swing = 2 * (0.5 - confidence);
  if (swing < 0) return -Math.min(MAX_CONFIDENCE_DAMPEN, DAMPEN_RATIO * Math.max(0, raw)) * -swing;
  return MAX_UNCERTAINTY_BUMP * swing;
}

/**
 * Weighted risk aggregation over a validated vector. Stateless: the same
 * vector, alert counts and configuration always give the same assessment.
 */
export class TrustScorer {
  constructor(private readonly config: ScoringConfig) {
    if (!(config.allowThreshold < config.denyThreshold)) {
      throw new ConfigError(
        `allow threshold (${config.allowThreshold}) must be lower than deny threshold (${config.denyThreshold})`
      );
    }
  }

  classify(risk: number): Decision {
    if (risk < this.config.allowThreshold) return "ALLOW";
    if (risk < this.config.denyThreshold) return "STEP_UP";
    return "DENY";
  }

  score(vector: ValidatedVector, recentAlerts: AlertWindowCount): RiskAssessment {
    const contributions = new Map<StrideCategory, number>();
    let reasonRisk = 0;
    for (const reason of vector.reasons) {
      const { increment, scaleBySignalWeight } = REASON_INCREMENTS[reason.code];
      const scale = scaleBySignalWeight && reason.signal ? (vector.weights[reason.signal] ?? 0) : 1;
      const contribution = increment * scale;
      reasonRisk += contribution;
      const category = REASON_STRIDE[reason.code];
      contributions.set(category, (contributions.get(category) ?? 0) + contribution);
    }

    const alertRisk =
      count(recentAlerts.high) * this.config.siemHighBump + count(recentAlerts.medium) * this.config.siemMediumBump;
    const raw = this.config.baseRisk + reasonRisk + alertRisk;

    const confidence = confidenceOf(vector.weights);
    const adjustment = confidenceAdjustment(raw, confidence);
    const risk = round(clamp01(raw + adjustment), 4);

    return {
      session_id: vector.signals.session_id,
      risk,
      decision: this.classify(risk),
      stride_categories: strideCategoriesOf(vector.reasons),
      dominant_stride: dominantCategory(contributions),
      confidence,
      components: {
        base: this.config.baseRisk,
        reasons: round(reasonRisk, 4),
        alerts: round(alertRisk, 4),
        confidence_adjustment: round(adjustment, 4)
      }
    };
  }
}

function dominantCategory(contributions: Map<StrideCategory, number>): StrideCategory | undefined {
  let best: StrideCategory | undefined;
  let bestValue = -1;
  for (const category of STRIDE_ORDER) {
    const value = contributions.get(category);
    if (value !== undefined && value > bestValue) {
      best = category;
      bestValue = value;
    }
  }
  return best;
}
