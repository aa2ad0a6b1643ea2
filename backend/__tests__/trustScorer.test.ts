import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/lib/errors";
import { buildSignalBundle } from "../src/lib/signals";
import { confidenceAdjustment, confidenceOf, TrustScorer } from "../src/lib/trustScorer";
import { AlertWindowCount, AnomalyReason, SignalWeights, ValidatedVector } from "../src/types/models";
import { testConfig } from "./helpers";

const FULL_WEIGHTS: SignalWeights = { ip_origin: 0.8, gps: 0.9, wifi_ap: 0.85, device_posture: 0.9, tls_fingerprint: 0.7 };

const scorer = new TrustScorer(testConfig().scoring);

function vector(weights: SignalWeights, reasons: AnomalyReason[] = [], label?: string): ValidatedVector {
  return { signals: buildSignalBundle({ session_id: "sess-score", ...(label ? { label } : {}) }), weights, reasons };
}

function alerts(high = 0, medium = 0, low = 0): AlertWindowCount {
  return { session_id: "sess-score", window_minutes: 15, high, medium, low };
}

describe("confidenceOf", () => {
  it("is 1 for a fully covered vector and 0 for an empty one", () => {
    expect(confidenceOf(FULL_WEIGHTS)).toBe(1);
    expect(confidenceOf({})).toBe(0);
  });

  it("blends weight mass and breadth", () => {
    // 0.6 * (1.25 / 2.5) + 0.4 * (2 / 5)
    expect(confidenceOf({ gps: 0.5, ip_origin: 0.75, wifi_ap: 0 })).toBe(0.46);
  });
});

describe("confidenceAdjustment", () => {
  it("dampens confident vectors by at most 0.05", () => {
    expect(confidenceAdjustment(0.05, 1)).toBeCloseTo(-0.0125, 10);
    expect(confidenceAdjustment(0.9, 1)).toBeCloseTo(-0.05, 10);
  });

  it("bumps uncertain vectors by at most 0.05", () => {
    expect(confidenceAdjustment(0.05, 0)).toBeCloseTo(0.05, 10);
    expect(confidenceAdjustment(0.05, 0.5)).toBe(0);
  });
});

describe("TrustScorer", () => {
  it("refuses an allow threshold at or above the deny threshold", () => {
    expect(
      () => new TrustScorer({ baseRisk: 0.05, allowThreshold: 0.8, denyThreshold: 0.8, siemHighBump: 0.15, siemMediumBump: 0.07 })
    ).toThrow(ConfigError);
  });

  it("classifies on half-open intervals", () => {
    expect(scorer.classify(0)).toBe("ALLOW");
    expect(scorer.classify(0.1499)).toBe("ALLOW");
    expect(scorer.classify(0.15)).toBe("STEP_UP");
    expect(scorer.classify(0.7999)).toBe("STEP_UP");
    expect(scorer.classify(0.8)).toBe("DENY");
    expect(scorer.classify(1)).toBe("DENY");
  });

  it("allows a clean, fully covered attempt", () => {
    const assessment = scorer.score(vector(FULL_WEIGHTS), alerts());

    expect(assessment).toEqual({
      session_id: "sess-score",
      risk: 0.0375,
      decision: "ALLOW",
      stride_categories: [],
      dominant_stride: undefined,
      confidence: 1,
      components: { base: 0.05, reasons: 0, alerts: 0, confidence_adjustment: -0.0125 }
    });
  });

  it("allows a benign label with no signals", () => {
    const assessment = scorer.score(vector({}, [], "BENIGN"), alerts());
    expect(assessment.risk).toBe(0.1);
    expect(assessment.decision).toBe("ALLOW");
    expect(assessment.confidence).toBe(0);
  });

  it("denies a DoS flow with recent high alerts", () => {
    const assessment = scorer.score(vector(FULL_WEIGHTS, [{ code: "DOS" }]), alerts(2));

    expect(assessment.risk).toBe(0.85);
    expect(assessment.decision).toBe("DENY");
    expect(assessment.stride_categories).toEqual(["DoS"]);
    expect(assessment.dominant_stride).toBe("DoS");
    expect(assessment.components).toEqual({ base: 0.05, reasons: 0.55, alerts: 0.3, confidence_adjustment: -0.05 });
  });

  it("steps up a location mismatch", () => {
    const weights = { ...FULL_WEIGHTS, gps: 0.2, wifi_ap: 0.2 };
    const assessment = scorer.score(vector(weights, [{ code: "LOCATION_MISMATCH" }]), alerts());

    expect(assessment.confidence).toBe(1);
    expect(assessment.risk).toBe(0.3);
    expect(assessment.decision).toBe("STEP_UP");
    expect(assessment.dominant_stride).toBe("Spoofing");
  });

  it("scales signal evidence by the signal's weight", () => {
    const reasons: AnomalyReason[] = [{ code: "TLS_ANOMALY", signal: "tls_fingerprint" }];
    const trusted = scorer.score(vector(FULL_WEIGHTS, reasons), alerts());
    const discounted = scorer.score(vector({ ...FULL_WEIGHTS, tls_fingerprint: 0.35 }, reasons), alerts());

    expect(trusted.components.reasons).toBe(0.14);
    expect(discounted.components.reasons).toBe(0.07);
  });

  it("picks the category with the largest contribution as dominant", () => {
    const reasons: AnomalyReason[] = [
      { code: "LOCATION_MISMATCH" },
      { code: "POLICY_ELEVATION" },
      { code: "DOWNLOAD_EXFIL" },
      { code: "RECONNAISSANCE" }
    ];
    const assessment = scorer.score(vector(FULL_WEIGHTS, reasons), alerts());

    expect(assessment.stride_categories).toEqual(["Spoofing", "InformationDisclosure", "EoP"]);
    expect(assessment.dominant_stride).toBe("InformationDisclosure");
  });

  it("breaks dominant ties by STRIDE order", () => {
    // TLS_ANOMALY at full weight and DOWNLOAD_EXFIL both contribute 0.2
    const reasons: AnomalyReason[] = [{ code: "DOWNLOAD_EXFIL" }, { code: "TLS_ANOMALY", signal: "tls_fingerprint" }];
    const assessment = scorer.score(vector({ ...FULL_WEIGHTS, tls_fingerprint: 1 }, reasons), alerts());

    expect(assessment.stride_categories).toEqual(["Tampering", "InformationDisclosure"]);
    expect(assessment.dominant_stride).toBe("Tampering");
  });

  it("never lowers risk when reasons are added", () => {
    const additions: AnomalyReason[] = [
      { code: "SIGNAL_STALE", signal: "gps" },
      { code: "POSTURE_OUTDATED", signal: "device_posture" },
      { code: "RECONNAISSANCE" },
      { code: "LOCATION_MISMATCH" },
      { code: "BRUTE_FORCE" },
      { code: "DOS" }
    ];
    for (const weights of [FULL_WEIGHTS, {}, { gps: 0.9, ip_origin: 0.4 }]) {
      const reasons: AnomalyReason[] = [];
      let previous = scorer.score(vector(weights, reasons), alerts()).risk;
      for (const reason of additions) {
        reasons.push(reason);
        const next = scorer.score(vector(weights, [...reasons]), alerts()).risk;
        expect(next).toBeGreaterThanOrEqual(previous);
        previous = next;
      }
    }
  });

  it("never lowers risk when alerts are added", () => {
    const base = vector(FULL_WEIGHTS, [{ code: "TLS_ANOMALY", signal: "tls_fingerprint" }]);
    let previous = scorer.score(base, alerts()).risk;
    for (const count of [alerts(0, 1), alerts(1, 1), alerts(2, 3), alerts(5, 5)]) {
      const next = scorer.score(base, count).risk;
      expect(next).toBeGreaterThanOrEqual(previous);
      previous = next;
    }
    expect(previous).toBe(1);
  });

  it("treats negative or fractional alert counts as whole non-negative numbers", () => {
    expect(scorer.score(vector(FULL_WEIGHTS), alerts(-3, 1.9)).components.alerts).toBe(0.07);
  });

  it("ignores low severity alerts", () => {
    expect(scorer.score(vector(FULL_WEIGHTS), alerts(0, 0, 10)).risk).toBe(0.0375);
  });
});
