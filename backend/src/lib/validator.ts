import {
  AnomalyReason,
  EnrichmentResult,
  QualityStatus,
  SIGNAL_TYPES,
  SignalBundle,
  SignalPayload,
  SignalType,
  SignalWeights,
  ValidatedVector,
  ValidationReport
} from "../types/models";
import { ValidationConfig } from "./env";
import { observedSignalTypes, SignalPayloadSchemas } from "./signals";
import { addReason, reasonsForLabel } from "./taxonomy";

const FUTURE_SKEW_MS = 60_000;
const DAY_MS = 24 * 60 * 60 * 1000;

function timestampOf(value: string | number): number {
  return typeof value === "number" ? value : Date.parse(value);
}

function isResolved(type: SignalType, enrichment: EnrichmentResult): boolean {
  switch (type) {
    case "gps":
      return true;
    case "ip_origin":
      return enrichment.ip_origin !== undefined;
    case "wifi_ap":
      return enrichment.wifi_ap !== undefined;
    case "tls_fingerprint":
      return enrichment.tls_fingerprint !== undefined;
    case "device_posture":
      return enrichment.device_posture !== undefined;
  }
}

/**
 * Turns a raw bundle plus its enrichment into the weighted vector the trust
 * scorer consumes. Input defects never throw: they lower a weight and leave a
 * reason behind.
 */
export class SignalValidator {
  constructor(
    private readonly config: ValidationConfig,
    private readonly clock: () => Date = () => new Date()
  ) {}

  validate(bundle: SignalBundle, enrichment: EnrichmentResult): ValidatedVector {
    return this.report(bundle, enrichment).validated;
  }

  report(bundle: SignalBundle, enrichment: EnrichmentResult): ValidationReport {
    const now = this.clock().getTime();
    const quality: Record<SignalType, QualityStatus> = {
      ip_origin: "absent",
      gps: "absent",
      wifi_ap: "absent",
      device_posture: "absent",
      tls_fingerprint: "absent"
    };
    const weights: SignalWeights = {};
    const reasons: AnomalyReason[] = [];

    const observed = observedSignalTypes(bundle);
    if (observed.length === 0 && !bundle.label) {
      addReason(reasons, "INSUFFICIENT_SIGNAL");
      return { validated: { signals: bundle, weights, reasons }, quality, cross: [], enrichment };
    }

    // 1. quality
    for (const type of SIGNAL_TYPES) {
      const status = this.qualityOf(type, bundle.signals[type], now);
      quality[type] = status;
      if (status === "absent") {
        if (this.config.expectedSignals.includes(type)) addReason(reasons, "SIGNAL_MISSING", type);
        continue;
      }
      if (status === "malformed") addReason(reasons, "SIGNAL_MALFORMED", type);
      if (status === "stale") addReason(reasons, "SIGNAL_STALE", type);
      weights[type] = status === "ok" ? this.baseWeight(type, enrichment) : 0;
    }

    // 2. cross-checks cap, never zero, the location signals involved
    const cross = enrichment.checks.map((check) => ({ ...check, exceeded: check.value > check.threshold }));
    for (const check of cross) {
      if (!check.exceeded) continue;
      addReason(reasons, "LOCATION_MISMATCH");
      for (const type of check.signals) {
        const weight = weights[type];
        if (weight !== undefined) weights[type] = Math.min(weight, this.config.locationMismatchCap);
      }
    }

    // 3. evidence carried by individual signals
    if (quality.tls_fingerprint === "ok" && enrichment.tls_fingerprint?.suspicious) {
      addReason(reasons, "TLS_ANOMALY", "tls_fingerprint");
    }
    if (quality.device_posture === "ok") {
      this.postureReasons(bundle.signals.device_posture, enrichment, now, reasons);
    }

    // 4. network-flow classification
    for (const code of reasonsForLabel(bundle.label)) addReason(reasons, code);

    return { validated: { signals: bundle, weights, reasons }, quality, cross, enrichment };
  }

  private baseWeight(type: SignalType, enrichment: EnrichmentResult): number {
    const base = this.config.baseWeights[type];
    const weight = isResolved(type, enrichment) ? base : base * this.config.unresolvedPenalty;
    return Math.min(1, Math.max(0, weight));
  }

  private qualityOf(type: SignalType, payload: SignalPayload | undefined, now: number): QualityStatus {
    if (payload === undefined) return "absent";
    const parsed = SignalPayloadSchemas[type].safeParse(payload);
    if (!parsed.success) return "malformed";

    const observedAt = parsed.data.observed_at;
    if (observedAt === undefined) return "ok";
    const at = timestampOf(observedAt);
    if (Number.isNaN(at) || at > now + FUTURE_SKEW_MS) return "malformed";
    if (now - at > this.config.signalMaxAgeSeconds * 1000) return "stale";
    return "ok";
  }

  private postureReasons(
    payload: SignalPayload | undefined,
    enrichment: EnrichmentResult,
    now: number,
    reasons: AnomalyReason[]
  ): void {
    const reported = SignalPayloadSchemas.device_posture.safeParse(payload);
    if (!reported.success) return;
    const device = reported.data;

    if (device.rooted === true || device.emulator === true) addReason(reasons, "DEVICE_TAMPERED", "device_posture");

    // the posture inventory outranks what the device says about itself
    const patched = enrichment.device_posture?.patched ?? device.patched;
    const lastUpdate = enrichment.device_posture?.last_update ?? device.last_update;
    if (patched === false) addReason(reasons, "POSTURE_OUTDATED", "device_posture");
    if (lastUpdate !== undefined) {
      const updatedAt = Date.parse(lastUpdate);
      if (!Number.isNaN(updatedAt) && now - updatedAt > this.config.postureMaxAgeDays * DAY_MS) {
        addReason(reasons, "POSTURE_OUTDATED", "device_posture");
      }
    }
  }
}
