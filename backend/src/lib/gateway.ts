import { v4 as uuidv4 } from "uuid";
import {
  AlertRecord,
  AlertWindowCount,
  Decision,
  EnforcementRecord,
  Enforcement,
  EnrichmentResult,
  GatewayDecision,
  PersistenceStatus,
  RiskAssessment,
  Severity,
  SignalBundle,
  StrideCategory,
  ValidatedVector,
  ValidationReport
} from "../types/models";
import { throwIfCancelled, withDeadline } from "./deadline";
import { PipelineCancelledError, errorMessage } from "./errors";
import type { Telemetry } from "./metrics";
import type { AlertStore, DecisionStore, QueryOptions } from "./store";
import { reasonKey } from "./taxonomy";

export const FAIL_SAFE_REASON = "DEPENDENCY_UNAVAILABLE";

const ENFORCEMENT: Readonly<Record<Decision, Enforcement>> = {
  ALLOW: "ALLOW",
  STEP_UP: "MFA_STEP_UP",
  DENY: "DENY"
};

export interface RiskScorer {
  score(vector: ValidatedVector, recentAlerts: AlertWindowCount): RiskAssessment | Promise<RiskAssessment>;
}

export interface GatewayDependencies {
  resolver: { enrich(bundle: SignalBundle): EnrichmentResult | Promise<EnrichmentResult> };
  validator: { report(bundle: SignalBundle, enrichment: EnrichmentResult): ValidationReport };
  aggregator: { countRecent(sessionId: string, windowMinutes: number, options?: QueryOptions): Promise<AlertWindowCount> };
  scorer: RiskScorer;
  decisions: DecisionStore;
  alerts: Pick<AlertStore, "putAlert">;
  telemetry?: Telemetry;
  issueChallenge?: (sessionId: string, risk: number) => Promise<string>;
  clock?: () => Date;
}

export interface GatewayOptions {
  alertWindowMinutes: number;
  alertThreshold: number;
  highSeverityThreshold: number;
  dependencyTimeoutMs: number;
  telemetryTimeoutMs: number;
}

export interface DecideOptions {
  signal?: AbortSignal;
}

export function enforcementFor(decision: Decision): Enforcement {
  return ENFORCEMENT[decision];
}

/** The record for an attempt whose dependencies could not be consulted. */
export function failSafeRecord(sessionId: string, now: Date = new Date()): EnforcementRecord {
  return {
    recordId: uuidv4(),
    sessionId,
    timestamp: now.toISOString(),
    risk: 1,
    decision: "DENY",
    enforcement: "DENY",
    reasons: [FAIL_SAFE_REASON],
    strideCategories: [],
    confidence: 0,
    failSafe: true
  };
}

/**
 * Runs validation, alert aggregation and scoring for one attempt and turns
 * the result into an enforcement action. When any of those stages fails or
 * times out the answer is DENY at risk 1.0; it is never ALLOW and never an
 * error. Cancellation is honoured until the record is persisted.
 */
export class EnforcementGateway {
  private readonly clock: () => Date;

  constructor(
    private readonly deps: GatewayDependencies,
    private readonly options: GatewayOptions
  ) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async decide(bundle: SignalBundle, { signal }: DecideOptions = {}): Promise<GatewayDecision> {
    const sessionId = bundle.session_id;
    const timeoutMs = this.options.dependencyTimeoutMs;

    let assessment: RiskAssessment | undefined;
    let recentAlerts: AlertWindowCount | undefined;
    let reasons: string[] = [];
    try {
      const report = await withDeadline(
        "signal-validator",
        timeoutMs,
        async () => this.deps.validator.report(bundle, await this.deps.resolver.enrich(bundle)),
        signal
      );
      const counts = await withDeadline(
        "alert-aggregator",
        timeoutMs,
        (stageSignal) => this.deps.aggregator.countRecent(sessionId, this.options.alertWindowMinutes, { signal: stageSignal }),
        signal
      );
      recentAlerts = counts;
      assessment = await withDeadline("trust-scorer", timeoutMs, () => this.deps.scorer.score(report.validated, counts), signal);
      reasons = report.validated.reasons.map(reasonKey);
    } catch (error) {
      if (error instanceof PipelineCancelledError) throw error;
      console.error("decision_fail_safe", { sessionId, error: errorMessage(error) });
    }

    throwIfCancelled(signal, "enforcement");
    const record = assessment ? this.buildRecord(assessment, reasons) : failSafeRecord(sessionId, this.clock());

    // committed once persisted: later steps no longer observe the caller's signal
    const persistence = await this.persist(record, signal);
    const stride = assessment?.dominant_stride ?? recentAlerts?.dominant_stride ?? "InformationDisclosure";
    const alert = assessment ? await this.raiseAlert(record, stride) : undefined;
    const challengeToken = record.enforcement === "MFA_STEP_UP" ? await this.challengeFor(record) : undefined;

    await this.emitTelemetry(record, alert);

    console.log("decision_made", {
      sessionId,
      enforcement: record.enforcement,
      risk: record.risk,
      failSafe: record.failSafe,
      persisted: persistence.ok
    });

    return { record, persistence, ...(alert ? { alert } : {}), ...(challengeToken ? { challengeToken } : {}) };
  }

  /** Enrichment and validation only; nothing is scored or recorded. */
  async inspect(bundle: SignalBundle, { signal }: DecideOptions = {}): Promise<ValidationReport> {
    return withDeadline(
      "signal-validator",
      this.options.dependencyTimeoutMs,
      async () => this.deps.validator.report(bundle, await this.deps.resolver.enrich(bundle)),
      signal
    );
  }

  severityFor(risk: number): Severity {
    return risk >= this.options.highSeverityThreshold ? "high" : "medium";
  }

  private buildRecord(assessment: RiskAssessment, reasons: string[]): EnforcementRecord {
    return {
      recordId: uuidv4(),
      sessionId: assessment.session_id,
      timestamp: this.clock().toISOString(),
      risk: assessment.risk,
      decision: assessment.decision,
      enforcement: enforcementFor(assessment.decision),
      reasons,
      strideCategories: assessment.stride_categories,
      confidence: assessment.confidence,
      failSafe: false
    };
  }

  // The decision stands whether or not it can be recorded.
  private async persist(record: EnforcementRecord, signal: AbortSignal | undefined): Promise<PersistenceStatus> {
    try {
      await withDeadline(
        "decision-store",
        this.options.dependencyTimeoutMs,
        (stageSignal) => this.deps.decisions.putDecision(record, { signal: stageSignal }),
        signal
      );
      return { ok: true };
    } catch (error) {
      if (error instanceof PipelineCancelledError) throw error;
      console.error("decision_persist_error", { sessionId: record.sessionId, recordId: record.recordId, error: errorMessage(error) });
      return { ok: false, error: errorMessage(error) };
    }
  }

  private async raiseAlert(record: EnforcementRecord, stride: StrideCategory): Promise<AlertRecord | undefined> {
    if (record.risk < this.options.alertThreshold) return undefined;
    try {
      return await withDeadline(
        "alert-store",
        this.options.dependencyTimeoutMs,
        (stageSignal) =>
          this.deps.alerts.putAlert(
            {
              sessionId: record.sessionId,
              severity: this.severityFor(record.risk),
              stride,
              source: "gateway",
              risk: record.risk,
              reasons: record.reasons
            },
            { signal: stageSignal }
          )
      );
    } catch (error) {
      console.error("alert_persist_error", { sessionId: record.sessionId, error: errorMessage(error) });
      return undefined;
    }
  }

  private async challengeFor(record: EnforcementRecord): Promise<string | undefined> {
    if (!this.deps.issueChallenge) return undefined;
    try {
      return await this.deps.issueChallenge(record.sessionId, record.risk);
    } catch (error) {
      console.error("step_up_challenge_error", { sessionId: record.sessionId, error: errorMessage(error) });
      return undefined;
    }
  }

  private async emitTelemetry(record: EnforcementRecord, alert: AlertRecord | undefined): Promise<void> {
    const telemetry = this.deps.telemetry;
    if (!telemetry) return;
    const results = await Promise.allSettled([
      withDeadline("telemetry", this.options.telemetryTimeoutMs, () => telemetry.recordDecision(record)),
      ...(alert ? [withDeadline("telemetry", this.options.telemetryTimeoutMs, () => telemetry.forwardAlert(alert))] : [])
    ]);
    for (const result of results) {
      if (result.status === "rejected") console.warn("telemetry_error", { sessionId: record.sessionId, error: errorMessage(result.reason) });
    }
  }
}
