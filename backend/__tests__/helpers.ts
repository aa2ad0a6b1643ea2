import path from "path";
import { loadConfig, PipelineConfig } from "../src/lib/env";
import { Telemetry } from "../src/lib/metrics";
import { loadReferenceData, ReferenceDataRegistry } from "../src/lib/referenceData";
import { AlertStore, DecisionStore, QueryOptions, buildAlert } from "../src/lib/store";
import { AlertRecord, EnforcementRecord, NewAlert, Severity, StrideCategory } from "../src/types/models";

export const FIXTURE_DIR = path.join(__dirname, "fixtures", "reference");
export const NOW = new Date("2026-10-18T12:00:00.000Z");
export const clock = () => NOW;

export const CLEAN_JA3 = "0123456789abcdef0123456789abcdef";
export const TOR_JA3 = "ffffffffffffffffffffffffffffffff";

export function testConfig(overrides: Record<string, string> = {}): PipelineConfig {
  return loadConfig({ TABLE_NAME: "risk-gateway-test", ...overrides });
}

export async function fixtureRegistry(): Promise<ReferenceDataRegistry> {
  return new ReferenceDataRegistry(await loadReferenceData(FIXTURE_DIR));
}

/** Every signal present, resolvable and consistent: Amsterdam GPS next to the office access point. */
export function cleanRequest(sessionId = "sess-clean"): Record<string, unknown> {
  return {
    session_id: sessionId,
    ip_origin: { ip: "203.0.113.10" },
    gps: { lat: 52.37, lon: 4.9 },
    wifi_ap: { bssid: "aa:bb:cc:00:00:01" },
    device_posture: { device_id: "dev-1", patched: true },
    tls_fingerprint: { ja3: CLEAN_JA3 }
  };
}

export class InMemoryAlertStore implements AlertStore {
  readonly alerts: AlertRecord[] = [];
  putError?: Error;
  queryError?: Error;
  hangQueries = false;
  beforePut?: () => void;

  async putAlert(input: NewAlert): Promise<AlertRecord> {
    this.beforePut?.();
    if (this.putError) throw this.putError;
    const alert = buildAlert(input, NOW);
    this.alerts.push(alert);
    return alert;
  }

  queryAlertsForSession(sessionId: string, sinceIso: string, untilIso: string, _options?: QueryOptions): Promise<AlertRecord[]> {
    if (this.hangQueries) return new Promise<AlertRecord[]>(() => undefined);
    if (this.queryError) return Promise.reject(this.queryError);
    return Promise.resolve(
      this.alerts.filter((alert) => alert.sessionId === sessionId && alert.timestamp >= sinceIso && alert.timestamp <= untilIso)
    );
  }

  seed(sessionId: string, severity: Severity, minutesAgo: number, stride: StrideCategory = "DoS"): AlertRecord {
    const alert = buildAlert(
      { sessionId, severity, stride, source: "siem", reasons: [] },
      new Date(NOW.getTime() - minutesAgo * 60_000)
    );
    this.alerts.push(alert);
    return alert;
  }
}

export class InMemoryDecisionStore implements DecisionStore {
  readonly records: EnforcementRecord[] = [];
  putError?: Error;

  async putDecision(record: EnforcementRecord): Promise<void> {
    if (this.putError) throw this.putError;
    this.records.push(record);
  }
}

export class RecordingTelemetry implements Telemetry {
  readonly decisions: EnforcementRecord[] = [];
  readonly alerts: AlertRecord[] = [];
  failWith?: Error;
  hang = false;

  async recordDecision(record: EnforcementRecord): Promise<void> {
    if (this.hang) await new Promise<void>(() => undefined);
    if (this.failWith) throw this.failWith;
    this.decisions.push(record);
  }

  async forwardAlert(alert: AlertRecord): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.alerts.push(alert);
  }
}
