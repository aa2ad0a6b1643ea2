export const SIGNAL_TYPES = ["ip_origin", "gps", "wifi_ap", "device_posture", "tls_fingerprint"] as const;
export type SignalType = (typeof SIGNAL_TYPES)[number];

export function isSignalType(value: string): value is SignalType {
  return SIGNAL_TYPES.some((type) => type === value);
}

export type SignalPayload = Readonly<Record<string, unknown>>;

export interface SignalBundle {
  readonly session_id: string;
  readonly signals: Readonly<Partial<Record<SignalType, SignalPayload>>>;
  /** Network-flow classification, only present in evaluation or when an upstream sensor supplies it. */
  readonly label?: string;
  readonly received_at: string;
}

export interface GeoAnnotation {
  country?: string;
  city?: string;
  lat?: number;
  lon?: number;
}

export interface WifiAnnotation {
  ssid?: string;
  lat: number;
  lon: number;
}

export interface TlsAnnotation {
  tag: string;
  suspicious: boolean;
}

export interface PostureAnnotation {
  os?: string;
  patched?: boolean;
  edr?: string;
  last_update?: string;
}

export interface ConsistencyCheck {
  metric_name: "gps_wifi_distance_km" | "gps_ip_distance_km";
  value: number;
  threshold: number;
  signals: readonly [SignalType, SignalType];
}

export interface EnrichmentResult {
  ip_origin?: GeoAnnotation;
  wifi_ap?: WifiAnnotation;
  tls_fingerprint?: TlsAnnotation;
  device_posture?: PostureAnnotation;
  checks: ConsistencyCheck[];
}

export type StrideCategory =
  | "Spoofing"
  | "Tampering"
  | "Repudiation"
  | "InformationDisclosure"
  | "DoS"
  | "EoP";

export type ReasonCode =
  | "SIGNAL_MISSING"
  | "SIGNAL_MALFORMED"
  | "SIGNAL_STALE"
  | "INSUFFICIENT_SIGNAL"
  | "LOCATION_MISMATCH"
  | "TLS_ANOMALY"
  | "DEVICE_TAMPERED"
  | "POSTURE_OUTDATED"
  | "POLICY_ELEVATION"
  | "DOWNLOAD_EXFIL"
  | "DOS"
  | "BRUTE_FORCE"
  | "CREDENTIAL_STUFFING"
  | "RECONNAISSANCE";

export interface AnomalyReason {
  code: ReasonCode;
  signal?: SignalType;
}

export type SignalWeights = Partial<Record<SignalType, number>>;

export interface ValidatedVector {
  signals: SignalBundle;
  weights: SignalWeights;
  reasons: AnomalyReason[];
}

export type QualityStatus = "ok" | "absent" | "malformed" | "stale";

export interface ValidationReport {
  validated: ValidatedVector;
  quality: Record<SignalType, QualityStatus>;
  cross: Array<ConsistencyCheck & { exceeded: boolean }>;
  enrichment: EnrichmentResult;
}

export type Decision = "ALLOW" | "STEP_UP" | "DENY";
export type Enforcement = "ALLOW" | "MFA_STEP_UP" | "DENY";
export type Severity = "low" | "medium" | "high";

export interface RiskComponents {
  base: number;
  reasons: number;
  alerts: number;
  confidence_adjustment: number;
}

export interface RiskAssessment {
  session_id: string;
  risk: number;
  decision: Decision;
  stride_categories: StrideCategory[];
  dominant_stride?: StrideCategory;
  confidence: number;
  components: RiskComponents;
}

export interface AlertWindowCount {
  session_id: string;
  window_minutes: number;
  high: number;
  medium: number;
  low: number;
  /** Most frequent category among the window's high and medium alerts. */
  dominant_stride?: StrideCategory;
}

export interface AlertRecord {
  alertId: string;
  sessionId: string;
  timestamp: string;
  severity: Severity;
  stride: StrideCategory;
  source: string;
  risk?: number;
  reasons: string[];
  raw?: Record<string, unknown>;
}

export type NewAlert = Omit<AlertRecord, "alertId" | "timestamp">;

export interface EnforcementRecord {
  recordId: string;
  sessionId: string;
  timestamp: string;
  risk: number;
  decision: Decision;
  enforcement: Enforcement;
  reasons: string[];
  strideCategories: StrideCategory[];
  confidence: number;
  failSafe: boolean;
}

export interface PersistenceStatus {
  ok: boolean;
  error?: string;
}

export interface GatewayDecision {
  record: EnforcementRecord;
  persistence: PersistenceStatus;
  alert?: AlertRecord;
  challengeToken?: string;
}
