import { z } from "zod";
import { ConfigError } from "./errors";
import { SIGNAL_TYPES, isSignalType, SignalType } from "../types/models";

export type SignalWeightTable = Readonly<Record<SignalType, number>>;

export const DEFAULT_SIGNAL_WEIGHTS: SignalWeightTable = {
  ip_origin: 0.8,
  gps: 0.9,
  wifi_ap: 0.85,
  device_posture: 0.9,
  tls_fingerprint: 0.7
};

export interface ScoringConfig {
  baseRisk: number;
  allowThreshold: number;
  denyThreshold: number;
  siemHighBump: number;
  siemMediumBump: number;
}

export interface ValidationConfig {
  baseWeights: SignalWeightTable;
  expectedSignals: readonly SignalType[];
  signalMaxAgeSeconds: number;
  postureMaxAgeDays: number;
  locationMismatchCap: number;
  unresolvedPenalty: number;
}

export interface PipelineConfig {
  tableName: string;
  snsTopicArn?: string;
  metricNamespace: string;
  referenceDataDir?: string;
  stepUpSecret?: string;
  scoring: ScoringConfig;
  validation: ValidationConfig;
  crossCheckDistanceKm: number;
  alertWindowMinutes: number;
  alertThreshold: number;
  highSeverityThreshold: number;
  dependencyTimeoutMs: number;
  telemetryTimeoutMs: number;
}

const unit = z.coerce.number().min(0).max(1);
const positive = z.coerce.number().positive();

const EnvSchema = z.object({
  TABLE_NAME: z.string({ required_error: "Missing required environment variable: TABLE_NAME" }).min(1),
  SNS_TOPIC_ARN: z.string().min(1).optional(),
  METRIC_NAMESPACE: z.string().min(1).default("RiskGateway"),
  REFERENCE_DATA_DIR: z.string().min(1).optional(),
  STEP_UP_SECRET: z.string().min(1).optional(),
  ALLOW_T: unit.default(0.15),
  DENY_T: unit.default(0.8),
  ALERT_T: unit.default(0.25),
  HIGH_SEVERITY_T: unit.default(0.7),
  SIEM_HIGH_BUMP: unit.default(0.15),
  SIEM_MED_BUMP: unit.default(0.07),
  BASE_RISK: unit.default(0.05),
  ALERT_WINDOW_MINUTES: z.coerce.number().int().positive().default(15),
  CROSS_CHECK_DISTANCE_KM: positive.default(50),
  SIGNAL_WEIGHTS: z.string().optional(),
  EXPECTED_SIGNALS: z.string().optional(),
  SIGNAL_MAX_AGE_SECONDS: positive.default(300),
  POSTURE_MAX_AGE_DAYS: positive.default(30),
  LOCATION_MISMATCH_CAP: unit.default(0.2),
  UNRESOLVED_PENALTY: unit.default(0.5),
  DEPENDENCY_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  TELEMETRY_TIMEOUT_MS: z.coerce.number().int().positive().default(500)
});

function parseSignalList(raw: string | undefined): SignalType[] {
  if (!raw) return [];
  const out: SignalType[] = [];
  for (const entry of raw.split(",").map((part) => part.trim()).filter(Boolean)) {
    if (!isSignalType(entry)) throw new ConfigError(`EXPECTED_SIGNALS: unknown signal type "${entry}"`);
    if (!out.includes(entry)) out.push(entry);
  }
  return out;
}

/** `ip_origin:0.8,gps:0.9,...`; an override must name every signal type. */
export function parseWeightTable(raw: string | undefined): SignalWeightTable {
  if (raw === undefined) return DEFAULT_SIGNAL_WEIGHTS;

  const table: Partial<Record<SignalType, number>> = {};
  for (const pair of raw.split(",").map((part) => part.trim()).filter(Boolean)) {
    const [name, value] = pair.split(":").map((part) => part.trim());
    if (!name || !isSignalType(name)) throw new ConfigError(`SIGNAL_WEIGHTS: unknown signal type "${name ?? ""}"`);
    const weight = unit.safeParse(value);
    if (value === undefined || value === "" || !weight.success) {
      throw new ConfigError(`SIGNAL_WEIGHTS: weight for ${name} must be a number in [0, 1]`);
    }
    table[name] = weight.data;
  }

  const missing = SIGNAL_TYPES.filter((type) => table[type] === undefined);
  if (missing.length > 0) throw new ConfigError(`SIGNAL_WEIGHTS: missing weights for ${missing.join(", ")}`);

  return {
    ip_origin: table.ip_origin ?? 0,
    gps: table.gps ?? 0,
    wifi_ap: table.wifi_ap ?? 0,
    device_posture: table.device_posture ?? 0,
    tls_fingerprint: table.tls_fingerprint ?? 0
  };
}

export function loadConfig(source: Record<string, string | undefined>): PipelineConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  const env = parsed.data;

  if (env.ALLOW_T >= env.DENY_T) {
    throw new ConfigError(`ALLOW_T (${env.ALLOW_T}) must be lower than DENY_T (${env.DENY_T})`);
  }
  if (env.ALERT_T > env.HIGH_SEVERITY_T) {
    throw new ConfigError(`ALERT_T (${env.ALERT_T}) must not exceed HIGH_SEVERITY_T (${env.HIGH_SEVERITY_T})`);
  }

  const config: PipelineConfig = {
    tableName: env.TABLE_NAME,
    snsTopicArn: env.SNS_TOPIC_ARN,
    metricNamespace: env.METRIC_NAMESPACE,
    referenceDataDir: env.REFERENCE_DATA_DIR,
    stepUpSecret: env.STEP_UP_SECRET,
    scoring: {
      baseRisk: env.BASE_RISK,
      allowThreshold: env.ALLOW_T,
      denyThreshold: env.DENY_T,
      siemHighBump: env.SIEM_HIGH_BUMP,
      siemMediumBump: env.SIEM_MED_BUMP
    },
    validation: {
      baseWeights: parseWeightTable(env.SIGNAL_WEIGHTS),
      expectedSignals: parseSignalList(env.EXPECTED_SIGNALS),
      signalMaxAgeSeconds: env.SIGNAL_MAX_AGE_SECONDS,
      postureMaxAgeDays: env.POSTURE_MAX_AGE_DAYS,
      locationMismatchCap: env.LOCATION_MISMATCH_CAP,
      unresolvedPenalty: env.UNRESOLVED_PENALTY
    },
    crossCheckDistanceKm: env.CROSS_CHECK_DISTANCE_KM,
    alertWindowMinutes: env.ALERT_WINDOW_MINUTES,
    alertThreshold: env.ALERT_T,
    highSeverityThreshold: env.HIGH_SEVERITY_T,
    dependencyTimeoutMs: env.DEPENDENCY_TIMEOUT_MS,
    telemetryTimeoutMs: env.TELEMETRY_TIMEOUT_MS
  };
  return Object.freeze(config);
}

export const ENV = loadConfig(process.env);
