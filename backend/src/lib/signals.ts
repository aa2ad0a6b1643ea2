import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import { SIGNAL_TYPES, isSignalType, SignalBundle, SignalPayload, SignalType } from "../types/models";

const observedAt = z.union([z.string().min(1), z.number()]).optional();

export const SignalPayloadSchemas = {
  ip_origin: z.object({ ip: z.string().ip(), observed_at: observedAt }).passthrough(),
  gps: z
    .object({
      lat: z.number().min(-90).max(90),
      lon: z.number().min(-180).max(180),
      accuracy_m: z.number().nonnegative().optional(),
      observed_at: observedAt
    })
    .passthrough(),
  wifi_ap: z
    .object({
      bssid: z.string().regex(/^[0-9a-f]{2}([:-][0-9a-f]{2}){5}$/i),
      ssid: z.string().optional(),
      observed_at: observedAt
    })
    .passthrough(),
  device_posture: z
    .object({
      device_id: z.string().min(1),
      os: z.string().optional(),
      patched: z.boolean().optional(),
      rooted: z.boolean().optional(),
      emulator: z.boolean().optional(),
      last_update: z.string().optional(),
      observed_at: observedAt
    })
    .passthrough(),
  tls_fingerprint: z.object({ ja3: z.string().regex(/^[0-9a-f]{32}$/i), observed_at: observedAt }).passthrough()
} satisfies Record<SignalType, z.ZodTypeAny>;

/** Keys the earlier collector releases still send. */
const LEGACY_KEYS: Readonly<Record<string, SignalType>> = {
  ip_geo: "ip_origin",
  wifi_bssid: "wifi_ap",
  tls_fp: "tls_fingerprint"
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function signalTypeOf(key: string): SignalType | undefined {
  return isSignalType(key) ? key : LEGACY_KEYS[key];
}

export function newSessionId(): string {
  return `sess-${uuidv4()}`;
}

/**
 * Builds the immutable bundle for one authentication attempt. Signal payloads
 * are not validated here; a payload that is not an object is kept empty so
 * the validator reports it instead of the request failing.
 */
export function buildSignalBundle(input: unknown, receivedAt: Date = new Date()): SignalBundle {
  const body = isRecord(input) ? input : {};
  const signals: Partial<Record<SignalType, SignalPayload>> = {};

  for (const [key, value] of Object.entries(body)) {
    const type = signalTypeOf(key);
    if (!type) continue;
    // canonical keys win over legacy aliases
    if (signals[type] && key !== type) continue;
    signals[type] = Object.freeze(isRecord(value) ? { ...value } : {});
  }

  const sessionId = typeof body.session_id === "string" && body.session_id.trim() ? body.session_id.trim() : newSessionId();
  const label = typeof body.label === "string" && body.label.trim() ? body.label.trim() : undefined;

  return Object.freeze({
    session_id: sessionId,
    signals: Object.freeze(signals),
    ...(label ? { label } : {}),
    received_at: receivedAt.toISOString()
  });
}

export function observedSignalTypes(bundle: SignalBundle): SignalType[] {
  return SIGNAL_TYPES.filter((type) => bundle.signals[type] !== undefined);
}
