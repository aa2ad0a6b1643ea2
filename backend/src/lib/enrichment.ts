import { ConsistencyCheck, EnrichmentResult, SignalBundle } from "../types/models";
import { ReferenceDataRegistry, SUSPICIOUS_TLS_TAGS } from "./referenceData";
import { SignalPayloadSchemas } from "./signals";

const EARTH_RADIUS_KM = 6371;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function haversineKm(aLat: number, aLon: number, bLat: number, bLon: number): number {
  const dLat = toRadians(bLat - aLat);
  const dLon = toRadians(bLon - aLon);
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(toRadians(aLat)) * Math.cos(toRadians(bLat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export interface EnrichmentOptions {
  distanceThresholdKm: number;
}

/**
 * Resolves auxiliary context for a bundle from the reference snapshot. Pure
 * with respect to the snapshot it reads; the snapshot is read once per call.
 */
export class SignalEnrichmentResolver {
  constructor(
    private readonly registry: ReferenceDataRegistry,
    private readonly options: EnrichmentOptions
  ) {}

  enrich(bundle: SignalBundle): EnrichmentResult {
    const reference = this.registry.current();
    const out: EnrichmentResult = { checks: [] };

    const ip = SignalPayloadSchemas.ip_origin.safeParse(bundle.signals.ip_origin);
    if (ip.success) {
      const geo = reference.lookupIp(ip.data.ip);
      if (geo) out.ip_origin = { ...geo };
    }

    const wifi = SignalPayloadSchemas.wifi_ap.safeParse(bundle.signals.wifi_ap);
    if (wifi.success) {
      const ap = reference.lookupWifi(wifi.data.bssid);
      if (ap) out.wifi_ap = { ...ap };
    }

    const tls = SignalPayloadSchemas.tls_fingerprint.safeParse(bundle.signals.tls_fingerprint);
    if (tls.success) {
      const tag = reference.lookupTlsTag(tls.data.ja3);
      if (tag) out.tls_fingerprint = { tag, suspicious: SUSPICIOUS_TLS_TAGS.has(tag) };
    }

    const device = SignalPayloadSchemas.device_posture.safeParse(bundle.signals.device_posture);
    if (device.success) {
      const posture = reference.lookupDevice(device.data.device_id);
      if (posture) out.device_posture = { ...posture };
    }

    const gps = SignalPayloadSchemas.gps.safeParse(bundle.signals.gps);
    if (gps.success) {
      const check = this.locationCheck(gps.data.lat, gps.data.lon, out);
      if (check) out.checks.push(check);
    }

    return out;
  }

  // Wi-Fi placement is finer-grained than IP geolocation, so it is preferred.
  private locationCheck(lat: number, lon: number, out: EnrichmentResult): ConsistencyCheck | undefined {
    const threshold = this.options.distanceThresholdKm;
    if (out.wifi_ap) {
      return {
        metric_name: "gps_wifi_distance_km",
        value: roundTo(haversineKm(lat, lon, out.wifi_ap.lat, out.wifi_ap.lon), 3),
        threshold,
        signals: ["gps", "wifi_ap"]
      };
    }
    const geo = out.ip_origin;
    if (geo?.lat !== undefined && geo.lon !== undefined) {
      return {
        metric_name: "gps_ip_distance_km",
        value: roundTo(haversineKm(lat, lon, geo.lat, geo.lon), 3),
        threshold,
        signals: ["gps", "ip_origin"]
      };
    }
    return undefined;
  }
}
