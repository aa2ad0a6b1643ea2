import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { ReferenceDataError, errorMessage } from "./errors";
import { GeoAnnotation, PostureAnnotation, WifiAnnotation } from "../types/models";

export const REFERENCE_FILES = {
  geoip: "geoip.json",
  wifi: "wifi.json",
  tls: "tls.json",
  devices: "devices.json"
} as const;

export type ReferenceTable = keyof typeof REFERENCE_FILES;

const GeoIpEntrySchema = z.object({
  cidr: z.string().min(1),
  country: z.string().optional(),
  city: z.string().optional(),
  lat: z.number().min(-90).max(90).optional(),
  lon: z.number().min(-180).max(180).optional()
});

const WifiEntrySchema = z.object({
  bssid: z.string().min(1),
  ssid: z.string().optional(),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180)
});

const TlsEntrySchema = z.object({
  ja3: z.string().min(1),
  tag: z.string()
});

const DeviceEntrySchema = z.object({
  device_id: z.string().min(1),
  os: z.string().optional(),
  patched: z.boolean().optional(),
  edr: z.string().optional(),
  last_update: z.string().optional()
});

export interface ReferenceTables {
  geoip: z.infer<typeof GeoIpEntrySchema>[];
  wifi: z.infer<typeof WifiEntrySchema>[];
  tls: z.infer<typeof TlsEntrySchema>[];
  devices: z.infer<typeof DeviceEntrySchema>[];
}

/** JA3 reputation tags that mark a client as suspicious. */
export const SUSPICIOUS_TLS_TAGS: ReadonlySet<string> = new Set([
  "tor_suspect",
  "malware_family_x",
  "scanner_tool",
  "cloud_proxy",
  "old_openssl",
  "insecure_client",
  "honeypot_fingerprint"
]);

interface Ipv4Block {
  network: number;
  prefix: number;
  geo: GeoAnnotation;
}

function parseIpv4(ip: string): number | undefined {
  const parts = ip.split(".");
  if (parts.length !== 4) return undefined;
  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return undefined;
    const octet = Number(part);
    if (octet > 255) return undefined;
    value = value * 256 + octet;
  }
  return value;
}

function maskOf(prefix: number): number {
  return prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
}

export function normalizeBssid(bssid: string): string {
  return bssid.trim().toLowerCase().replace(/-/g, ":");
}

function geoOf(entry: z.infer<typeof GeoIpEntrySchema>): GeoAnnotation {
  const { cidr: _cidr, ...geo } = entry;
  return Object.freeze(geo);
}

/**
 * Immutable view over the reference datasets. Instances are never mutated;
 * a reload builds a new snapshot.
 */
export class ReferenceDataSnapshot {
  private readonly ipv4Blocks: Ipv4Block[] = [];
  private readonly exactIps = new Map<string, GeoAnnotation>();
  private readonly wifi = new Map<string, WifiAnnotation>();
  private readonly tls = new Map<string, string>();
  private readonly devices = new Map<string, PostureAnnotation>();

  constructor(
    tables: Partial<ReferenceTables>,
    readonly loadedAt: string = new Date().toISOString()
  ) {
    for (const entry of tables.geoip ?? []) {
      const [address, prefixText] = entry.cidr.split("/");
      const network = parseIpv4(address);
      const prefix = prefixText === undefined ? 32 : Number(prefixText);
      if (network === undefined || !Number.isInteger(prefix) || prefix < 0 || prefix > 32) {
        this.exactIps.set(entry.cidr.toLowerCase(), geoOf(entry));
        continue;
      }
      this.ipv4Blocks.push({ network: (network & maskOf(prefix)) >>> 0, prefix, geo: geoOf(entry) });
    }
    this.ipv4Blocks.sort((a, b) => b.prefix - a.prefix);

    for (const entry of tables.wifi ?? []) {
      this.wifi.set(normalizeBssid(entry.bssid), Object.freeze({ ssid: entry.ssid, lat: entry.lat, lon: entry.lon }));
    }
    for (const entry of tables.tls ?? []) {
      this.tls.set(entry.ja3.trim().toLowerCase(), entry.tag.trim().toLowerCase());
    }
    for (const { device_id, ...posture } of tables.devices ?? []) {
      this.devices.set(device_id, Object.freeze(posture));
    }
  }

  static empty(): ReferenceDataSnapshot {
    return new ReferenceDataSnapshot({});
  }

  get sizes(): Record<ReferenceTable, number> {
    return {
      geoip: this.ipv4Blocks.length + this.exactIps.size,
      wifi: this.wifi.size,
      tls: this.tls.size,
      devices: this.devices.size
    };
  }

  lookupIp(ip: string): GeoAnnotation | undefined {
    const exact = this.exactIps.get(ip.trim().toLowerCase());
    if (exact) return exact;
    const value = parseIpv4(ip.trim());
    if (value === undefined) return undefined;
    return this.ipv4Blocks.find((block) => ((value & maskOf(block.prefix)) >>> 0) === block.network)?.geo;
  }

  lookupWifi(bssid: string): WifiAnnotation | undefined {
    return this.wifi.get(normalizeBssid(bssid));
  }

  lookupTlsTag(ja3: string): string | undefined {
    return this.tls.get(ja3.trim().toLowerCase());
  }

  lookupDevice(deviceId: string): PostureAnnotation | undefined {
    return this.devices.get(deviceId);
  }
}

async function readTable<T>(dir: string, table: ReferenceTable, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
  const file = path.join(dir, REFERENCE_FILES[table]);
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      console.warn("reference_data_missing", { table, file });
      return [];
    }
    throw new ReferenceDataError(`Cannot read ${file}: ${errorMessage(error)}`, file);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ReferenceDataError(`Invalid JSON in ${file}: ${errorMessage(error)}`, file);
  }

  const parsed = z.array(schema).safeParse(json);
  if (!parsed.success) {
    throw new ReferenceDataError(`Invalid ${table} reference data in ${file}: ${parsed.error.issues[0]?.message}`, file);
  }
  return parsed.data;
}

export async function loadReferenceData(dir: string): Promise<ReferenceDataSnapshot> {
  const [geoip, wifi, tls, devices] = await Promise.all([
    readTable(dir, "geoip", GeoIpEntrySchema),
    readTable(dir, "wifi", WifiEntrySchema),
    readTable(dir, "tls", TlsEntrySchema),
    readTable(dir, "devices", DeviceEntrySchema)
  ]);
  return new ReferenceDataSnapshot({ geoip, wifi, tls, devices });
}

/**
 * Holds the snapshot in use. `reload` only swaps the pointer once the new
 * snapshot is complete, so a request never sees a half-loaded dataset.
 */
export class ReferenceDataRegistry {
  private snapshot: ReferenceDataSnapshot;
  private failure?: ReferenceDataError;

  /** A registry whose first load failed. Lookups throw until a reload succeeds. */
  static unavailable(error: unknown, loader: () => Promise<ReferenceDataSnapshot>): ReferenceDataRegistry {
    const registry = new ReferenceDataRegistry(ReferenceDataSnapshot.empty(), loader);
    registry.failure = new ReferenceDataError(
      `Reference data unavailable: ${errorMessage(error)}`,
      error instanceof ReferenceDataError ? error.file : undefined
    );
    return registry;
  }

  constructor(
    initial: ReferenceDataSnapshot,
    private readonly loader: () => Promise<ReferenceDataSnapshot> = async () => initial
  ) {
    this.snapshot = initial;
  }

  get available(): boolean {
    return this.failure === undefined;
  }

  current(): ReferenceDataSnapshot {
    if (this.failure) throw this.failure;
    return this.snapshot;
  }

  async reload(): Promise<ReferenceDataSnapshot> {
    const next = await this.loader();
    this.snapshot = next;
    this.failure = undefined;
    console.log("reference_data_reloaded", { loadedAt: next.loadedAt, sizes: next.sizes });
    return next;
  }
}
