import { AnomalyReason, ReasonCode, Severity, SignalType, StrideCategory } from "../types/models";

export const STRIDE_ORDER: readonly StrideCategory[] = [
  "Spoofing",
  "Tampering",
  "Repudiation",
  "InformationDisclosure",
  "DoS",
  "EoP"
];

export const REASON_STRIDE: Readonly<Record<ReasonCode, StrideCategory>> = {
  SIGNAL_MISSING: "Spoofing",
  SIGNAL_MALFORMED: "Tampering",
  SIGNAL_STALE: "Spoofing",
  INSUFFICIENT_SIGNAL: "Spoofing",
  LOCATION_MISMATCH: "Spoofing",
  TLS_ANOMALY: "Tampering",
  DEVICE_TAMPERED: "Tampering",
  POSTURE_OUTDATED: "Tampering",
  POLICY_ELEVATION: "EoP",
  DOWNLOAD_EXFIL: "InformationDisclosure",
  DOS: "DoS",
  BRUTE_FORCE: "DoS",
  CREDENTIAL_STUFFING: "Repudiation",
  RECONNAISSANCE: "InformationDisclosure"
};

export interface ReasonWeight {
  increment: number;
  /** Evidence reported by a single signal is trusted only as far as that signal is. */
  scaleBySignalWeight: boolean;
}

export const REASON_INCREMENTS: Readonly<Record<ReasonCode, ReasonWeight>> = {
  SIGNAL_MISSING: { increment: 0.03, scaleBySignalWeight: false },
  SIGNAL_MALFORMED: { increment: 0.05, scaleBySignalWeight: false },
  SIGNAL_STALE: { increment: 0.04, scaleBySignalWeight: false },
  INSUFFICIENT_SIGNAL: { increment: 0.2, scaleBySignalWeight: false },
  LOCATION_MISMATCH: { increment: 0.3, scaleBySignalWeight: false },
  TLS_ANOMALY: { increment: 0.2, scaleBySignalWeight: true },
  DEVICE_TAMPERED: { increment: 0.35, scaleBySignalWeight: true },
  POSTURE_OUTDATED: { increment: 0.08, scaleBySignalWeight: true },
  POLICY_ELEVATION: { increment: 0.25, scaleBySignalWeight: false },
  DOWNLOAD_EXFIL: { increment: 0.2, scaleBySignalWeight: false },
  DOS: { increment: 0.55, scaleBySignalWeight: false },
  BRUTE_FORCE: { increment: 0.35, scaleBySignalWeight: false },
  CREDENTIAL_STUFFING: { increment: 0.18, scaleBySignalWeight: false },
  RECONNAISSANCE: { increment: 0.12, scaleBySignalWeight: false }
};

const LABEL_REASONS: Readonly<Record<string, readonly ReasonCode[]>> = {
  BENIGN: [],
  DOS: ["DOS"],
  DDOS: ["DOS"],
  DOS_HULK: ["DOS"],
  DOS_GOLDENEYE: ["DOS"],
  DOS_SLOWLORIS: ["DOS"],
  DOS_SLOWHTTPTEST: ["DOS"],
  FTP_PATATOR: ["BRUTE_FORCE"],
  SSH_PATATOR: ["BRUTE_FORCE"],
  BRUTEFORCE: ["BRUTE_FORCE"],
  BRUTE_FORCE: ["BRUTE_FORCE"],
  WEB_ATTACK_BRUTE_FORCE: ["BRUTE_FORCE"],
  CREDENTIAL_STUFFING: ["CREDENTIAL_STUFFING"],
  WEB_ATTACK_XSS: ["POLICY_ELEVATION"],
  WEB_ATTACK_SQL_INJECTION: ["POLICY_ELEVATION"],
  INFILTRATION: ["DOWNLOAD_EXFIL", "POLICY_ELEVATION"],
  INFILTERATION: ["DOWNLOAD_EXFIL", "POLICY_ELEVATION"],
  BOT: ["DOWNLOAD_EXFIL"],
  BOTNET: ["DOWNLOAD_EXFIL"],
  PORTSCAN: ["RECONNAISSANCE"],
  HEARTBLEED: ["DOWNLOAD_EXFIL", "TLS_ANOMALY"]
};

/** "Web Attack – Brute Force" → "WEB_ATTACK_BRUTE_FORCE" */
export function normalizeLabel(label: string): string {
  return label
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** Unknown labels classify to nothing. */
export function reasonsForLabel(label: string | undefined): ReasonCode[] {
  if (!label) return [];
  return [...(LABEL_REASONS[normalizeLabel(label)] ?? [])];
}

export function reasonKey(reason: AnomalyReason): string {
  return reason.signal ? `${reason.code}:${reason.signal}` : reason.code;
}

/** Ordered set insert: the first occurrence of a (code, signal) pair wins. */
export function addReason(reasons: AnomalyReason[], code: ReasonCode, signal?: SignalType): void {
  const candidate: AnomalyReason = signal ? { code, signal } : { code };
  const key = reasonKey(candidate);
  if (!reasons.some((existing) => reasonKey(existing) === key)) reasons.push(candidate);
}

export function strideCategoriesOf(reasons: readonly AnomalyReason[]): StrideCategory[] {
  const present = new Set(reasons.map((reason) => REASON_STRIDE[reason.code]));
  return STRIDE_ORDER.filter((category) => present.has(category));
}

const STRIDE_ALIASES: Readonly<Record<string, StrideCategory>> = {
  spoofing: "Spoofing",
  tampering: "Tampering",
  repudiation: "Repudiation",
  informationdisclosure: "InformationDisclosure",
  dos: "DoS",
  denialofservice: "DoS",
  eop: "EoP",
  elevationofprivilege: "EoP"
};

export function normalizeStride(value: unknown): StrideCategory {
  const key = String(value ?? "")
    .replace(/[\s_-]/g, "")
    .toLowerCase();
  return STRIDE_ALIASES[key] ?? "InformationDisclosure";
}

/** SIEM feeds also send "critical" and "info"; the alert store keeps three levels. */
export function normalizeSeverity(value: unknown): Severity {
  const key = String(value ?? "").trim().toLowerCase();
  if (key === "critical" || key === "high") return "high";
  if (key === "low" || key === "info" || key === "informational") return "low";
  return "medium";
}
