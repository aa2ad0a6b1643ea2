import { describe, expect, it } from "vitest";
import { alertItem, buildAlert, decisionItem } from "../src/lib/store";
import { EnforcementRecord } from "../src/types/models";
import { NOW } from "./helpers";

describe("single-table items", () => {
  it("keys alerts by time and indexes them by session", () => {
    const alert = buildAlert({ sessionId: "sess-1", severity: "high", stride: "DoS", source: "siem", reasons: [] }, NOW);

    expect(alert.timestamp).toBe("2026-10-18T12:00:00.000Z");
    expect(alert.alertId).toMatch(/^[0-9a-f-]{36}$/);
    expect(alertItem(alert)).toEqual({
      pk: "ALERT",
      sk: `2026-10-18T12:00:00.000Z#${alert.alertId}`,
      entityType: "ALERT",
      gsi1pk: "SESSION#sess-1",
      gsi1sk: `ALERT#2026-10-18T12:00:00.000Z#${alert.alertId}`,
      ...alert
    });
  });

  it("keys decisions the same way under their own prefix", () => {
    const record: EnforcementRecord = {
      recordId: "rec-1",
      sessionId: "sess-1",
      timestamp: "2026-10-18T12:00:00.000Z",
      risk: 1,
      decision: "DENY",
      enforcement: "DENY",
      reasons: ["DEPENDENCY_UNAVAILABLE"],
      strideCategories: [],
      confidence: 0,
      failSafe: true
    };

    expect(decisionItem(record)).toMatchObject({
      pk: "DECISION",
      sk: "2026-10-18T12:00:00.000Z#rec-1",
      entityType: "DECISION",
      gsi1pk: "SESSION#sess-1",
      gsi1sk: "DECISION#2026-10-18T12:00:00.000Z#rec-1",
      failSafe: true
    });
  });
});
