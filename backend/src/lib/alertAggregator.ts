import { AlertWindowCount, StrideCategory } from "../types/models";
import type { AlertStore, QueryOptions } from "./store";
import { STRIDE_ORDER } from "./taxonomy";

/**
 * Counts the alerts raised for a session over a trailing window. Every query
 * recomputes from the store; there is no running total to drift.
 */
export class AlertAggregator {
  constructor(
    private readonly store: Pick<AlertStore, "queryAlertsForSession">,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async countRecent(sessionId: string, windowMinutes: number, options: QueryOptions = {}): Promise<AlertWindowCount> {
    const until = this.clock();
    const since = new Date(until.getTime() - windowMinutes * 60_000);
    const alerts = await this.store.queryAlertsForSession(sessionId, since.toISOString(), until.toISOString(), options);

    const counts: AlertWindowCount = { session_id: sessionId, window_minutes: windowMinutes, high: 0, medium: 0, low: 0 };
    const strides = new Map<StrideCategory, number>();
    for (const alert of alerts) {
      if (alert.severity === "high" || alert.severity === "medium" || alert.severity === "low") counts[alert.severity] += 1;
      if (alert.severity !== "low") strides.set(alert.stride, (strides.get(alert.stride) ?? 0) + 1);
    }

    let dominant: StrideCategory | undefined;
    // ties go to the earlier STRIDE category
    for (const category of STRIDE_ORDER) {
      const seen = strides.get(category) ?? 0;
      if (seen > 0 && (!dominant || seen > (strides.get(dominant) ?? 0))) dominant = category;
    }
    return dominant ? { ...counts, dominant_stride: dominant } : counts;
  }
}
