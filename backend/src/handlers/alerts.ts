import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { z } from "zod";
import { ENV } from "../lib/env";
import { errorMessage } from "../lib/errors";
import { getPipeline } from "../lib/pipeline";
import { normalizeSeverity, normalizeStride } from "../lib/taxonomy";

const MAX_WINDOW_MINUTES = 24 * 60;

function response(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: { "Content-Type": "application/json", "Access-Control-Allow-Origin": "*" },
    body: JSON.stringify(body)
  };
}

const IncomingAlertSchema = z.object({
  session_id: z.string().trim().min(1, "session_id is required"),
  severity: z.unknown().optional(),
  stride: z.unknown().optional(),
  source: z.string().trim().min(1).optional(),
  raw: z.record(z.unknown()).optional()
});

export const ingestHandler = async (event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
  let input: unknown;
  try {
    input = JSON.parse(event.body || "{}");
  } catch {
    return response(400, { error: "Request body must be valid JSON" });
  }
  const parsed = IncomingAlertSchema.safeParse(input);
  if (!parsed.success) return response(400, { error: parsed.error.issues[0]?.message ?? "Invalid alert" });

  try {
    const { alerts, telemetry } = await getPipeline();
    const body = parsed.data;
    const alert = await alerts.putAlert({
      sessionId: body.session_id,
      severity: normalizeSeverity(body.severity),
      stride: normalizeStride(body.stride),
      source: body.source ?? "siem",
      reasons: [],
      ...(body.raw ? { raw: body.raw } : {})
    });

    if (telemetry) {
      try {
        await telemetry.forwardAlert(alert);
      } catch (error) {
        console.warn("telemetry_error", { alertId: alert.alertId, error: errorMessage(error) });
      }
    }

    return response(201, { ok: true, alert });
  } catch (error) {
    console.error("alert_ingest_error", error);
    return response(500, { error: "Internal server error" });
  }
};

export const aggregateHandler = async (event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
  const sessionId = event.queryStringParameters?.session_id?.trim();
  if (!sessionId) return response(400, { error: "session_id is required" });

  const minutes = Number(event.queryStringParameters?.minutes || String(ENV.alertWindowMinutes));
  if (!Number.isFinite(minutes) || minutes <= 0) return response(400, { error: "minutes must be a positive number" });

  try {
    const { aggregator } = await getPipeline();
    const counts = await aggregator.countRecent(sessionId, Math.min(Math.floor(minutes) || 1, MAX_WINDOW_MINUTES));
    return response(200, counts);
  } catch (error) {
    console.error("alert_aggregate_error", error);
    return response(500, { error: "Internal server error" });
  }
};
