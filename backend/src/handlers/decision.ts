import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from "aws-lambda";
import { PipelineCancelledError, errorMessage } from "../lib/errors";
import { failSafeRecord } from "../lib/gateway";
import { getPipeline } from "../lib/pipeline";
import { buildSignalBundle } from "../lib/signals";
import { GatewayDecision } from "../types/models";

// stop scoring early enough to still answer before Lambda kills the invocation
const RESPONSE_MARGIN_MS = 500;

function response(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: { "Content-Type": "application/json", "Access-Control-Allow-Origin": "*" },
    body: JSON.stringify(body)
  };
}

export function decisionBody({ record, persistence, alert, challengeToken }: GatewayDecision) {
  return {
    session_id: record.sessionId,
    record_id: record.recordId,
    enforcement: record.enforcement,
    decision: record.decision,
    risk: record.risk,
    confidence: record.confidence,
    reasons: record.reasons,
    stride_categories: record.strideCategories,
    fail_safe: record.failSafe,
    persistence,
    ...(alert ? { alert_id: alert.alertId } : {}),
    ...(challengeToken ? { challenge_token: challengeToken } : {})
  };
}

export const handler = async (
  event: APIGatewayProxyEventV2,
  context?: Pick<Context, "getRemainingTimeInMillis">
): Promise<APIGatewayProxyStructuredResultV2> => {
  let input: unknown;
  try {
    input = JSON.parse(event.body || "{}");
  } catch {
    return response(400, { error: "Request body must be valid JSON" });
  }

  const bundle = buildSignalBundle(input);
  try {
    const { gateway } = await getPipeline();
    const signal = context ? AbortSignal.timeout(Math.max(context.getRemainingTimeInMillis() - RESPONSE_MARGIN_MS, 1)) : undefined;
    const result = await gateway.decide(bundle, { signal });
    return response(200, decisionBody(result));
  } catch (error) {
    if (error instanceof PipelineCancelledError) {
      console.warn("decision_cancelled", { error: error.message });
      return response(503, { error: "Decision cancelled" });
    }
    // without a pipeline there is nowhere to record the decision
    console.error("decision_fail_safe", { sessionId: bundle.session_id, error: errorMessage(error) });
    const record = failSafeRecord(bundle.session_id);
    return response(200, decisionBody({ record, persistence: { ok: false, error: errorMessage(error) } }));
  }
};
