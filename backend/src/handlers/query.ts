import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { queryDecisionsForSession, queryLatestAlertsForSession } from "../lib/store";

function response(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: { "Content-Type": "application/json", "Access-Control-Allow-Origin": "*" },
    body: JSON.stringify(body)
  };
}

function limitOf(event: APIGatewayProxyEventV2): number {
  const limit = Number(event.queryStringParameters?.limit || "100");
  return Number.isFinite(limit) ? Math.min(Math.max(Math.floor(limit), 1), 500) : 100;
}

export const decisionsHandler = async (event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
  const sessionId = event.pathParameters?.sessionId;
  if (!sessionId) return response(400, { error: "sessionId is required" });
  try {
    const decisions = await queryDecisionsForSession(sessionId, limitOf(event));
    return response(200, { sessionId, decisions });
  } catch (error) {
    console.error("query_decisions_error", error);
    return response(500, { error: "Internal server error" });
  }
};

export const alertsHandler = async (event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
  const sessionId = event.pathParameters?.sessionId;
  if (!sessionId) return response(400, { error: "sessionId is required" });
  try {
    const alerts = await queryLatestAlertsForSession(sessionId, limitOf(event));
    return response(200, { sessionId, alerts });
  } catch (error) {
    console.error("query_alerts_error", error);
    return response(500, { error: "Internal server error" });
  }
};
