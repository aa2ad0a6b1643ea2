import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { DependencyError } from "../lib/errors";
import { getPipeline } from "../lib/pipeline";
import { buildSignalBundle } from "../lib/signals";

function response(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: { "Content-Type": "application/json", "Access-Control-Allow-Origin": "*" },
    body: JSON.stringify(body)
  };
}

export const handler = async (event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> => {
  let input: unknown;
  try {
    input = JSON.parse(event.body || "{}");
  } catch {
    return response(400, { error: "Request body must be valid JSON" });
  }

  try {
    const { gateway } = await getPipeline();
    const bundle = buildSignalBundle(input);
    const report = await gateway.inspect(bundle);
    return response(200, {
      validated: {
        vector: bundle,
        weights: report.validated.weights,
        reasons: report.validated.reasons
      },
      quality: report.quality,
      cross: report.cross,
      enrichment: report.enrichment
    });
  } catch (error) {
    if (error instanceof DependencyError) {
      console.error("validate_dependency_error", { dependency: error.dependency, error: error.message });
      return response(503, { error: "Validation unavailable" });
    }
    console.error("validate_error", error);
    return response(500, { error: "Internal server error" });
  }
};
