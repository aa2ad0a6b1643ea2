import { PutMetricDataCommand } from "@aws-sdk/client-cloudwatch";
import { PublishCommand } from "@aws-sdk/client-sns";
import { cloudWatch, sns } from "./awsClients";
import { ENV } from "./env";
import { AlertRecord, EnforcementRecord } from "../types/models";

/** Side channel for dashboards and downstream responders. Callers must not depend on it succeeding. */
export interface Telemetry {
  recordDecision(record: EnforcementRecord): Promise<void>;
  forwardAlert(alert: AlertRecord): Promise<void>;
}

export async function publishDecisionMetric(record: EnforcementRecord): Promise<void> {
  await cloudWatch.send(
    new PutMetricDataCommand({
      Namespace: ENV.metricNamespace,
      MetricData: [
        {
          MetricName: "RiskDecisions",
          Value: 1,
          Unit: "Count",
          Dimensions: [
            { Name: "Enforcement", Value: record.enforcement },
            { Name: "FailSafe", Value: String(record.failSafe) }
          ]
        },
        {
          MetricName: "RiskScore",
          Value: record.risk,
          Unit: "None",
          Dimensions: [{ Name: "Enforcement", Value: record.enforcement }]
        }
      ]
    })
  );
}

export async function publishAlert(alert: AlertRecord): Promise<void> {
  await cloudWatch.send(
    new PutMetricDataCommand({
      Namespace: ENV.metricNamespace,
      MetricData: [
        {
          MetricName: "SecurityAlerts",
          Value: 1,
          Unit: "Count",
          Dimensions: [
            { Name: "Stride", Value: alert.stride },
            { Name: "Severity", Value: alert.severity }
          ]
        }
      ]
    })
  );

  if (!ENV.snsTopicArn) return;

  await sns.send(
    new PublishCommand({
      TopicArn: ENV.snsTopicArn,
      Subject: `[RiskGateway] ${alert.stride} (${alert.severity})`,
      Message: JSON.stringify(alert, null, 2)
    })
  );
}

export const cloudWatchTelemetry: Telemetry = {
  recordDecision: publishDecisionMetric,
  forwardAlert: publishAlert
};
