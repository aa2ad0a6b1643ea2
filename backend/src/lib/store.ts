import { PutCommand, QueryCommand, QueryCommandOutput } from "@aws-sdk/lib-dynamodb";
import { v4 as uuidv4 } from "uuid";
import { ddbDoc } from "./awsClients";
import { ENV } from "./env";
import { AlertRecord, EnforcementRecord, NewAlert } from "../types/models";

const ALERT_PK = "ALERT";
const DECISION_PK = "DECISION";
// sorts after "#" and every timestamp character
const RANGE_END = "~";

export interface QueryOptions {
  signal?: AbortSignal;
}

export interface AlertStore {
  putAlert(alert: NewAlert, options?: QueryOptions): Promise<AlertRecord>;
  queryAlertsForSession(sessionId: string, sinceIso: string, untilIso: string, options?: QueryOptions): Promise<AlertRecord[]>;
}

export interface DecisionStore {
  putDecision(record: EnforcementRecord, options?: QueryOptions): Promise<void>;
}

function sessionKey(sessionId: string): string {
  return `SESSION#${sessionId}`;
}

export function alertItem(alert: AlertRecord): Record<string, unknown> {
  return {
    pk: ALERT_PK,
    sk: `${alert.timestamp}#${alert.alertId}`,
    entityType: "ALERT",
    gsi1pk: sessionKey(alert.sessionId),
    gsi1sk: `ALERT#${alert.timestamp}#${alert.alertId}`,
    ...alert
  };
}

export function decisionItem(record: EnforcementRecord): Record<string, unknown> {
  return {
    pk: DECISION_PK,
    sk: `${record.timestamp}#${record.recordId}`,
    entityType: "DECISION",
    gsi1pk: sessionKey(record.sessionId),
    gsi1sk: `DECISION#${record.timestamp}#${record.recordId}`,
    ...record
  };
}

export function buildAlert(input: NewAlert, now: Date = new Date()): AlertRecord {
  return {
    alertId: uuidv4(),
    timestamp: now.toISOString(),
    ...input
  };
}

export async function putAlert(input: NewAlert, options: QueryOptions = {}): Promise<AlertRecord> {
  const alert = buildAlert(input);
  await ddbDoc.send(
    new PutCommand({
      TableName: ENV.tableName,
      Item: alertItem(alert),
      ConditionExpression: "attribute_not_exists(pk)"
    }),
    { abortSignal: options.signal }
  );
  return alert;
}

/** Append-only: an existing record with the same key is never overwritten. */
export async function putDecision(record: EnforcementRecord, options: QueryOptions = {}): Promise<void> {
  await ddbDoc.send(
    new PutCommand({
      TableName: ENV.tableName,
      Item: decisionItem(record),
      ConditionExpression: "attribute_not_exists(pk)"
    }),
    { abortSignal: options.signal }
  );
}

async function querySessionRange(
  sessionId: string,
  from: string,
  to: string,
  options: QueryOptions
): Promise<NonNullable<QueryCommandOutput["Items"]>> {
  const items: NonNullable<QueryCommandOutput["Items"]> = [];
  let startKey: QueryCommandOutput["LastEvaluatedKey"];
  do {
    const data = await ddbDoc.send(
      new QueryCommand({
        TableName: ENV.tableName,
        IndexName: "GSI1",
        KeyConditionExpression: "gsi1pk = :pk and gsi1sk between :from and :to",
        ExpressionAttributeValues: { ":pk": sessionKey(sessionId), ":from": from, ":to": to },
        ExclusiveStartKey: startKey
      }),
      { abortSignal: options.signal }
    );
    items.push(...(data.Items || []));
    startKey = data.LastEvaluatedKey;
  } while (startKey);
  return items;
}

export async function queryAlertsForSession(
  sessionId: string,
  sinceIso: string,
  untilIso: string,
  options: QueryOptions = {}
): Promise<AlertRecord[]> {
  const items = await querySessionRange(sessionId, `ALERT#${sinceIso}`, `ALERT#${untilIso}${RANGE_END}`, options);
  return items as AlertRecord[];
}

async function queryLatestForSession(
  sessionId: string,
  prefix: string,
  limit: number
): Promise<NonNullable<QueryCommandOutput["Items"]>> {
  const data = await ddbDoc.send(
    new QueryCommand({
      TableName: ENV.tableName,
      IndexName: "GSI1",
      KeyConditionExpression: "gsi1pk = :pk and begins_with(gsi1sk, :prefix)",
      ExpressionAttributeValues: { ":pk": sessionKey(sessionId), ":prefix": prefix },
      ScanIndexForward: false,
      Limit: limit
    })
  );
  return data.Items || [];
}

export async function queryDecisionsForSession(sessionId: string, limit = 100): Promise<EnforcementRecord[]> {
  return (await queryLatestForSession(sessionId, "DECISION#", limit)) as EnforcementRecord[];
}

export async function queryLatestAlertsForSession(sessionId: string, limit = 100): Promise<AlertRecord[]> {
  return (await queryLatestForSession(sessionId, "ALERT#", limit)) as AlertRecord[];
}

export const dynamoAlertStore: AlertStore = { putAlert, queryAlertsForSession };
export const dynamoDecisionStore: DecisionStore = { putDecision };
