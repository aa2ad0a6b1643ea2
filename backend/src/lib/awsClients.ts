import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { SNSClient } from "@aws-sdk/client-sns";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

// one retry fits inside the pipeline deadline
const ddb = new DynamoDBClient({ maxAttempts: 2 });
export const ddbDoc = DynamoDBDocumentClient.from(ddb, {
  marshallOptions: { removeUndefinedValues: true }
});
export const cloudWatch = new CloudWatchClient({ maxAttempts: 1 });
export const sns = new SNSClient({ maxAttempts: 1 });
