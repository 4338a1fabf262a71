import * as dynamodb from "@aws-sdk/client-dynamodb";
import * as ddc from "@aws-sdk/lib-dynamodb";
import { NodeHttpHandler } from "@smithy/node-http-handler";

export const LOCAL_ENDPOINT = "http://localhost:8000";

export interface ClientOptions {
  region: string;
  endpoint?: string;
  /** Talk to DynamoDB Local with placeholder credentials. */
  local?: boolean;
  connectionTimeoutMs?: number;
  requestTimeoutMs?: number;
  maxAttempts?: number;
}

export function createDynamoDbClient(opts: ClientOptions): dynamodb.DynamoDBClient {
  return new dynamodb.DynamoDBClient({
    region: opts.local ? "localhost" : opts.region,
    endpoint: opts.local ? (opts.endpoint ?? LOCAL_ENDPOINT) : opts.endpoint,
    requestHandler: new NodeHttpHandler({
      connectionTimeout: opts.connectionTimeoutMs ?? 5_000,
      requestTimeout: opts.requestTimeoutMs ?? 30_000,
    }),
    maxAttempts: opts.maxAttempts ?? 5,
    retryMode: "adaptive",
    ...(opts.local
      ? {
          credentials: {
            accessKeyId: "a",
            secretAccessKey: "k",
          },
        }
      : {}),
  });
}

export function createDocumentClient(opts: ClientOptions): ddc.DynamoDBDocumentClient {
  return ddc.DynamoDBDocumentClient.from(createDynamoDbClient(opts), {
    marshallOptions: { removeUndefinedValues: true },
  });
}
