import { randomUUID } from "crypto";
import { LambdaClient, InvokeCommand } from "@aws-sdk/client-lambda";
import { errorMessage } from "../errors";

// Audit records go to a Lambda when one is configured; otherwise nowhere.
const AUDIT_FN_ARN = process.env.AUDIT_FN_ARN;

let lambda: LambdaClient | undefined;

export interface TimelineBuiltAudit {
  datasetName: string;
  cacheKey: string;
  fromCache: boolean;
  persons: number;
  episodes: number;
  events: number;
  droppedEvents: number;
  unitFailures: number;
}

export async function auditFireAndForget(payload: unknown) {
  if (!AUDIT_FN_ARN) return;
  lambda ??= new LambdaClient({});
  try {
    await lambda.send(
      new InvokeCommand({
        FunctionName: AUDIT_FN_ARN,
        InvocationType: "Event",
        Payload: Buffer.from(JSON.stringify(payload)),
      })
    );
  } catch (e) {
    console.warn("audit-invoke-failed", errorMessage(e));
  }
}

export function auditTimelineBuilt(summary: TimelineBuiltAudit) {
  return auditFireAndForget({
    type: "timeline.built.v1",
    at: new Date().toISOString(),
    traceId: randomUUID(),
    ...summary,
  });
}
