import { CloudWatchClient, PutMetricDataCommand, type StandardUnit } from "@aws-sdk/client-cloudwatch";
import { errorMessage } from "../errors";

// Metrics are off unless a namespace is configured.
const NAMESPACE = process.env.METRICS_NS;

let cw: CloudWatchClient | undefined;

function dims(d: Record<string, string> | undefined) {
    return Object.entries(d ?? {}).map(([Name, Value]) => ({ Name, Value }));
}

async function put(name: string, value: number, unit: StandardUnit, d?: Record<string, string>) {
    if (!NAMESPACE) return;
    cw ??= new CloudWatchClient({});
    try {
        await cw.send(new PutMetricDataCommand({
            Namespace: NAMESPACE,
            MetricData: [{ MetricName: name, Value: value, Unit: unit, Dimensions: dims(d) }],
        }));
    } catch (e) { console.warn("metric-failed", name, errorMessage(e)); }
}

export function metricCount(name: string, value = 1, d?: Record<string, string>) {
    return put(name, value, "Count", d);
}

export function metricMs(name: string, ms: number, d?: Record<string, string>) {
    return put(name, ms, "Milliseconds", d);
}
