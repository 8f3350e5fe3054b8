/**
 * Tracing setup: OpenTelemetry NodeSDK with the Langfuse span processor.
 *
 * Call `initTracing()` once at startup, before the first campaign, and
 * `shutdownTracing()` before exit so pending spans are flushed. Without
 * LANGFUSE_SECRET_KEY and LANGFUSE_PUBLIC_KEY the orchestrator's spans go
 * to the OpenTelemetry no-op tracer.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { LangfuseSpanProcessor } from '@langfuse/otel';

let sdk: NodeSDK | null = null;

export function tracingConfigured(env: Record<string, string | undefined> = process.env): boolean {
  return !!env.LANGFUSE_SECRET_KEY && !!env.LANGFUSE_PUBLIC_KEY;
}

/**
 * @returns true when tracing was started by this call or an earlier one
 */
export function initTracing(env: Record<string, string | undefined> = process.env): boolean {
  if (sdk) return true;
  if (!tracingConfigured(env)) {
    console.log('[Tracing] Disabled (missing LANGFUSE_SECRET_KEY or LANGFUSE_PUBLIC_KEY)');
    return false;
  }

  sdk = new NodeSDK({
    spanProcessors: [new LangfuseSpanProcessor()],
  });
  sdk.start();
  console.log('[Tracing] Langfuse tracing enabled');
  return true;
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk) return;
  const current = sdk;
  sdk = null;
  await current.shutdown();
  console.log('[Tracing] Shut down');
}
