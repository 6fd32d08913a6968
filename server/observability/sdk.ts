import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-http';
import { BatchLogRecordProcessor } from '@opentelemetry/sdk-logs';

import { env } from '../env';

function parseHeaders(raw: string | undefined): Record<string, string> | undefined {
  if (!raw) {
    return undefined;
  }
  const headers: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    const [key, ...rest] = pair.split('=');
    if (key && rest.length > 0) {
      headers[key.trim()] = rest.join('=').trim();
    }
  }
  return headers;
}

function createTraceExporter(): OTLPTraceExporter | null {
  const url = env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT ?? env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (!url) {
    return null;
  }
  return new OTLPTraceExporter({ url, headers: parseHeaders(env.OTEL_EXPORTER_OTLP_HEADERS) });
}

function createLogProcessor(): BatchLogRecordProcessor | null {
  const url = env.OTEL_EXPORTER_OTLP_LOGS_ENDPOINT ?? env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (!url) {
    return null;
  }
  return new BatchLogRecordProcessor(
    new OTLPLogExporter({ url, headers: parseHeaders(env.OTEL_EXPORTER_OTLP_HEADERS) })
  );
}

let sdk: NodeSDK | null = null;

/**
 * Starts the OpenTelemetry SDK when OBSERVABILITY_ENABLED=true. Safe to call more than once.
 */
export function startObservability(): void {
  if (sdk) {
    return;
  }

  if (!env.OBSERVABILITY_ENABLED) {
    if (env.NODE_ENV !== 'test') {
      console.debug('Observability is disabled. Set OBSERVABILITY_ENABLED=true to enable telemetry.');
    }
    return;
  }

  diag.setLogger(new DiagConsoleLogger(), env.NODE_ENV === 'development' ? DiagLogLevel.INFO : DiagLogLevel.ERROR);

  const traceExporter = createTraceExporter();
  const logRecordProcessor = createLogProcessor();

  sdk = new NodeSDK({
    serviceName: env.OTEL_SERVICE_NAME,
    ...(traceExporter ? { traceExporter } : {}),
    ...(logRecordProcessor ? { logRecordProcessor } : {}),
  });

  sdk.start();
  console.log('📈 OpenTelemetry instrumentation initialized');
}

export async function shutdownObservability(): Promise<void> {
  if (!sdk) {
    return;
  }
  try {
    await sdk.shutdown();
    console.log('📪 OpenTelemetry SDK shut down');
  } catch (error) {
    console.error('❌ Error shutting down OpenTelemetry SDK', error);
  } finally {
    sdk = null;
  }
}
