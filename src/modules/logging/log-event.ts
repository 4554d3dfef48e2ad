import { resolveCorrelationId } from "./correlation"
import { logStructured, type StructuredLogLevel } from "./structured-logger"

type LogEventOptions = {
  level?: StructuredLogLevel
  scopeOrLogger?: unknown
  error_code?: string
  operation?: string
  payment_link_id?: string
  payment_id?: string
}

export function logEvent(
  eventName: string,
  payload: Record<string, unknown> = {},
  correlation_id?: string,
  options: LogEventOptions = {}
): Record<string, unknown> {
  const correlationId = resolveCorrelationId(correlation_id)

  return logStructured(options.scopeOrLogger, options.level ?? "info", eventName, {
    correlation_id: correlationId,
    error_code: options.error_code,
    operation: options.operation,
    payment_link_id: options.payment_link_id,
    payment_id: options.payment_id,
    meta: payload,
  })
}
