import { ContainerRegistrationKeys } from "@medusajs/framework/utils"
import {
  getCorrelationContext,
  resolveCorrelationId,
} from "./correlation"

export type StructuredLogLevel = "debug" | "info" | "warn" | "error"

type LogLine = (message: string) => void

export type LoggerLike = {
  info?: LogLine
  warn?: LogLine
  error?: LogLine
  debug?: LogLine
}

export type ScopeLike = {
  resolve: (key: string) => unknown
}

export type StructuredLogInput = {
  correlation_id?: string
  operation?: string
  payment_link_id?: string
  payment_id?: string
  error_code?: string
  meta?: Record<string, unknown>
}

const RESERVED_KEYS = new Set([
  "correlation_id",
  "operation",
  "payment_link_id",
  "payment_id",
  "error_code",
  "meta",
])

const SECRET_KEY_PATTERN =
  /(secret|token|password|authorization|cookie|api[_-]?key|private[_-]?key)/i
const REDACTED = "[REDACTED]"

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

function sanitizeValue(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return value
  }

  if (depth > 3) {
    return "[TRUNCATED]"
  }

  if (typeof value === "string") {
    return value.length > 300 ? `${value.slice(0, 300)}...` : value
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return value
  }

  if (Array.isArray(value)) {
    return value.slice(0, 25).map((item) => sanitizeValue(item, depth + 1))
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
    }
  }

  if (isRecord(value)) {
    const sanitized: Record<string, unknown> = {}

    for (const [key, nestedValue] of Object.entries(value)) {
      if (SECRET_KEY_PATTERN.test(key)) {
        sanitized[key] = REDACTED
        continue
      }

      sanitized[key] = sanitizeValue(nestedValue, depth + 1)
    }

    return sanitized
  }

  return String(value)
}

function isLoggerLike(value: unknown): value is LoggerLike {
  return (
    isRecord(value) &&
    (typeof value.info === "function" ||
      typeof value.warn === "function" ||
      typeof value.error === "function")
  )
}

function isScopeLike(value: unknown): value is ScopeLike {
  return isRecord(value) && typeof value.resolve === "function"
}

function resolveLogger(scopeOrLogger?: unknown): LoggerLike | undefined {
  if (!scopeOrLogger) {
    return undefined
  }

  if (isLoggerLike(scopeOrLogger)) {
    return scopeOrLogger
  }

  if (!isScopeLike(scopeOrLogger)) {
    return undefined
  }

  try {
    const resolved = scopeOrLogger.resolve(ContainerRegistrationKeys.LOGGER)
    return isLoggerLike(resolved) ? resolved : undefined
  } catch {
    // scopes without a registered logger fall back to console
    return undefined
  }
}

function buildMeta(input: StructuredLogInput): Record<string, unknown> | undefined {
  const mergedMeta: Record<string, unknown> = {
    ...(input.meta ?? {}),
  }

  for (const [key, value] of Object.entries(input)) {
    if (RESERVED_KEYS.has(key)) {
      continue
    }

    mergedMeta[key] = value
  }

  const sanitized = sanitizeValue(mergedMeta)
  if (!isRecord(sanitized) || Object.keys(sanitized).length === 0) {
    return undefined
  }

  return sanitized
}

function toPayload(
  level: StructuredLogLevel,
  message: string,
  input: StructuredLogInput
): Record<string, unknown> {
  const context = getCorrelationContext()
  const correlationId = resolveCorrelationId(
    input.correlation_id ?? context?.correlation_id
  )

  const operation = normalizeString(input.operation ?? context?.operation)
  const paymentLinkId = normalizeString(
    input.payment_link_id ?? context?.payment_link_id
  )
  const paymentId = normalizeString(input.payment_id ?? context?.payment_id)
  const errorCode = normalizeString(input.error_code)

  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
    correlation_id: correlationId,
  }

  if (operation) {
    payload.operation = operation
  }
  if (paymentLinkId) {
    payload.payment_link_id = paymentLinkId
  }
  if (paymentId) {
    payload.payment_id = paymentId
  }
  if (errorCode) {
    payload.error_code = errorCode
  }

  const meta = buildMeta(input)
  if (meta) {
    payload.meta = meta
  }

  return payload
}

export function logStructured(
  scopeOrLogger: unknown,
  level: StructuredLogLevel,
  message: string,
  input: StructuredLogInput = {}
): Record<string, unknown> {
  const payload = toPayload(level, message, input)
  const serialized = JSON.stringify(payload)
  const logger = resolveLogger(scopeOrLogger)

  if (logger && typeof logger[level] === "function") {
    logger[level]?.(serialized)
    return payload
  }

  if (logger && typeof logger.info === "function") {
    logger.info(serialized)
    return payload
  }

  if (level === "error") {
    console.error(serialized)
    return payload
  }

  if (level === "warn") {
    console.warn(serialized)
    return payload
  }

  if (level === "debug") {
    console.debug(serialized)
    return payload
  }

  console.log(serialized)
  return payload
}
