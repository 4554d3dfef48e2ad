import { AsyncLocalStorage } from "node:async_hooks"
import { randomUUID } from "node:crypto"

export const CORRELATION_ID_HEADER = "x-correlation-id"

export type CorrelationContext = {
  correlation_id: string
  operation?: string
  payment_link_id?: string
  payment_id?: string
}

type RequestLike = {
  headers?: unknown
  get?: (name: string) => unknown
  correlation_id?: unknown
}

const contextStore = new AsyncLocalStorage<CorrelationContext>()

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

function normalizeCorrelationId(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return normalizeCorrelationId(value[0])
  }

  const normalized = normalizeString(value)
  if (!normalized) {
    return undefined
  }

  const trimmed = normalized.slice(0, 128)
  if (!/^[A-Za-z0-9._:-]+$/.test(trimmed)) {
    return undefined
  }

  return trimmed
}

function normalizeEntityId(value: unknown): string | undefined {
  const normalized = normalizeString(value)
  if (!normalized) {
    return undefined
  }

  return normalized.slice(0, 128)
}

export function generateCorrelationId(): string {
  return randomUUID()
}

export function getCorrelationContext(): CorrelationContext | undefined {
  return contextStore.getStore()
}

export function resolveCorrelationId(explicit?: unknown): string {
  const fromExplicit = normalizeCorrelationId(explicit)
  if (fromExplicit) {
    return fromExplicit
  }

  const fromContext = normalizeCorrelationId(getCorrelationContext()?.correlation_id)
  if (fromContext) {
    return fromContext
  }

  return generateCorrelationId()
}

export function runWithCorrelationContext<T>(
  correlationId: unknown,
  fn: () => T
): T {
  const resolved = resolveCorrelationId(correlationId)
  return contextStore.run({ correlation_id: resolved }, fn)
}

/**
 * Merges `input` into the context opened by `runWithCorrelationContext`.
 * Outside of one there is nothing to merge into and nothing is stored.
 */
export function setCorrelationContext(
  input: Partial<CorrelationContext>
): CorrelationContext | undefined {
  const existing = getCorrelationContext()
  if (!existing) {
    return undefined
  }

  const correlationId =
    normalizeCorrelationId(input.correlation_id) ?? existing.correlation_id
  Object.assign(existing, {
    correlation_id: correlationId,
    operation: normalizeString(input.operation) ?? existing.operation,
    payment_link_id:
      normalizeEntityId(input.payment_link_id) ?? existing.payment_link_id,
    payment_id: normalizeEntityId(input.payment_id) ?? existing.payment_id,
  })

  return existing
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

function readHeaderValue(headers: unknown): unknown {
  if (!isRecord(headers)) {
    return undefined
  }

  return headers[CORRELATION_ID_HEADER] ?? headers["X-Correlation-Id"]
}

export function extractCorrelationIdFromRequest(req: RequestLike): string {
  const direct = normalizeCorrelationId(req.correlation_id)
  if (direct) {
    return direct
  }

  const fromGetter =
    typeof req.get === "function"
      ? normalizeCorrelationId(req.get(CORRELATION_ID_HEADER))
      : undefined
  if (fromGetter) {
    return fromGetter
  }

  const fromHeaders = normalizeCorrelationId(readHeaderValue(req.headers))
  if (fromHeaders) {
    return fromHeaders
  }

  return resolveCorrelationId()
}
