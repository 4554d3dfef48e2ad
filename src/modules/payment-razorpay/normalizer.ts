import { logEvent } from "../logging/log-event"
import {
  GENERIC_FAILURE_MESSAGE,
  RazorpayErrorCode,
  RazorpayIntegrationError,
} from "./errors"

export type RazorpayCallMeta = {
  correlation_id: string
  endpoint: string
  scopeOrLogger?: unknown
}

export type RazorpayResponse = Record<string, unknown>

type HttpResponseLike = {
  status: number
  json: () => Promise<unknown>
}

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

function isHttpResponseLike(value: unknown): value is HttpResponseLike {
  return (
    isObject(value) &&
    typeof value.status === "number" &&
    typeof value.json === "function"
  )
}

function readStatus(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0
    ? value
    : undefined
}

function describeThrown(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  if (isObject(error)) {
    return { ...error }
  }

  return { message: String(error) }
}

function transportFailure(
  error: unknown,
  meta: RazorpayCallMeta
): RazorpayIntegrationError {
  logEvent(
    "RAZORPAY_TRANSPORT_ERROR",
    {
      endpoint: meta.endpoint,
      error: describeThrown(error),
    },
    meta.correlation_id,
    {
      level: "error",
      scopeOrLogger: meta.scopeOrLogger,
      error_code: RazorpayErrorCode.TRANSPORT_ERROR,
    }
  )

  return new RazorpayIntegrationError({
    code: RazorpayErrorCode.TRANSPORT_ERROR,
    message: GENERIC_FAILURE_MESSAGE,
    correlation_id: meta.correlation_id,
    details: {
      endpoint: meta.endpoint,
    },
    cause: error,
  })
}

function gatewayFailure(
  gatewayError: Record<string, unknown>,
  httpStatus: number | undefined,
  meta: RazorpayCallMeta
): RazorpayIntegrationError {
  const code = readText(gatewayError.code)
  const description = readText(gatewayError.description)

  logEvent(
    "RAZORPAY_GATEWAY_ERROR",
    {
      endpoint: meta.endpoint,
      status: httpStatus ?? null,
      error: gatewayError,
    },
    meta.correlation_id,
    {
      level: "error",
      scopeOrLogger: meta.scopeOrLogger,
      error_code: RazorpayErrorCode.GATEWAY_ERROR,
    }
  )

  return new RazorpayIntegrationError({
    code: RazorpayErrorCode.GATEWAY_ERROR,
    message: `${code}- ${description}`,
    correlation_id: meta.correlation_id,
    http_status: httpStatus && httpStatus >= 400 ? httpStatus : undefined,
    details: {
      endpoint: meta.endpoint,
      gateway_code: code || null,
      gateway_description: description || null,
      gateway_field: readText(gatewayError.field) || null,
      gateway_reason: readText(gatewayError.reason) || null,
    },
  })
}

/**
 * Runs one Razorpay call and turns every way it can fail into a
 * `RazorpayIntegrationError`:
 *
 * - the call throws: `TRANSPORT_ERROR`, logged in full, generic message
 * - the payload carries an `error` object: `GATEWAY_ERROR`, message
 *   `"<code>- <description>"`
 * - an HTTP response with status >= 400 and no error body: `GATEWAY_ERROR`
 *
 * Anything else is returned as parsed. A payload that is not a JSON object is
 * treated as a broken channel.
 */
export async function handleApiResponse(
  call: () => Promise<unknown>,
  meta: RazorpayCallMeta
): Promise<RazorpayResponse> {
  let response: unknown
  try {
    response = await call()
  } catch (error) {
    throw transportFailure(error, meta)
  }

  let httpStatus: number | undefined
  let payload: unknown = response
  if (isHttpResponseLike(response)) {
    httpStatus = response.status
    try {
      payload = await response.json()
    } catch (error) {
      throw transportFailure(error, meta)
    }
  } else if (isObject(response)) {
    httpStatus = readStatus(response.statusCode)
  }

  if (isObject(payload) && isObject(payload.error)) {
    throw gatewayFailure(payload.error, httpStatus, meta)
  }

  if (isHttpResponseLike(response) && response.status >= 400) {
    throw gatewayFailure(
      {
        code: "HTTP_ERROR",
        description: `Razorpay responded with status ${response.status}`,
      },
      response.status,
      meta
    )
  }

  if (!isObject(payload)) {
    throw transportFailure(
      new TypeError(`Unexpected Razorpay payload of type ${typeof payload}`),
      meta
    )
  }

  return payload
}
