export const RazorpayErrorCode = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  TRANSPORT_ERROR: "TRANSPORT_ERROR",
  GATEWAY_ERROR: "GATEWAY_ERROR",
  AUTHENTICATION_ERROR: "AUTHENTICATION_ERROR",
  SIGNATURE_MISMATCH: "SIGNATURE_MISMATCH",
  CONFIG_MISSING: "CONFIG_MISSING",
  CONFIG_MODE_MISMATCH: "CONFIG_MODE_MISMATCH",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const

export type RazorpayErrorCode =
  (typeof RazorpayErrorCode)[keyof typeof RazorpayErrorCode]

const DEFAULT_HTTP_STATUS: Record<RazorpayErrorCode, number> = {
  VALIDATION_ERROR: 400,
  TRANSPORT_ERROR: 502,
  GATEWAY_ERROR: 502,
  AUTHENTICATION_ERROR: 401,
  SIGNATURE_MISMATCH: 401,
  CONFIG_MISSING: 500,
  CONFIG_MODE_MISMATCH: 500,
  INTERNAL_ERROR: 500,
}

/** Shown to callers whenever the underlying call itself blew up. */
export const GENERIC_FAILURE_MESSAGE = "Something Bad Happened !"

export type RazorpayErrorEnvelope = {
  error: {
    code: string
    message: string
    details: Record<string, unknown>
    correlation_id: string
  }
}

type RazorpayIntegrationErrorInput = {
  code: RazorpayErrorCode
  message: string
  correlation_id: string
  http_status?: number
  details?: Record<string, unknown>
  cause?: unknown
}

/**
 * Every failure raised by this integration. Callers branch on `code`, never on
 * where the failure came from.
 */
export class RazorpayIntegrationError extends Error {
  code: RazorpayErrorCode
  http_status: number
  details: Record<string, unknown>
  correlation_id: string
  cause?: unknown

  constructor(input: RazorpayIntegrationErrorInput) {
    super(input.message)
    this.name = "RazorpayIntegrationError"
    this.code = input.code
    this.http_status = input.http_status ?? DEFAULT_HTTP_STATUS[input.code]
    this.details = input.details ?? {}
    this.correlation_id = input.correlation_id
    if (input.cause !== undefined) {
      this.cause = input.cause
    }
  }

  toErrorEnvelope(): RazorpayErrorEnvelope {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        correlation_id: this.correlation_id,
      },
    }
  }
}

export function isRazorpayIntegrationError(
  error: unknown
): error is RazorpayIntegrationError {
  return error instanceof RazorpayIntegrationError
}

export function validationError(
  message: string,
  correlation_id: string,
  details?: Record<string, unknown>
): RazorpayIntegrationError {
  return new RazorpayIntegrationError({
    code: RazorpayErrorCode.VALIDATION_ERROR,
    message,
    correlation_id,
    details,
  })
}

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

/**
 * Maps anything thrown by this integration to the status and body a hosting
 * application can send back. Unknown errors never leak their message.
 */
export function toRazorpayErrorEnvelope(
  error: unknown,
  input: { correlation_id: string }
): {
  status: number
  body: RazorpayErrorEnvelope
} {
  if (isRazorpayIntegrationError(error)) {
    return {
      status: error.http_status,
      body: error.toErrorEnvelope(),
    }
  }

  return {
    status: DEFAULT_HTTP_STATUS.INTERNAL_ERROR,
    body: {
      error: {
        code: RazorpayErrorCode.INTERNAL_ERROR,
        message: GENERIC_FAILURE_MESSAGE,
        details: {},
        correlation_id: readText(input.correlation_id),
      },
    },
  }
}
