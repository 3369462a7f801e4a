import type { ExtendedMessage } from '../types/redfish'

export type RedfishErrorKind =
  | 'InvalidArgument'
  | 'UnexpectedContentType'
  | 'OperationFailed'
  | 'ActionNotFound'
  | 'UnknownParameter'
  | 'InvalidParameterValue'
  | 'OperationInProgress'
  | 'JobSchedulingFailed'
  | 'Timeout'
  | 'OperationCancelled'

export abstract class RedfishError extends Error {
  abstract readonly kind: RedfishErrorKind

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

export class InvalidArgumentError extends RedfishError {
  readonly kind = 'InvalidArgument'
}

export class UnexpectedContentTypeError extends RedfishError {
  readonly kind = 'UnexpectedContentType'
  readonly contentType: string

  constructor(contentType: string) {
    super(`unexpected content type ${contentType || '(none)'}`)
    this.contentType = contentType
  }
}

interface OperationFailedDetails {
  method: string
  path: string
  status: number
  body: unknown
  errors: ExtendedMessage[]
}

/**
 * Raised for any non-2xx response. `errors` holds the
 * `@Message.ExtendedInfo` entries of the body in the order the server sent them.
 */
export class OperationFailedError extends RedfishError {
  readonly kind = 'OperationFailed'
  readonly method: string
  readonly path: string
  readonly status: number
  readonly body: unknown
  readonly errors: ExtendedMessage[]

  constructor(details: OperationFailedDetails) {
    super(`${details.method} ${details.path} failed with status ${details.status}`)
    this.method = details.method
    this.path = details.path
    this.status = details.status
    this.body = details.body
    this.errors = details.errors
  }
}

export class ActionNotFoundError extends RedfishError {
  readonly kind = 'ActionNotFound'

  constructor(readonly path: string, readonly action: string) {
    super(`action ${action} is not available on ${path}`)
  }
}

export class UnknownParameterError extends RedfishError {
  readonly kind = 'UnknownParameter'

  constructor(readonly action: string, readonly parameter: string) {
    super(`action ${action} does not accept parameter ${parameter}`)
  }
}

export class InvalidParameterValueError extends RedfishError {
  readonly kind = 'InvalidParameterValue'

  constructor(
    readonly action: string,
    readonly parameter: string,
    readonly value: unknown,
    readonly allowed: unknown[],
  ) {
    super(
      `${String(value)}: invalid value for ${parameter} (allowed: ${allowed.map((item) => String(item)).join(', ')})`,
    )
  }
}

export class OperationInProgressError extends RedfishError {
  readonly kind = 'OperationInProgress'
}

export class JobSchedulingFailedError extends RedfishError {
  readonly kind = 'JobSchedulingFailed'
}

export class TimeoutError extends RedfishError {
  readonly kind = 'Timeout'
}

export class OperationCancelledError extends RedfishError {
  readonly kind = 'OperationCancelled'
}

export function isRedfishError(value: unknown): value is RedfishError {
  return value instanceof RedfishError
}
