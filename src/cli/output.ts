import { isRedfishError, OperationFailedError } from '../services/errors'
import type { ExtendedMessage } from '../types/redfish'

export type Writer = (text: string) => void

export interface CommandResult {
  changed: boolean
  [key: string]: unknown
}

export interface FailureReport {
  failed: true
  kind: string
  msg: string
  status?: number
  errors?: ExtendedMessage[]
}

export function printJson(write: Writer, data: unknown): void {
  write(`${JSON.stringify(data, null, 2)}\n`)
}

export function toFailureReport(error: unknown): FailureReport {
  if (error instanceof OperationFailedError) {
    return {
      failed: true,
      kind: error.kind,
      msg: error.message,
      status: error.status,
      errors: error.errors,
    }
  }

  if (isRedfishError(error)) {
    return { failed: true, kind: error.kind, msg: error.message }
  }

  return {
    failed: true,
    kind: 'Error',
    msg: error instanceof Error ? error.message : String(error),
  }
}
