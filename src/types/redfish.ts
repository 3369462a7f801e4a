export interface ODataLink {
  '@odata.id': string
}

/**
 * A server-defined document. Field names and shapes vary by resource type
 * and firmware, so values are read with runtime checks.
 */
export type RedfishResource = Record<string, unknown>

/**
 * A decoded response body. `_location` carries the `Location` response
 * header, or an empty string when the server sent none.
 */
export type RedfishResult = RedfishResource & {
  _location: string
}

export interface MemberRef {
  path: string
  id: string
}

export const JOB_STATES = ['unknown', 'scheduled', 'running', 'finished', 'failed'] as const

export type JobState = (typeof JOB_STATES)[number]

export type ResetType =
  | 'On'
  | 'ForceOff'
  | 'GracefulShutdown'
  | 'GracefulRestart'
  | 'ForceRestart'
  | 'Nmi'
  | 'PushPowerButton'
  | 'PowerCycle'

export type PowerCycleStep = 'On' | 'ShuttingDownGraceful' | 'ShuttingDownForced' | 'Off' | 'PoweringOn'

export interface ExtendedMessage {
  messageId: string
  message: string
}
