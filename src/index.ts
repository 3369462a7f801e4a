export { RedfishClient } from './services/redfishClient'
export type { InitializeVolumeOptions, RedfishClientOptions, WaitControl } from './services/redfishClient'
export { RedfishTransport, extractExtendedMessages } from './services/transport'
export type { FetchLike, HttpMethod, RedfishTransportOptions, TransportRequestInit, TransportResponse } from './services/transport'
export { ResourceCache } from './services/resourceCache'
export { invokeAction, resolveAction, validateActionParameters } from './services/actions'
export type { ActionParameters, ActionParameterValue } from './services/actions'
export { classifyJobMessage, filterJobsByState, JOB_STATE_MESSAGES, jobState, parseJobState, resolveJobPath } from './services/jobs'
export { sleep, waitUntil } from './services/polling'
export type { WaitOptions } from './services/polling'
export { powerCycle } from './services/powerCycle'
export type { PowerControl, PowerCycleResult } from './services/powerCycle'
export * from './services/errors'
export { connectionConfigSchema, loadConnectionConfig, parseConnectionConfig } from './config'
export type { ConnectionConfig, ConnectionConfigInput } from './config'
export { createLogger, logger } from './logger'
export type { Logger } from './logger'
export { RESOURCES, REDFISH_ROOT, extractMembers, extractSupportedActions, findActionDescriptor } from './utils/redfish'
export type { ActionDescriptor } from './utils/redfish'
export * from './types/redfish'
