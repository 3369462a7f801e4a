import type { Logger } from '../logger'
import type { RedfishResource, RedfishResult } from '../types/redfish'
import { type ActionDescriptor, findActionDescriptor } from '../utils/redfish'
import { ActionNotFoundError, InvalidParameterValueError, UnknownParameterError } from './errors'
import type { ResourceCache } from './resourceCache'
import type { RedfishTransport } from './transport'

export type ActionParameterValue = string | number | boolean

export type ActionParameters = Record<string, ActionParameterValue>

export interface ActionContext {
  cache: Pick<ResourceCache, 'getCached'>
  transport: Pick<RedfishTransport, 'invoke'>
  log?: Logger
}

export function resolveAction(resource: RedfishResource, path: string, actionName: string): ActionDescriptor {
  const descriptor = findActionDescriptor(resource, actionName)
  if (!descriptor) {
    throw new ActionNotFoundError(path, actionName)
  }

  return descriptor
}

export function validateActionParameters(descriptor: ActionDescriptor, parameters: ActionParameters): void {
  Object.entries(parameters).forEach(([name, value]) => {
    const allowed = descriptor.allowableValues.get(name)
    if (!allowed) {
      throw new UnknownParameterError(descriptor.name, name)
    }

    if (!allowed.has(value)) {
      throw new InvalidParameterValueError(descriptor.name, name, value, [...allowed])
    }
  })
}

/**
 * Validates `parameters` against the allowable values the resource
 * advertises for `actionName`, then POSTs them to the action target.
 * The resource itself comes from the cache when present.
 */
export async function invokeAction(
  context: ActionContext,
  path: string,
  actionName: string,
  parameters: ActionParameters = {},
): Promise<RedfishResult> {
  context.log?.debug({ path, action: actionName }, 'execute action')

  const resource = await context.cache.getCached(path)
  const descriptor = resolveAction(resource, path, actionName)
  validateActionParameters(descriptor, parameters)

  return context.transport.invoke(descriptor.target, parameters)
}
