import type { MemberRef, ODataLink, RedfishResource } from '../types/redfish'

export const REDFISH_ROOT = '/redfish/v1'

export const RESOURCES = {
  system: `${REDFISH_ROOT}/Systems/System.Embedded.1`,
  manager: `${REDFISH_ROOT}/Managers/iDRAC.Embedded.1`,
  storage: `${REDFISH_ROOT}/Systems/System.Embedded.1/Storage`,
  jobs: `${REDFISH_ROOT}/Managers/iDRAC.Embedded.1/Jobs`,
} as const

const ALLOWABLE_VALUES_SUFFIX = '@Redfish.AllowableValues'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isQualifiedUrl(value: string): boolean {
  return value.includes('://')
}

export function isODataLink(value: unknown): value is ODataLink {
  return isRecord(value) && typeof value['@odata.id'] === 'string'
}

export function lastPathSegment(path: string): string {
  const segments = path.split('/').filter(Boolean)
  return segments[segments.length - 1] ?? path
}

export function joinPath(base: string, ...parts: string[]): string {
  const tail = parts
    .map((part) => part.replace(/^\/+/, '').replace(/\/+$/, ''))
    .filter((part) => part.length > 0)

  return [base.replace(/\/+$/, ''), ...tail].join('/')
}

export function toMemberRef(path: string): MemberRef {
  return { path, id: lastPathSegment(path) }
}

export function extractMembers(resource: RedfishResource, memberAttr = 'Members'): MemberRef[] {
  const members = resource[memberAttr]
  if (!Array.isArray(members)) {
    return []
  }

  return members.filter(isODataLink).map((member) => toMemberRef(member['@odata.id']))
}

export interface ActionDescriptor {
  name: string
  target: string
  allowableValues: Map<string, Set<unknown>>
}

function toAllowableValues(action: Record<string, unknown>): Map<string, Set<unknown>> {
  const allowable = new Map<string, Set<unknown>>()

  Object.entries(action).forEach(([key, value]) => {
    if (!key.endsWith(ALLOWABLE_VALUES_SUFFIX) || !Array.isArray(value)) {
      return
    }

    const parameter = key.slice(0, -ALLOWABLE_VALUES_SUFFIX.length)
    allowable.set(parameter, new Set<unknown>(value))
  })

  return allowable
}

export function findActionDescriptor(resource: RedfishResource, actionName: string): ActionDescriptor | undefined {
  const actionsNode = resource.Actions
  if (!isRecord(actionsNode)) {
    return undefined
  }

  const action = actionsNode[actionName]
  if (!isRecord(action) || typeof action.target !== 'string') {
    return undefined
  }

  return {
    name: actionName,
    target: action.target,
    allowableValues: toAllowableValues(action),
  }
}

export function extractSupportedActions(resource: RedfishResource): ActionDescriptor[] {
  const actionsNode = resource.Actions
  if (!isRecord(actionsNode)) {
    return []
  }

  return Object.keys(actionsNode)
    .map((name) => findActionDescriptor(resource, name))
    .filter((action): action is ActionDescriptor => action !== undefined)
    .sort((left, right) => left.name.localeCompare(right.name))
}

export function resourceDisplayName(resource: RedfishResource): string {
  const name = readString(resource, 'Name')
  if (name && name.trim().length > 0) {
    return name
  }

  const id = readString(resource, 'Id')
  if (id && id.trim().length > 0) {
    return id
  }

  const path = readString(resource, '@odata.id')
  if (path) {
    return lastPathSegment(path)
  }

  return 'Unnamed Resource'
}

export function readString(resource: RedfishResource, key: string): string | undefined {
  const value = resource[key]
  return typeof value === 'string' ? value : undefined
}
