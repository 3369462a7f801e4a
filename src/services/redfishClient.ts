import { type ConnectionConfig, DEFAULT_POWER_CYCLE_TIMEOUT_SECONDS } from '../config'
import { logger as rootLogger, type Logger } from '../logger'
import type { JobState, MemberRef, RedfishResource, RedfishResult } from '../types/redfish'
import {
  type ActionDescriptor,
  extractMembers,
  extractSupportedActions,
  joinPath,
  lastPathSegment,
  readString,
  REDFISH_ROOT,
  resourceDisplayName,
  RESOURCES,
} from '../utils/redfish'
import { type ActionParameters, invokeAction } from './actions'
import { InvalidArgumentError, JobSchedulingFailedError, OperationInProgressError } from './errors'
import { jobState, resolveJobPath } from './jobs'
import { waitUntil, type WaitOptions } from './polling'
import { powerCycle, type PowerCycleResult } from './powerCycle'
import { ResourceCache } from './resourceCache'
import { type FetchLike, RedfishTransport } from './transport'

export interface RedfishClientOptions {
  host: string
  username: string
  password: string
  verifyTls?: boolean
  /** Default wait timeout in seconds for the polling operations. */
  timeout?: number
  requestTimeoutMs?: number
  fetch?: FetchLike
  logger?: Logger
  polling?: Pick<WaitOptions, 'intervalSeconds' | 'sleep' | 'now'>
}

export interface WaitControl {
  timeoutSeconds?: number
  signal?: AbortSignal
}

export interface InitializeVolumeOptions {
  fast?: boolean
}

function hasPendingOperations(volume: RedfishResource): boolean {
  const operations = volume.Operations
  return Array.isArray(operations) && operations.length > 0
}

/**
 * One session against a management controller: connection settings, the
 * transport and a private resource cache. Not safe to share between
 * concurrent callers.
 */
export class RedfishClient {
  readonly transport: RedfishTransport
  readonly cache: ResourceCache
  readonly defaultTimeout?: number
  private readonly log: Logger
  private readonly polling: Pick<WaitOptions, 'intervalSeconds' | 'sleep' | 'now'>

  constructor(options: RedfishClientOptions) {
    this.log = (options.logger ?? rootLogger).child({ host: options.host })
    this.transport = new RedfishTransport({
      host: options.host,
      username: options.username,
      password: options.password,
      verifyTls: options.verifyTls,
      requestTimeoutMs: options.requestTimeoutMs,
      fetch: options.fetch,
      logger: this.log,
    })
    this.cache = new ResourceCache(this.transport, this.log.child({ component: 'cache' }))
    this.defaultTimeout = options.timeout
    this.polling = options.polling ?? {}
  }

  static fromConfig(config: ConnectionConfig, options: Partial<RedfishClientOptions> = {}): RedfishClient {
    return new RedfishClient({
      ...options,
      host: config.host,
      username: config.username,
      password: config.password,
      verifyTls: config.verifyTls,
      timeout: config.timeout,
    })
  }

  get(path: string): Promise<Readonly<RedfishResult>> {
    return this.cache.get(path)
  }

  getCached(path: string): Promise<Readonly<RedfishResult>> {
    return this.cache.getCached(path)
  }

  getResource(path: string): Promise<Readonly<RedfishResult>> {
    return this.get(path)
  }

  testConnection(): Promise<Readonly<RedfishResult>> {
    return this.get(REDFISH_ROOT)
  }

  invokeAction(path: string, actionName: string, parameters: ActionParameters = {}): Promise<RedfishResult> {
    return invokeAction({ cache: this.cache, transport: this.transport, log: this.log }, path, actionName, parameters)
  }

  async describeActions(path: string): Promise<ActionDescriptor[]> {
    return extractSupportedActions(await this.getCached(path))
  }

  getSystem(): Promise<Readonly<RedfishResult>> {
    return this.get(RESOURCES.system)
  }

  getManager(): Promise<Readonly<RedfishResult>> {
    return this.get(RESOURCES.manager)
  }

  async getPowerState(): Promise<string | undefined> {
    return readString(await this.getSystem(), 'PowerState')
  }

  async listStorageControllers(): Promise<MemberRef[]> {
    return extractMembers(await this.getCached(RESOURCES.storage))
  }

  async listVolumes(controller: string | MemberRef): Promise<MemberRef[]> {
    const controllerPath = typeof controller === 'string' ? controller : controller.path
    return extractMembers(await this.getCached(joinPath(controllerPath, 'Volumes')))
  }

  async listAllVolumes(): Promise<MemberRef[]> {
    const volumes: MemberRef[] = []

    for (const controller of await this.listStorageControllers()) {
      volumes.push(...(await this.listVolumes(controller)))
    }

    return volumes
  }

  async listAllVolumeDetails(): Promise<Readonly<RedfishResult>[]> {
    const details: Readonly<RedfishResult>[] = []

    for (const volume of await this.listAllVolumes()) {
      details.push(await this.get(volume.path))
    }

    return details
  }

  private async findVolume(field: 'Name' | 'Id', wanted: string): Promise<Readonly<RedfishResult> | undefined> {
    for (const volume of await this.listAllVolumes()) {
      const detail = await this.get(volume.path)
      if (readString(detail, field) === wanted) {
        return detail
      }
    }

    return undefined
  }

  findVolumeByName(name: string): Promise<Readonly<RedfishResult> | undefined> {
    return this.findVolume('Name', name)
  }

  findVolumeById(id: string): Promise<Readonly<RedfishResult> | undefined> {
    return this.findVolume('Id', id)
  }

  getVolume(pathOrId: string): Promise<Readonly<RedfishResult> | undefined> {
    return pathOrId.startsWith('/') ? this.get(pathOrId) : this.findVolumeById(pathOrId)
  }

  /**
   * Schedules an initialization job for the volume and returns its job id.
   */
  async initializeVolume(pathOrId: string, options: InitializeVolumeOptions = {}): Promise<string> {
    const fast = options.fast ?? true
    const volume = await this.getVolume(pathOrId)
    if (!volume) {
      throw new InvalidArgumentError(`no volume matches ${pathOrId}`)
    }

    const volumePath = pathOrId.startsWith('/') ? pathOrId : (readString(volume, '@odata.id') ?? pathOrId)
    this.log.info({ volume: resourceDisplayName(volume), path: volumePath, fast }, 'initialize volume')

    if (hasPendingOperations(volume)) {
      throw new OperationInProgressError(`volume ${volumePath} already has an operation in progress`)
    }

    const result = await this.invokeAction(volumePath, '#Volume.Initialize', {
      InitializeType: fast ? 'Fast' : 'Slow',
    })

    if (!result._location.includes('JID')) {
      throw new JobSchedulingFailedError(`failed to allocate job id for ${volumePath}`)
    }

    return lastPathSegment(result._location)
  }

  listJobs(options?: { detail?: false }): Promise<MemberRef[]>
  listJobs(options: { detail: true }): Promise<Readonly<RedfishResult>[]>
  async listJobs(options: { detail?: boolean } = {}): Promise<MemberRef[] | Readonly<RedfishResult>[]> {
    const members = extractMembers(await this.getCached(RESOURCES.jobs))
    if (!options.detail) {
      return members
    }

    const jobs: Readonly<RedfishResult>[] = []
    for (const member of members) {
      jobs.push(await this.getJob(member.path))
    }

    return jobs
  }

  getJob(identifier: string): Promise<Readonly<RedfishResult>> {
    return this.get(resolveJobPath(identifier))
  }

  async waitForJobState(
    identifier: string,
    state: JobState,
    control: WaitControl = {},
  ): Promise<Readonly<RedfishResult>> {
    const path = resolveJobPath(identifier)
    this.log.info({ job: path, state }, 'waiting for job state')

    return waitUntil(
      () => this.get(path),
      (job) => {
        const current = jobState(job)
        this.log.debug({ want: state, have: current }, 'job state')
        return current === state
      },
      {
        ...this.polling,
        timeoutSeconds: control.timeoutSeconds ?? this.defaultTimeout,
        signal: control.signal,
        description: `job ${lastPathSegment(path)} to reach ${state}`,
      },
    )
  }

  async waitForPowerState(state: string, control: WaitControl = {}): Promise<Readonly<RedfishResult>> {
    this.log.info({ state }, 'waiting for power state')

    return waitUntil(
      () => this.getSystem(),
      (system) => {
        const current = readString(system, 'PowerState')
        this.log.debug({ want: state, have: current }, 'power state')
        return current === state
      },
      {
        ...this.polling,
        timeoutSeconds: control.timeoutSeconds ?? this.defaultTimeout,
        signal: control.signal,
        description: `power state ${state}`,
      },
    )
  }

  resetSystem(resetType: string): Promise<RedfishResult> {
    return this.invokeAction(RESOURCES.system, '#ComputerSystem.Reset', { ResetType: resetType })
  }

  resetManager(): Promise<RedfishResult> {
    return this.invokeAction(RESOURCES.manager, '#Manager.Reset', { ResetType: 'GracefulRestart' })
  }

  powerCycleSystem(timeoutSeconds?: number): Promise<PowerCycleResult> {
    const timeout = timeoutSeconds ?? this.defaultTimeout ?? DEFAULT_POWER_CYCLE_TIMEOUT_SECONDS

    return powerCycle(
      {
        getPowerState: () => this.getPowerState(),
        resetSystem: (resetType) => this.resetSystem(resetType),
        waitForPowerState: (state, windowSeconds) => this.waitForPowerState(state, { timeoutSeconds: windowSeconds }),
      },
      timeout,
      this.log,
    )
  }
}
