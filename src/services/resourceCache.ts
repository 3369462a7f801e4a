import type { Logger } from '../logger'
import type { RedfishResult } from '../types/redfish'

export interface ResourceFetcher {
  fetch(path: string): Promise<RedfishResult>
}

/**
 * Last-fetched representation per path. Entries are only written by `get`
 * and never expire on their own.
 */
export class ResourceCache {
  private readonly entries = new Map<string, RedfishResult>()

  constructor(
    private readonly fetcher: ResourceFetcher,
    private readonly log?: Logger,
  ) {}

  async get(path: string): Promise<Readonly<RedfishResult>> {
    this.log?.debug({ path }, 'get')
    const resource = await this.fetcher.fetch(path)
    this.entries.set(path, resource)
    return resource
  }

  async getCached(path: string): Promise<Readonly<RedfishResult>> {
    const cached = this.entries.get(path)
    if (cached) {
      this.log?.debug({ path }, 'get (cached)')
      return cached
    }

    return this.get(path)
  }

  has(path: string): boolean {
    return this.entries.has(path)
  }

  clear(): void {
    this.entries.clear()
  }

  get size(): number {
    return this.entries.size
  }
}
