import { JOB_STATES, type JobState, type RedfishResource } from '../types/redfish'
import { joinPath, RESOURCES } from '../utils/redfish'
import { InvalidArgumentError } from './errors'

// Exact messages the controller reports for each non-failed state. Anything
// not listed here (and not mentioning a failure) classifies as unknown.
export const JOB_STATE_MESSAGES: ReadonlyArray<readonly [string, JobState]> = [
  ['Task successfully scheduled.', 'scheduled'],
  ['Job in progress.', 'running'],
  ['Job completed successfully.', 'finished'],
]

export function classifyJobMessage(message: string): JobState {
  if (message.toLowerCase().includes('failed')) {
    return 'failed'
  }

  const match = JOB_STATE_MESSAGES.find(([text]) => text === message)
  return match ? match[1] : 'unknown'
}

export function jobState(job: RedfishResource): JobState {
  return typeof job.Message === 'string' ? classifyJobMessage(job.Message) : 'unknown'
}

export function resolveJobPath(identifier: string): string {
  return identifier.startsWith('/') ? identifier : joinPath(RESOURCES.jobs, identifier)
}

export function isJobState(value: string): value is JobState {
  return (JOB_STATES as readonly string[]).includes(value)
}

export function parseJobState(value: string): JobState {
  const normalized = value.trim().toLowerCase()
  if (!isJobState(normalized)) {
    throw new InvalidArgumentError(`unknown job state ${value} (expected one of ${JOB_STATES.join(', ')})`)
  }

  return normalized
}

export function filterJobsByState<T extends RedfishResource>(jobs: T[], states: Iterable<JobState>): T[] {
  const wanted = new Set(states)
  return jobs.filter((job) => wanted.has(jobState(job)))
}
