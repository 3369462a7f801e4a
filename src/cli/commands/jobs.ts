import { Command } from 'commander'
import { InvalidArgumentError } from '../../services/errors'
import { filterJobsByState, jobState, parseJobState } from '../../services/jobs'
import { type CliContext, parseSeconds } from '../context'

type JobsOptions = {
  detail?: boolean
  state?: string[]
}

type WaitJobOptions = {
  state: string
  waitTimeout?: number
}

export function createJobCommands(context: CliContext): Command[] {
  const jobs = new Command('jobs')
    .description('List jobs in the controller job queue')
    .option('--detail', 'fetch every job instead of listing references')
    .option('--state <states...>', 'only jobs in these states (requires --detail)')
    .action((options: JobsOptions, command: Command) =>
      context.run(async () => {
        const states = (options.state ?? []).map(parseJobState)
        if (states.length > 0 && !options.detail) {
          throw new InvalidArgumentError('filtering by state requires --detail')
        }

        const client = context.connect(command)
        if (!options.detail) {
          return { changed: false, jobs: await client.listJobs() }
        }

        const details = await client.listJobs({ detail: true })
        return { changed: false, jobs: states.length > 0 ? filterJobsByState(details, states) : details }
      }),
    )

  const job = new Command('job')
    .description('Show one job by id or path')
    .argument('<job>', 'job id (JID_...) or job path')
    .action((identifier: string, _options: unknown, command: Command) =>
      context.run(async () => {
        const detail = await context.connect(command).getJob(identifier)
        return { changed: false, job: detail, state: jobState(detail) }
      }),
    )

  const waitJob = new Command('wait-job')
    .description('Wait for a job to reach a state')
    .argument('<job>', 'job id (JID_...) or job path')
    .requiredOption('--state <state>', 'unknown, scheduled, running, finished or failed')
    .option('--wait-timeout <seconds>', 'give up after this many seconds', parseSeconds)
    .action((identifier: string, options: WaitJobOptions, command: Command) =>
      context.run(async () => {
        const state = parseJobState(options.state)
        const detail = await context.connect(command).waitForJobState(identifier, state, {
          timeoutSeconds: options.waitTimeout,
        })
        return { changed: false, job: detail, state }
      }),
    )

  return [jobs, job, waitJob]
}
