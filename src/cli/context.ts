import { type Command, InvalidArgumentError as CommanderArgumentError } from 'commander'
import { type ConnectionConfig, loadConnectionConfig } from '../config'
import { RedfishClient } from '../services/redfishClient'
import { type CommandResult, printJson, toFailureReport, type Writer } from './output'

export type GlobalOptions = {
  host?: string
  username?: string
  password?: string
  verify?: boolean
  timeout?: number
}

export interface CliDependencies {
  createClient?: (config: ConnectionConfig) => RedfishClient
  write?: Writer
  env?: NodeJS.ProcessEnv
}

export interface CliContext {
  connect(command: Command): RedfishClient
  run(task: () => Promise<CommandResult>): Promise<void>
}

export function parseSeconds(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CommanderArgumentError('expected a positive number of seconds')
  }

  return parsed
}

export function createContext(dependencies: CliDependencies = {}): CliContext {
  const write = dependencies.write ?? ((text: string) => process.stdout.write(text))
  const createClient = dependencies.createClient ?? ((config: ConnectionConfig) => RedfishClient.fromConfig(config))

  return {
    connect(command) {
      const options = command.optsWithGlobals<GlobalOptions>()
      const config = loadConnectionConfig(
        {
          host: options.host,
          username: options.username,
          password: options.password,
          // --no-verify only ever turns verification off; otherwise the environment decides
          verifyTls: options.verify === false ? false : undefined,
          timeout: options.timeout,
        },
        dependencies.env,
      )

      return createClient(config)
    },

    async run(task) {
      try {
        printJson(write, await task())
      } catch (error) {
        printJson(write, toFailureReport(error))
        process.exitCode = 1
      }
    },
  }
}
