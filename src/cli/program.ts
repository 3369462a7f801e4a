import { Command } from 'commander'
import { createJobCommands } from './commands/jobs'
import { createSystemCommands } from './commands/system'
import { createVolumeCommands } from './commands/volumes'
import { type CliDependencies, createContext, parseSeconds } from './context'

export function createCli(dependencies: CliDependencies = {}): Command {
  const context = createContext(dependencies)
  const program = new Command()

  program
    .name('redfish-ctl')
    .description('Inspect and operate a server through its Redfish management controller')
    .version('0.1.0')
    .option('--host <host>', 'controller hostname (env: REDFISH_HOST)')
    .option('-u, --username <username>', 'controller user (env: REDFISH_USERNAME)')
    .option('-p, --password <password>', 'controller password (env: REDFISH_PASSWORD)')
    .option('--no-verify', 'skip TLS certificate verification (env: REDFISH_VERIFY_TLS=false)')
    .option('--timeout <seconds>', 'default wait timeout (env: REDFISH_TIMEOUT)', parseSeconds)

  for (const command of [
    ...createSystemCommands(context),
    ...createJobCommands(context),
    ...createVolumeCommands(context),
  ]) {
    program.addCommand(command)
  }

  return program
}
