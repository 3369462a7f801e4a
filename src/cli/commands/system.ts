import { Command } from 'commander'
import type { ActionDescriptor } from '../../utils/redfish'
import { type CliContext, parseSeconds } from '../context'

function serializeAction(action: ActionDescriptor) {
  return {
    name: action.name,
    target: action.target,
    allowableValues: Object.fromEntries(
      [...action.allowableValues.entries()].map(([parameter, values]) => [parameter, [...values]]),
    ),
  }
}

export function createSystemCommands(context: CliContext): Command[] {
  const test = new Command('test')
    .description('Check that the controller answers with the given credentials')
    .action((_options: unknown, command: Command) =>
      context.run(async () => {
        await context.connect(command).testConnection()
        return { changed: false }
      }),
    )

  const system = new Command('system').description('Show the computer system resource').action((_options: unknown, command: Command) =>
    context.run(async () => ({ changed: false, system: await context.connect(command).getSystem() })),
  )

  const manager = new Command('manager').description('Show the manager resource').action((_options: unknown, command: Command) =>
    context.run(async () => ({ changed: false, manager: await context.connect(command).getManager() })),
  )

  const resource = new Command('resource')
    .description('Fetch any resource by path')
    .argument('<path>', 'absolute resource path, e.g. /redfish/v1/Systems')
    .action((path: string, _options, command: Command) =>
      context.run(async () => ({ changed: false, resource: await context.connect(command).getResource(path) })),
    )

  const actions = new Command('actions')
    .description('List the actions a resource advertises and their allowed parameter values')
    .argument('<path>', 'absolute resource path')
    .action((path: string, _options, command: Command) =>
      context.run(async () => {
        const descriptors = await context.connect(command).describeActions(path)
        return { changed: false, actions: descriptors.map(serializeAction) }
      }),
    )

  const resetSystem = new Command('reset-system')
    .description('Run ComputerSystem.Reset with the given reset type')
    .argument('<resetType>', 'e.g. On, ForceOff, GracefulShutdown')
    .action((resetType: string, _options, command: Command) =>
      context.run(async () => {
        await context.connect(command).resetSystem(resetType)
        return { changed: true }
      }),
    )

  const rebootSystem = new Command('reboot-system')
    .description('Shut down gracefully (forcing off if needed), then power on')
    .option('--wait-timeout <seconds>', 'time allowed for each power state change', parseSeconds)
    .action((options: { waitTimeout?: number }, command: Command) =>
      context.run(async () => {
        const result = await context.connect(command).powerCycleSystem(options.waitTimeout)
        return { changed: true, initialPowerState: result.initialPowerState, resets: result.resets }
      }),
    )

  const resetManager = new Command('reset-manager')
    .description('Gracefully restart the management controller')
    .action((_options: unknown, command: Command) =>
      context.run(async () => {
        await context.connect(command).resetManager()
        return { changed: true }
      }),
    )

  return [test, system, manager, resource, actions, resetSystem, rebootSystem, resetManager]
}
