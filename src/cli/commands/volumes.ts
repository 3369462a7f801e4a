import { Command } from 'commander'
import { InvalidArgumentError } from '../../services/errors'
import { type CliContext } from '../context'

type VolumesOptions = {
  detail?: boolean
}

type VolumeOptions = {
  byName?: boolean
}

type InitVolumeOptions = {
  slow?: boolean
}

export function createVolumeCommands(context: CliContext): Command[] {
  const volumes = new Command('volumes')
    .description('List virtual disks on every storage controller')
    .option('--detail', 'fetch every volume instead of listing references')
    .action((options: VolumesOptions, command: Command) =>
      context.run(async () => {
        const client = context.connect(command)
        const found = options.detail ? await client.listAllVolumeDetails() : await client.listAllVolumes()
        return { changed: false, volumes: found }
      }),
    )

  const volume = new Command('volume')
    .description('Show one virtual disk by path, id or name')
    .argument('<volume>', 'volume path or id (or name with --by-name)')
    .option('--by-name', 'match on the volume Name instead of its Id')
    .action((target: string, options: VolumeOptions, command: Command) =>
      context.run(async () => {
        const client = context.connect(command)
        const detail = options.byName ? await client.findVolumeByName(target) : await client.getVolume(target)
        if (!detail) {
          throw new InvalidArgumentError(`no volume matches ${target}`)
        }

        return { changed: false, volume: detail }
      }),
    )

  const initVolume = new Command('init-volume')
    .description('Schedule an initialization job for a virtual disk')
    .argument('<volume>', 'volume path or id')
    .option('--slow', 'full initialization instead of a fast one')
    .action((target: string, options: InitVolumeOptions, command: Command) =>
      context.run(async () => {
        const jobId = await context.connect(command).initializeVolume(target, { fast: !options.slow })
        return { changed: true, job: { id: jobId } }
      }),
    )

  return [volumes, volume, initVolume]
}
