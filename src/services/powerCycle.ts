import type { Logger } from '../logger'
import type { PowerCycleStep, ResetType } from '../types/redfish'
import { TimeoutError } from './errors'

export interface PowerControl {
  getPowerState(): Promise<string | undefined>
  resetSystem(resetType: ResetType): Promise<unknown>
  waitForPowerState(state: string, timeoutSeconds?: number): Promise<unknown>
}

export interface PowerCycleResult {
  /** Power state reported before anything was reset. */
  initialPowerState?: string
  steps: PowerCycleStep[]
  resets: ResetType[]
}

// anything short of fully On is treated as needing a power on
function initialStep(powerState: string | undefined): PowerCycleStep {
  return powerState === 'On' ? 'On' : 'Off'
}

/**
 * Graceful shutdown, escalating to ForceOff when the system does not
 * reach Off in time, followed by power on.
 *
 * Each wait gets its own `timeoutSeconds` window, so the worst case is
 * three full windows. A timeout while forcing off or powering on is
 * propagated as is.
 */
export async function powerCycle(
  control: PowerControl,
  timeoutSeconds: number | undefined,
  log?: Logger,
): Promise<PowerCycleResult> {
  const steps: PowerCycleStep[] = []
  const resets: ResetType[] = []

  const reset = async (resetType: ResetType): Promise<void> => {
    resets.push(resetType)
    await control.resetSystem(resetType)
  }

  const powerState = await control.getPowerState()
  let step = initialStep(powerState)
  log?.info({ powerState, timeoutSeconds }, 'power cycling system')
  if (powerState !== 'On' && powerState !== 'Off') {
    log?.warn({ powerState }, 'unexpected power state; skipping shutdown')
  }

  while (true) {
    steps.push(step)
    log?.debug({ step }, 'power cycle step')

    switch (step) {
      case 'On':
        await reset('GracefulShutdown')
        step = 'ShuttingDownGraceful'
        break

      case 'ShuttingDownGraceful':
        try {
          await control.waitForPowerState('Off', timeoutSeconds)
          step = 'Off'
        } catch (error) {
          if (!(error instanceof TimeoutError)) {
            throw error
          }
          log?.error('system failed to shut down gracefully; forcing off')
          await reset('ForceOff')
          step = 'ShuttingDownForced'
        }
        break

      case 'ShuttingDownForced':
        await control.waitForPowerState('Off', timeoutSeconds)
        step = 'Off'
        break

      case 'Off':
        await reset('On')
        step = 'PoweringOn'
        break

      case 'PoweringOn':
        await control.waitForPowerState('On', timeoutSeconds)
        return { initialPowerState: powerState, steps, resets }
    }
  }
}
