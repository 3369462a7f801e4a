import { logger } from '../logger'
import { createCli } from './program'

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'command failed')
    process.exitCode = 1
  })
