import { z } from 'zod'
import { InvalidArgumentError } from './services/errors'

export const DEFAULT_POWER_CYCLE_TIMEOUT_SECONDS = 300
export const DEFAULT_POLL_INTERVAL_SECONDS = 5

const booleanish = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => ['true', 'false', '1', '0', 'yes', 'no'].includes(value), {
      message: 'expected true or false',
    })
    .transform((value) => value === 'true' || value === '1' || value === 'yes'),
])

export const connectionConfigSchema = z.object({
  host: z
    .string()
    .trim()
    .min(1, 'host is required')
    .refine((value) => !value.includes('://') && !value.includes('/'), {
      message: 'host must be a bare hostname or host:port',
    }),
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  verifyTls: booleanish.default(true),
  timeout: z.coerce.number().int().positive().optional(),
})

export type ConnectionConfigInput = z.input<typeof connectionConfigSchema>
export type ConnectionConfig = z.output<typeof connectionConfigSchema>

export function parseConnectionConfig(input: unknown): ConnectionConfig {
  const result = connectionConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    throw new InvalidArgumentError(`invalid connection settings: ${issues.join('; ')}`)
  }

  return result.data
}

function definedOnly(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined && value !== ''))
}

/**
 * Merges explicit settings over `REDFISH_*` environment variables.
 */
export function loadConnectionConfig(
  overrides: Partial<Record<keyof ConnectionConfigInput, string | number | boolean | undefined>> = {},
  env: NodeJS.ProcessEnv = process.env,
): ConnectionConfig {
  const fromEnv = definedOnly({
    host: env.REDFISH_HOST,
    username: env.REDFISH_USERNAME,
    password: env.REDFISH_PASSWORD,
    verifyTls: env.REDFISH_VERIFY_TLS,
    timeout: env.REDFISH_TIMEOUT,
  })

  return parseConnectionConfig({ ...fromEnv, ...definedOnly(overrides) })
}
