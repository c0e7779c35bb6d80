import {
  type EngineConfig,
  EngineConfigSchema,
  type EngineConfigProcessed,
  findConfigContradictions,
} from '@script-captions/config'
import { ConfigurationError } from './errors'

/**
 * Apply defaults to a partial configuration and reject it if it is invalid or self-contradictory.
 * @throws {ConfigurationError}
 */
export function resolveEngineConfig(
  config: EngineConfig = {},
): EngineConfigProcessed {
  const parsed = EngineConfigSchema.safeParse(config)
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`,
      ),
    )
  }

  const contradictions = findConfigContradictions(parsed.data)
  if (contradictions.length > 0) {
    throw new ConfigurationError(contradictions)
  }

  return parsed.data
}

/**
 * Reject a total duration that cannot be used for rescaling.
 * @throws {ConfigurationError}
 */
export function assertValidTotalDuration(totalDuration: number): void {
  if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
    throw new ConfigurationError([
      `totalDuration must be a positive number, received ${totalDuration}`,
    ])
  }
}
