/**
 * The script contains no `Speaker: text` line the parser can recognize.
 * Retrying with the same input cannot succeed.
 */
export class ScriptFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ScriptFormatError'
  }
}

/**
 * The supplied configuration or call parameters are invalid or contradict each other.
 * Raised before any estimation work begins.
 */
export class ConfigurationError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid caption configuration: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}
