export type ContainerErrorCode = 'RUN_FAILED' | 'HEALTHCHECK_FAILED' | 'STOP_FAILED' | 'REMOVE_FAILED' | 'MAX_RETRIES'

const DAEMON_HINT = 'If you are using `docker`, please check that the daemon is up-and-running.'

const MESSAGES: Record<ContainerErrorCode, string> = {
  RUN_FAILED: `Couldn't start database container. ${DAEMON_HINT}`,
  HEALTHCHECK_FAILED: `Encountered error while probing database container health. ${DAEMON_HINT}`,
  STOP_FAILED: `Couldn't stop database container. ${DAEMON_HINT}`,
  REMOVE_FAILED: `Couldn't clean up database container. ${DAEMON_HINT}`,
  MAX_RETRIES: 'Max number of retries reached while waiting for database container to start.',
}

/**
 * Failure of the container runtime. Unrelated to query validation errors:
 * these describe the local environment, not the queries.
 */
export class ContainerError extends Error {
  readonly code: ContainerErrorCode
  /** Exit status of the command, when it ran to completion. */
  readonly exitCode: number | undefined

  constructor(code: ContainerErrorCode, details: { exitCode?: number | undefined; cause?: Error | undefined } = {}) {
    super(MESSAGES[code], details.cause ? { cause: details.cause } : undefined)
    this.name = 'ContainerError'
    this.code = code
    this.exitCode = details.exitCode
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.exitCode !== undefined) json.exitCode = this.exitCode
    if (this.cause instanceof Error) {
      json.cause = { message: this.cause.message, name: this.cause.name }
    }
    return json
  }
}
