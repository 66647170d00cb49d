export type { ContainerOptions } from './container.js'
export {
  cleanup,
  DEFAULT_CONTAINER_NAME,
  DEFAULT_IMAGE,
  DEFAULT_MAX_RETRIES,
  DEFAULT_PASSWORD,
  DEFAULT_PORT,
  DEFAULT_PROGRESS_EVERY,
  DEFAULT_RETRY_INTERVAL_MS,
  setup,
} from './container.js'
export type { ContainerErrorCode } from './errors.js'
export { ContainerError } from './errors.js'
export type { CommandRunner } from './runner.js'
export { spawnRunner } from './runner.js'
