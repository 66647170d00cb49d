import { setTimeout as delay } from 'node:timers/promises'
import type { ContainerErrorCode } from './errors.js'
import { ContainerError } from './errors.js'
import type { CommandRunner } from './runner.js'
import { spawnRunner } from './runner.js'

// ── Public Types ───────────────────────────────────────────────

export interface ContainerOptions {
  /** Use `podman` instead of `docker`. */
  readonly podman?: boolean | undefined
  readonly name?: string | undefined
  readonly image?: string | undefined
  readonly port?: number | undefined
  readonly password?: string | undefined
  readonly maxRetries?: number | undefined
  readonly retryIntervalMs?: number | undefined
  /** Emit a progress notice every this many failed probes. */
  readonly progressEvery?: number | undefined
  readonly runner?: CommandRunner | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
  readonly onProgress?: ((message: string) => void) | undefined
}

// ── Defaults ───────────────────────────────────────────────────

export const DEFAULT_CONTAINER_NAME = 'querybind_postgres'
export const DEFAULT_IMAGE = 'postgres'
export const DEFAULT_PORT = 5432
export const DEFAULT_PASSWORD = 'postgres'
export const DEFAULT_MAX_RETRIES = 120
export const DEFAULT_RETRY_INTERVAL_MS = 1000
export const DEFAULT_PROGRESS_EVERY = 10

interface ResolvedOptions {
  readonly command: string
  readonly name: string
  readonly image: string
  readonly port: number
  readonly password: string
  readonly maxRetries: number
  readonly retryIntervalMs: number
  readonly progressEvery: number
  readonly runner: CommandRunner
  readonly sleep: (ms: number) => Promise<void>
  readonly onProgress: (message: string) => void
}

function resolveOptions(options: ContainerOptions): ResolvedOptions {
  return {
    command: options.podman === true ? 'podman' : 'docker',
    name: options.name ?? DEFAULT_CONTAINER_NAME,
    image: options.image ?? DEFAULT_IMAGE,
    port: options.port ?? DEFAULT_PORT,
    password: options.password ?? DEFAULT_PASSWORD,
    maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
    retryIntervalMs: options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS,
    progressEvery: options.progressEvery ?? DEFAULT_PROGRESS_EVERY,
    runner: options.runner ?? spawnRunner,
    sleep: options.sleep ?? ((ms) => delay(ms)),
    onProgress: options.onProgress ?? ((message) => console.log(message)),
  }
}

// ── Lifecycle ──────────────────────────────────────────────────

/** Start a disposable PostgreSQL container and wait until it accepts connections. */
export async function setup(options: ContainerOptions = {}): Promise<void> {
  const opts = resolveOptions(options)
  await runOrThrow(
    opts,
    ['run', '-d', '--name', opts.name, '-p', `${opts.port}:5432`, '-e', `POSTGRES_PASSWORD=${opts.password}`, opts.image],
    'RUN_FAILED',
  )
  await healthcheck(opts)
}

/** Stop and remove the container started by `setup`. */
export async function cleanup(options: ContainerOptions = {}): Promise<void> {
  const opts = resolveOptions(options)
  await runOrThrow(opts, ['stop', opts.name], 'STOP_FAILED')
  await runOrThrow(opts, ['rm', '-v', opts.name], 'REMOVE_FAILED')
}

// ── Helpers ────────────────────────────────────────────────────

async function healthcheck(opts: ResolvedOptions): Promise<void> {
  let retries = 0
  while (!(await isHealthy(opts))) {
    if (retries >= opts.maxRetries) {
      throw new ContainerError('MAX_RETRIES')
    }
    await opts.sleep(opts.retryIntervalMs)
    retries++
    if (retries % opts.progressEvery === 0) {
      opts.onProgress(`Container startup slower than expected (${retries} retries out of ${opts.maxRetries})`)
    }
  }
}

async function isHealthy(opts: ResolvedOptions): Promise<boolean> {
  try {
    return (await opts.runner.run(opts.command, ['exec', opts.name, 'pg_isready'])) === 0
  } catch (err) {
    throw new ContainerError('HEALTHCHECK_FAILED', { cause: toError(err) })
  }
}

async function runOrThrow(opts: ResolvedOptions, args: readonly string[], code: ContainerErrorCode): Promise<void> {
  let exitCode: number
  try {
    exitCode = await opts.runner.run(opts.command, args)
  } catch (err) {
    throw new ContainerError(code, { cause: toError(err) })
  }
  if (exitCode !== 0) {
    throw new ContainerError(code, { exitCode })
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
