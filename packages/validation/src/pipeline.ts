import { renderDiagnostic } from './diagnostics.js'
import { ValidationError } from './errors.js'
import type { DebugLogEntry, ModuleInput, ValidationFailure, ValidationRun } from './types/result.js'
import type { ValidatedModule } from './types/validated.js'
import { validateModule } from './validation/moduleValidator.js'

// ── Public Types ───────────────────────────────────────────────

export interface ValidateModulesOptions {
  readonly debug?: boolean | undefined
}

// ── validateModules ────────────────────────────────────────────

/**
 * Validate several modules. Modules are independent: a rejected module
 * yields one failure and does not stop the others.
 */
export function validateModules(
  inputs: readonly ModuleInput[],
  options: ValidateModulesOptions = {},
): ValidationRun {
  const debug = options.debug === true
  const log: DebugLogEntry[] = []
  const modules: ValidatedModule[] = []
  const failures: ValidationFailure[] = []

  for (const { info, module } of inputs) {
    const t0 = Date.now()
    const result = validateModule(info, module)
    const durationMs = Date.now() - t0
    if (result instanceof ValidationError) {
      failures.push({ path: info.path, error: result, diagnostic: renderDiagnostic(result) })
      if (debug) {
        log.push(entry('rejection', `Rejected ${info.path}`, durationMs, { path: info.path, code: result.variant.code }))
      }
    } else {
      modules.push(result)
      if (debug) {
        log.push(
          entry('validation', `Validated ${info.path}`, durationMs, {
            path: info.path,
            queries: result.queries.length,
          }),
        )
      }
    }
  }

  return debug ? { modules, failures, debugLog: log } : { modules, failures }
}

/** Throw the first failure of a run, for callers that abort code generation. */
export function assertValid(run: ValidationRun): readonly ValidatedModule[] {
  const [first] = run.failures
  if (first !== undefined) throw first.error
  return run.modules
}

// ── Debug Helpers ──────────────────────────────────────────────

function entry(phase: DebugLogEntry['phase'], message: string, durationMs: number, details?: unknown): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
  }
  if (details !== undefined) result.details = details
  return result
}
