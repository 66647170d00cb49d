import type { ValidationError } from '../errors.js'
import type { ModuleInfo, ParsedModule } from './module.js'
import type { ValidatedModule } from './validated.js'

export interface ModuleInput {
  readonly info: ModuleInfo
  readonly module: ParsedModule
}

export interface ValidationFailure {
  readonly path: string
  readonly error: ValidationError
  readonly diagnostic: string
}

export interface DebugLogEntry {
  timestamp: number
  phase: 'validation' | 'rejection'
  message: string
  details?: unknown
}

export interface ValidationRun {
  readonly modules: readonly ValidatedModule[]
  readonly failures: readonly ValidationFailure[]
  readonly debugLog?: readonly DebugLogEntry[] | undefined
}
