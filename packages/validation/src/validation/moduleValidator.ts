import { ValidationError } from '../errors.js'
import type { ModuleInfo, ParsedModule } from '../types/module.js'
import type { ValidatedModule, ValidatedQuery } from '../types/validated.js'
import { validateQuery } from './queryValidator.js'
import { checkDuplicateFields, checkQueryNameCollisions } from './rules.js'

/**
 * Validate a whole module: query name uniqueness, declared struct fields,
 * then every query in declaration order. The first failure rejects the module.
 */
export function validateModule(info: ModuleInfo, module: ParsedModule): ValidatedModule | ValidationError {
  const collision = checkQueryNameCollisions(info, module.queries)
  if (collision !== null) return collision

  for (const ty of [...module.paramTypes, ...module.rowTypes, ...module.dbTypes]) {
    const err = checkDuplicateFields(info, ty.fields)
    if (err !== null) return err
  }

  const queries: ValidatedQuery[] = []
  for (const query of module.queries) {
    const validated = validateQuery(info, query)
    if (validated instanceof ValidationError) return validated
    queries.push(validated)
  }

  return {
    info,
    paramTypes: module.paramTypes,
    rowTypes: module.rowTypes,
    dbTypes: module.dbTypes,
    queries,
  }
}
