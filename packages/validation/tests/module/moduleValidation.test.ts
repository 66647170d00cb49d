import { describe, expect, it } from 'vitest'
import { ValidationError } from '../../src/errors.js'
import type { ValidatedModule } from '../../src/types/validated.js'
import { validateModule } from '../../src/validation/moduleValidator.js'
import {
  extended,
  ident,
  implicit,
  indexed,
  moduleInfo,
  offsetOf,
  parsedModule,
  query,
  spanOf,
  typeAnnotation,
} from '../fixtures/testModule.js'
import { usersInfo, usersModule } from '../fixtures/usersModule.js'

function expectValid(result: ValidatedModule | ValidationError): ValidatedModule {
  if (result instanceof ValidationError) {
    throw new Error(`Expected a valid module, got:\n${result.message}`)
  }
  return result
}

describe('validateModule', () => {
  it('validates every query in declaration order', () => {
    const validated = expectValid(validateModule(usersInfo(), usersModule()))
    expect(validated.queries.map((q) => [q.kind, q.name.value])).toEqual([
      ['extended', 'users_by_email'],
      ['pg-compatible', 'user_ids'],
    ])
    const [byEmail] = validated.queries
    expect(byEmail?.sql).toBe('SELECT id, email, nickname FROM users WHERE email = $2 AND active = $1;')
  })

  it('keeps the registries and the shared module info', () => {
    const info = usersInfo()
    const module = usersModule()
    const validated = expectValid(validateModule(info, module))
    expect(validated.info).toBe(info)
    expect(validated.paramTypes).toBe(module.paramTypes)
    expect(validated.rowTypes).toBe(module.rowTypes)
    expect(validated.dbTypes).toBe(module.dbTypes)
  })

  it('produces identical output on repeated runs', () => {
    const info = usersInfo()
    const module = usersModule()
    expect(validateModule(info, module)).toEqual(validateModule(info, module))
  })

  it('rejects duplicate query names with both positions', () => {
    const src = [
      '--! get_user (id) : (id)',
      'SELECT id FROM users WHERE id = $1;',
      '',
      '--! get_user : (id)',
      'SELECT id FROM users;',
    ].join('\n')
    const module = parsedModule({
      queries: [
        query(src, {
          name: 'get_user',
          param: implicit(ident(src, 'id')),
          row: implicit(ident(src, 'id', 1)),
          sql: 'SELECT id FROM users WHERE id = $1;',
          bindParams: [indexed(src, '$1')],
        }),
        query(src, {
          name: 'get_user',
          nameOccurrence: 1,
          row: implicit(ident(src, 'id', 4)),
          sql: 'SELECT id FROM users;',
        }),
      ],
    })
    const err = validateModule(moduleInfo(src), module)
    expect(err instanceof ValidationError && err.variant).toEqual({
      code: 'DUPLICATE_QUERY_NAME',
      name: spanOf(src, 'get_user', 'get_user', 1),
      firstDefined: spanOf(src, 'get_user', 'get_user'),
    })
  })

  it('rejects duplicate fields in a declared struct', () => {
    const src = '--: Address(street, city, street)'
    const module = parsedModule({
      dbTypes: [typeAnnotation(src, 'Address', [ident(src, 'street'), ident(src, 'city'), ident(src, 'street', 1)])],
    })
    const err = validateModule(moduleInfo(src), module)
    expect(err instanceof ValidationError && err.variant).toEqual({
      code: 'DUPLICATE_FIELD',
      pos: offsetOf(src, 'street', 1),
    })
  })

  it('stops at the first failing query', () => {
    const src = [
      '--! first (a, b) : ()',
      'SELECT $1;',
      '--! second () : ()',
      'SELECT $1, :x;',
    ].join('\n')
    const module = parsedModule({
      queries: [
        query(src, {
          name: 'first',
          param: implicit(ident(src, 'a'), ident(src, 'b')),
          sql: 'SELECT $1;',
          bindParams: [indexed(src, '$1')],
        }),
        query(src, {
          name: 'second',
          sql: 'SELECT $1, :x;',
          bindParams: [indexed(src, '$1', 1), extended(src, ':x')],
        }),
      ],
    })
    const err = validateModule(moduleInfo(src), module)
    expect(err instanceof ValidationError && err.variant).toEqual({
      code: 'UNUSED_PARAM',
      pos: offsetOf(src, 'b'),
      index: 2,
    })
  })

  it('shares one module info object across errors', () => {
    const src = '--: Address(street, street)'
    const info = moduleInfo(src)
    const module = parsedModule({
      rowTypes: [typeAnnotation(src, 'Address', [ident(src, 'street'), ident(src, 'street', 1)])],
    })
    const first = validateModule(info, module)
    const second = validateModule(info, module)
    expect(first instanceof ValidationError && first.info).toBe(info)
    expect(second instanceof ValidationError && second.info).toBe(info)
  })
})
