/**
 * SQL Push-down Tests
 */

import { describe, it, expect } from 'vitest'
import { pushDownSql, quoteIdentifier } from '../../src'
import { boundDatalog, boundMyrial } from './fixtures/plans'

async function pushed(query: string) {
  const [rule] = await boundMyrial(query)
  return rule ? pushDownSql(rule.plan) : undefined
}

describe('pushDownSql', () => {
  it('renames projected columns', async () => {
    const [rule] = await boundDatalog('A(x) :- R(x,3)')
    expect(rule ? pushDownSql(rule.plan) : undefined).toEqual({
      sql: 'SELECT rel0."a" AS "x" FROM "public:adhoc:R" AS rel0 WHERE (rel0."b" = 3)',
      relations: [{ user: 'public', program: 'adhoc', name: 'R' }],
      scheme: [{ name: 'x', type: 'LONG_TYPE' }],
    })
  })

  it('keeps column names that do not change', async () => {
    const query = await pushed('X = select a, b from R where b != 2; store(X, O);')
    expect(query?.sql).toBe('SELECT rel0."a", rel0."b" FROM "public:adhoc:R" AS rel0 WHERE (rel0."b" <> 2)')
  })

  it('quotes string literals', async () => {
    const query = await pushed("X = select id from Emp where name = 'O''Brien'; store(X, O);")
    expect(query?.sql).toBe(`SELECT rel0."id" FROM "public:adhoc:Emp" AS rel0 WHERE (rel0."name" = 'O''Brien')`)
  })

  it('writes computed columns with an alias', async () => {
    const query = await pushed('X = select a * 2 as twice from R where not (a = b); store(X, O);')
    expect(query?.sql).toBe(
      'SELECT (rel0."a" * 2) AS "twice" FROM "public:adhoc:R" AS rel0 WHERE (NOT (rel0."a" = rel0."b"))',
    )
  })

  it('does not push a bare scan', async () => {
    expect(await pushed('X = scan(R); store(X, O);')).toBeNull()
  })

  it('does not push aggregates or joins', async () => {
    expect(await pushed('X = select a, count(*) from R; store(X, O);')).toBeNull()
    expect(await pushed('X = select R.a from R, S; store(X, O);')).toBeNull()
  })
})

describe('quoteIdentifier', () => {
  it('doubles embedded quotes', () => {
    expect(quoteIdentifier('a"b')).toBe('"a""b"')
  })
})
