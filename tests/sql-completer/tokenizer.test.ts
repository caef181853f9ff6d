// tests/sql-completer/tokenizer.test.ts

import { describe, it, expect } from 'vitest'
import { tokenize, significantTokens } from '../../src/lib/sql/completer/tokenizer'

function summary(sql: string) {
  return tokenize(sql).map((t) => [t.type, t.value])
}

describe('tokenize', () => {
  it('classifies keywords, identifiers, literals and comments', () => {
    expect(summary(`SELECT id, 'it''s' FROM "My Table" -- note`)).toEqual([
      ['keyword', 'SELECT'],
      ['identifier', 'id'],
      ['punctuation', ','],
      ['literal', "'it''s'"],
      ['keyword', 'FROM'],
      ['identifier', '"My Table"'],
      ['comment', '-- note'],
    ])
  })

  it('recognizes keywords case-insensitively', () => {
    expect(summary('select Id from t')).toEqual([
      ['keyword', 'select'],
      ['identifier', 'Id'],
      ['keyword', 'from'],
      ['identifier', 't'],
    ])
  })

  it('groups operator characters and numbers', () => {
    expect(summary('a >= 1.5')).toEqual([
      ['identifier', 'a'],
      ['operator', '>='],
      ['literal', '1.5'],
    ])
  })

  it('tracks offsets', () => {
    const [select, star] = tokenize('SELECT  *')
    expect(select).toEqual({ type: 'keyword', value: 'SELECT', start: 0, end: 6 })
    expect(star).toEqual({ type: 'operator', value: '*', start: 8, end: 9 })
  })

  it('runs unterminated strings and comments to the end', () => {
    expect(summary("SELECT 'abc")).toEqual([['keyword', 'SELECT'], ['literal', "'abc"]])
    expect(summary('SELECT /* open')).toEqual([['keyword', 'SELECT'], ['comment', '/* open']])
    expect(summary('FROM "Open')).toEqual([['keyword', 'FROM'], ['identifier', '"Open']])
  })

  it('ends a line comment at the newline', () => {
    expect(summary('-- pick\nFROM')).toEqual([['comment', '-- pick'], ['keyword', 'FROM']])
  })

  it('emits unknown characters one at a time', () => {
    expect(summary('\\dt')).toEqual([['punctuation', '\\'], ['identifier', 'dt']])
  })

  it('reads non-ASCII letters as part of a word', () => {
    expect(summary('FROM café')).toEqual([['keyword', 'FROM'], ['identifier', 'café']])
  })

  it('returns no tokens for blank input', () => {
    expect(tokenize('  \n ')).toEqual([])
  })
})

describe('significantTokens', () => {
  it('drops comments', () => {
    const tokens = significantTokens(tokenize('FROM /* x */ users'))
    expect(tokens.map((t) => t.value)).toEqual(['FROM', 'users'])
  })
})
