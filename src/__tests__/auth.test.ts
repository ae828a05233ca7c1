/// <reference types="vitest/globals" />

import { parseBasicAuth, readSessionToken } from '../server/auth.js'

function basic(credentials: string): string {
  return `Basic ${Buffer.from(credentials, 'utf-8').toString('base64')}`
}

describe('parseBasicAuth', () => {
  it('decodes username and password', () => {
    expect(parseBasicAuth(basic('alice:test-password'))).toEqual({
      username: 'alice',
      password: 'test-password',
    })
  })

  it('splits on the first colon only', () => {
    expect(parseBasicAuth(basic('alice:pa:ss'))).toEqual({ username: 'alice', password: 'pa:ss' })
  })

  it('accepts an empty password', () => {
    expect(parseBasicAuth(basic('alice:'))).toEqual({ username: 'alice', password: '' })
  })

  it('treats the scheme case-insensitively', () => {
    const header = basic('alice:test-password').replace('Basic', 'basic')
    expect(parseBasicAuth(header)).toEqual({ username: 'alice', password: 'test-password' })
  })

  it('returns null without a password part', () => {
    expect(parseBasicAuth(basic('alice'))).toBeNull()
  })

  it('returns null for a missing header', () => {
    expect(parseBasicAuth(undefined)).toBeNull()
  })

  it('returns null for other schemes', () => {
    expect(parseBasicAuth('Bearer test-token')).toBeNull()
  })

  it('returns null for a bare scheme', () => {
    expect(parseBasicAuth('Basic')).toBeNull()
  })
})

describe('readSessionToken', () => {
  it('strips token= from the query string', () => {
    expect(readSessionToken('/get/db-password?token=abc')).toBe('abc')
  })

  it('has no token when the URL has no query', () => {
    expect(readSessionToken('/get/db-password')).toBeUndefined()
  })

  it('uses an empty query as an empty token', () => {
    expect(readSessionToken('/get/db-password?')).toBe('')
  })

  it('uses any other query verbatim', () => {
    expect(readSessionToken('/get/db-password?tok=abc')).toBe('tok=abc')
  })

  it('strips every token= occurrence', () => {
    expect(readSessionToken('/set/a/b?token=abc&token=def')).toBe('abc&def')
  })
})
