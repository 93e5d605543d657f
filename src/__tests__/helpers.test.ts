import { describe, it } from 'node:test'
import assert from 'node:assert/strict'

import {
  asBoolean,
  asNumber,
  asOneOf,
  clamp,
  errorCode,
  isRecord,
} from '../helpers.js'

describe('isRecord', () => {
  it('returns true for plain objects', () => {
    assert.equal(isRecord({}), true)
    assert.equal(isRecord({ a: 1 }), true)
  })

  it('returns false for non-objects', () => {
    assert.equal(isRecord(null), false)
    assert.equal(isRecord(undefined), false)
    assert.equal(isRecord(42), false)
    assert.equal(isRecord('string'), false)
    assert.equal(isRecord([1, 2]), false)
  })
})

describe('asNumber', () => {
  it('returns number for valid numbers', () => {
    assert.equal(asNumber(42, 0), 42)
    assert.equal(asNumber(0, 99), 0)
    assert.equal(asNumber(-1, 0), -1)
  })

  it('returns fallback for non-numbers', () => {
    assert.equal(asNumber('42', 0), 0)
    assert.equal(asNumber(null, 0), 0)
    assert.equal(asNumber(undefined, 0), 0)
    assert.equal(asNumber(NaN, 0), 0)
    assert.equal(asNumber(Infinity, 0), 0)
    assert.equal(asNumber(-Infinity, 0), 0)
  })

  it('returns undefined without fallback for non-numbers', () => {
    assert.equal(asNumber('42'), undefined)
    assert.equal(asNumber(NaN), undefined)
    assert.equal(asNumber(Infinity), undefined)
  })

  it('returns number without fallback for valid numbers', () => {
    assert.equal(asNumber(42), 42)
    assert.equal(asNumber(0), 0)
  })
})

describe('asBoolean', () => {
  it('returns boolean for booleans', () => {
    assert.equal(asBoolean(true, false), true)
    assert.equal(asBoolean(false, true), false)
  })

  it('returns fallback for non-booleans', () => {
    assert.equal(asBoolean(1, false), false)
    assert.equal(asBoolean('true', false), false)
    assert.equal(asBoolean(null, true), true)
  })
})

describe('asOneOf', () => {
  const modes = ['multiColor', 'monochrome'] as const

  it('accepts a listed value', () => {
    assert.equal(asOneOf('monochrome', modes, 'multiColor'), 'monochrome')
  })

  it('falls back for unlisted or non-string values', () => {
    assert.equal(asOneOf('neon', modes, 'multiColor'), 'multiColor')
    assert.equal(asOneOf(1, modes, 'multiColor'), 'multiColor')
  })
})

describe('clamp', () => {
  it('bounds on both sides', () => {
    assert.equal(clamp(-5, 0, 10), 0)
    assert.equal(clamp(15, 0, 10), 10)
    assert.equal(clamp(7, 0, 10), 7)
  })
})

describe('errorCode', () => {
  it('reads string codes only', () => {
    assert.equal(errorCode({ code: 'ENOENT' }), 'ENOENT')
    assert.equal(errorCode({ code: 2 }), undefined)
    assert.equal(errorCode('ENOENT'), undefined)
  })
})
