import { combine, createSalt, InvalidArgumentError, parseSalt, SaltSchema } from '@termbridge/api'
import { describe, expect, it } from 'vitest'

const SALT_A = '11111111-1111-4111-8111-111111111111'
const SALT_B = '22222222-2222-4222-8222-222222222222'
const V5_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe('salt', () => {
  it('createSalt draws a new UUID each time', () => {
    const first = createSalt()
    const second = createSalt()
    expect(first).not.toBe(second)
    expect(SaltSchema.safeParse(first).success).toBe(true)
  })

  it('parseSalt accepts a UUID', () => {
    expect(parseSalt(SALT_A)).toBe(SALT_A)
  })

  it('parseSalt rejects anything else', () => {
    expect(() => parseSalt('not-a-uuid')).toThrow(InvalidArgumentError)
    expect(() => parseSalt('not-a-uuid')).toThrow('Invalid salt (expected a UUID): not-a-uuid')
  })
})

describe('combine', () => {
  const saltA = parseSalt(SALT_A)
  const saltB = parseSalt(SALT_B)

  it('is deterministic for one label and salt', () => {
    expect(combine('b1', saltA)).toBe(combine('b1', saltA))
  })

  it('differs between salts for the same label', () => {
    expect(combine('b1', saltA)).not.toBe(combine('b1', saltB))
  })

  it('differs between labels for the same salt', () => {
    expect(combine('b1', saltA)).not.toBe(combine('b2', saltA))
  })

  it('produces a name-based UUID', () => {
    expect(combine('b1', saltA)).toMatch(V5_UUID)
  })
})
