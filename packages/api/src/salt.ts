import { v4 as uuidv4, v5 as uuidv5 } from 'uuid'
import { z } from 'zod/v4'
import { InvalidArgumentError } from './errors'

/**
 * Session-scoped 128-bit identifier mixed into every blank node reference.
 */
export const SaltSchema = z.uuid().brand<'Salt'>()

export type Salt = z.infer<typeof SaltSchema>

/** A fresh random salt */
export function createSalt(): Salt {
  return SaltSchema.parse(uuidv4())
}

/**
 * Validate a caller-supplied salt.
 * @throws InvalidArgumentError when the value is not a UUID
 */
export function parseSalt(value: string): Salt {
  const result = SaltSchema.safeParse(value)
  if (!result.success)
    throw new InvalidArgumentError(`Invalid salt (expected a UUID): ${value}`, { cause: result.error })
  return result.data
}

/**
 * Derive the unique reference of a blank node from its native label.
 *
 * Name-based (v5) UUID of the label in the salt's namespace: the same pair always
 * gives the same reference, and the same label under another salt gives another one.
 */
export function combine(label: string, salt: Salt): string {
  return uuidv5(label, salt)
}
