import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

// Root instance. withTag() copies options, so children are tracked to follow level changes.
export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

const tagged: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  tagged.push(child)
  return child
}

// Set global log level (root + every createLogger child)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of tagged) {
    child.level = level
  }
}

export { LogLevels } from 'consola'
