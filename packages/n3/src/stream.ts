import type * as RDF from '@rdfjs/types'
import { createLogger } from '@termbridge/utils/logger'
import { Writable } from 'node:stream'

const log = createLogger('QuadStream')

/** Receives each converted statement */
export type StatementConsumer<T> = (statement: T) => void

/** Native-parser callback shape: one call per quad, then one call with no quad at the end */
export type NativeQuadCallback = (error: Error | null | undefined, quad: RDF.Quad | null | undefined) => void

export interface StreamOptions {
  /**
   * Salt shared by every event of the session.
   * Omit it to start a new blank node identity session; pass a previous session's salt to continue it.
   */
  salt?: string
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Sink for push-based native quad events.
 *
 * The converter is bound to one salt when the adapter is built, so a blank node
 * label repeated within one stream always resolves to the same blank node.
 */
export class QuadStreamAdapter<T> {
  constructor(
    private readonly convert: (quad: RDF.Quad) => T,
    private readonly consumer: StatementConsumer<T>,
  ) {
    log.debug('Opened stream session')
  }

  /**
   * Convert one native quad and hand it to the consumer.
   * @throws ConversionError when the quad cannot be converted; the consumer is not called
   */
  quad(quad: RDF.Quad): void {
    this.consumer(this.convert(quad))
  }

  /**
   * Callback for n3's `Parser#parse(input, callback)`.
   * `done` is called once: with the first parse or conversion error, or with nothing at the end of input.
   */
  parseCallback(done: (error?: Error) => void): NativeQuadCallback {
    let finished = false
    const finish = (error?: Error) => {
      if (finished)
        return
      finished = true
      done(error)
    }

    return (error, quad) => {
      if (finished)
        return
      if (error) {
        finish(error)
        return
      }
      if (!quad) {
        finish()
        return
      }
      try {
        this.quad(quad)
      }
      catch (err) {
        finish(toError(err))
      }
    }
  }

  /**
   * Object-mode Writable for `StreamParser#pipe()`. A conversion error fails the stream.
   */
  writable(): Writable {
    return new Writable({
      objectMode: true,
      write: (quad: RDF.Quad, _encoding, callback) => {
        try {
          this.quad(quad)
          callback()
        }
        catch (err) {
          callback(toError(err))
        }
      },
    })
  }
}
