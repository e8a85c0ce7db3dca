import type { AggregatedResult } from '../scanner/types.js'

/**
 * Consumer of a cycle's filtered result.
 * Implementations throw SinkError on failure; `fatal` decides whether the loop stops.
 */
export interface Sink {
  readonly name: string
  deliver(result: AggregatedResult): Promise<void>
}
