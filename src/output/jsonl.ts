import { once } from 'node:events'
import type { Writable } from 'node:stream'
import type { MessageSink, StreamMessage } from '../streams/messages.js'

/** One message as one line of JSON */
export function serializeMessage(message: StreamMessage): string {
  return JSON.stringify(message) + '\n'
}

/**
 * Sink writing one JSON object per line, waiting for 'drain' when the
 * destination buffers.
 */
export function createJsonLinesSink(out: Writable = process.stdout): MessageSink {
  return async (message) => {
    if (!out.write(serializeMessage(message))) {
      await once(out, 'drain')
    }
  }
}
