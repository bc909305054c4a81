import type {GenerationStreamEvent} from '@moodlist/shared-types'

import {getLogger} from './LoggerContext'

/**
 * SSE Writer with queue to prevent concurrent writes
 */
export class SSEWriter {
  /** Writer errored (client gone); queued chunks are dropped */
  private broken = false
  /** No new chunks accepted; already-queued chunks still drain */
  private closed = false
  private encoder = new TextEncoder()
  private writeQueue: Promise<void> = Promise.resolve()

  constructor(private readonly writer: WritableStreamDefaultWriter<Uint8Array>) {}

  async close(): Promise<void> {
    if (this.closed) {
      await this.writeQueue
      return
    }
    this.closed = true
    await this.writeQueue
    if (this.broken) return
    try {
      await this.writer.close()
    } catch (error) {
      getLogger()?.warn('[SSEWriter] Close failed, client likely gone', {error: String(error)})
    }
  }

  /**
   * Wait for all queued writes to complete
   */
  async flush(): Promise<void> {
    await this.writeQueue
  }

  isClosed(): boolean {
    return this.closed
  }

  async write(event: GenerationStreamEvent): Promise<void> {
    this.enqueue(`data: ${JSON.stringify(event)}\n\n`)
    return this.writeQueue
  }

  /**
   * Queue a write without awaiting (fire-and-forget)
   * Use this for non-critical messages to avoid blocking
   */
  writeAsync(event: GenerationStreamEvent): void {
    this.enqueue(`data: ${JSON.stringify(event)}\n\n`)
  }

  async writeHeartbeat(): Promise<void> {
    this.enqueue(': heartbeat\n\n')
    return this.writeQueue
  }

  private enqueue(chunk: string): void {
    if (this.closed) return

    this.writeQueue = this.writeQueue.then(async () => {
      if (this.broken) return
      try {
        await this.writer.write(this.encoder.encode(chunk))
      } catch (error) {
        // Console only: the stream a request logger would forward to is the one failing
        console.error('[SSEWriter] write error:', error)
        this.broken = true
        this.closed = true
      }
    })
  }
}
