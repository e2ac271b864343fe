/**
 * Buffered reader over a device byte stream.
 *
 * Responses mix text lines and raw binary payloads on the same stream, so the reader keeps
 * raw bytes (not decoded text) and lets the caller decide, read by read, whether the next
 * thing is a line or an exact number of bytes.
 */

import { IncompleteReadError, ProtocolError, ReadTimeoutError } from '../waveline-errors'
import { CARRIAGE_RETURN, LINE_FEED } from '../waveline-protocol'

/** Returns the result once available, undefined to keep waiting; may throw */
type ReadAttempt<T> = () => T | undefined

/**
 *
 */
export class LinkReader {
  // Received chunks are kept as they arrive and only joined when a read takes them
  private chunks: Buffer[] = []
  private length = 0
  /** Leading bytes already searched for a line feed */
  private scanned = 0
  private ended = false
  private pending: (() => void) | null = null

  /**
   * Feed raw bytes received from the link.
   * @param data
   */
  feed(data: Buffer): void {
    if (data.length === 0) {
      return
    }
    this.chunks.push(data)
    this.length += data.length
    this.pending?.()
  }

  /**
   * Mark end of stream; pending and future reads fail once the buffer runs dry.
   */
  end(): void {
    this.ended = true
    this.pending?.()
  }

  /**
   * Reset for a fresh connection.
   */
  reset(): void {
    this.clear()
    this.ended = false
  }

  /**
   * Discard buffered bytes.
   */
  clear(): void {
    this.chunks = []
    this.length = 0
    this.scanned = 0
  }

  get bufferedBytes(): number {
    return this.length
  }

  get isEnded(): boolean {
    return this.ended
  }

  /**
   * Read one LF-terminated line. The terminator (and a CR before it) is stripped,
   * so a blank line resolves to an empty buffer.
   * @param timeoutMs - reject with ReadTimeoutError if no full line arrives in time
   */
  readLine(timeoutMs?: number): Promise<Buffer> {
    return this.waitFor(() => {
      const end = this.findLineFeed()
      if (end === -1) {
        if (this.ended) {
          throw new IncompleteReadError(this.take(this.length), null)
        }
        return undefined
      }
      const line = this.take(end + 1)
      const contentEnd = end > 0 && line[end - 1] === CARRIAGE_RETURN ? end - 1 : end
      return line.subarray(0, contentEnd)
    }, timeoutMs)
  }

  /**
   * Read lines until the stream stays silent for `timeoutMs` (not an error: it ends the block).
   * @param timeoutMs
   * @param limit - stop after this many lines
   */
  async readLines(timeoutMs: number, limit?: number): Promise<Buffer[]> {
    const lines: Buffer[] = []
    while (limit === undefined || lines.length < limit) {
      try {
        lines.push(await this.readLine(timeoutMs))
      } catch (error) {
        if (error instanceof ReadTimeoutError) {
          break
        }
        throw error
      }
    }
    return lines
  }

  /**
   * Read exactly `size` bytes.
   * @param size
   * @param timeoutMs
   * @throws IncompleteReadError if the stream ends first
   */
  readExactly(size: number, timeoutMs?: number): Promise<Buffer> {
    return this.waitFor(() => {
      if (this.length >= size) {
        return this.take(size)
      }
      if (this.ended) {
        throw new IncompleteReadError(this.take(this.length), size)
      }
      return undefined
    }, timeoutMs)
  }

  private findLineFeed(): number {
    let offset = 0
    for (const chunk of this.chunks) {
      if (offset + chunk.length > this.scanned) {
        const index = chunk.indexOf(LINE_FEED, Math.max(this.scanned - offset, 0))
        if (index !== -1) {
          return offset + index
        }
      }
      offset += chunk.length
    }
    this.scanned = this.length
    return -1
  }

  private take(size: number): Buffer {
    const parts: Buffer[] = []
    let remaining = size
    while (remaining > 0) {
      const head = this.chunks[0]
      if (head.length <= remaining) {
        parts.push(head)
        this.chunks.shift()
        remaining -= head.length
      } else {
        parts.push(head.subarray(0, remaining))
        this.chunks[0] = head.subarray(remaining)
        remaining = 0
      }
    }
    this.length -= size
    this.scanned = Math.max(this.scanned - size, 0)
    return parts.length === 1 ? parts[0] : Buffer.concat(parts, size)
  }

  private waitFor<T>(attempt: ReadAttempt<T>, timeoutMs?: number): Promise<T> {
    if (this.pending) {
      return Promise.reject(new ProtocolError('Another read is already pending on this link'))
    }

    return new Promise<T>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null

      const finish = (): void => {
        this.pending = null
        if (timer) {
          clearTimeout(timer)
          timer = null
        }
      }

      const settle = (): void => {
        let result: T | undefined
        try {
          result = attempt()
        } catch (error) {
          finish()
          reject(error)
          return
        }
        if (result !== undefined) {
          finish()
          resolve(result)
        }
      }

      this.pending = settle
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          finish()
          reject(new ReadTimeoutError(timeoutMs))
        }, timeoutMs)
      }
      settle()
    })
  }
}
