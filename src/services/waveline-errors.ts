// ============================================================================
// Driver Errors
// ============================================================================

/**
 * Operation attempted without an open device connection, or the link failed.
 */
export class ConnectionError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ConnectionError'
  }
}

/**
 * Expected response absent or malformed beyond repair.
 */
export class ProtocolError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ProtocolError'
  }
}

/**
 * No complete line arrived within the read timeout.
 */
export class ReadTimeoutError extends ProtocolError {
  /**
   *
   * @param timeoutMs
   */
  constructor(readonly timeoutMs: number) {
    super(`No response within ${timeoutMs} ms`)
    this.name = 'ReadTimeoutError'
  }
}

/**
 * The byte stream ended before the expected number of bytes (or a line terminator) arrived.
 * `expected` is null when a line was being read.
 */
export class IncompleteReadError extends ProtocolError {
  /**
   *
   * @param partial
   * @param expected
   */
  constructor(
    readonly partial: Buffer,
    readonly expected: number | null
  ) {
    super(
      expected === null
        ? `Stream ended inside a line (${partial.length} bytes buffered)`
        : `Stream ended after ${partial.length} of ${expected} expected bytes`
    )
    this.name = 'IncompleteReadError'
  }
}

/**
 * Caller-supplied argument outside the allowed domain. Raised before anything is written.
 */
export class ValidationError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 *
 */
export class FirmwareTooOldError extends Error {
  /**
   *
   * @param version
   * @param minimum
   */
  constructor(
    readonly version: string,
    readonly minimum: string
  ) {
    super(`Firmware version ${version} < ${minimum}. Upgrade required.`)
    this.name = 'FirmwareTooOldError'
  }
}
