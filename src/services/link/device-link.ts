import type EventEmitter from 'events'

/**
 * Byte transport to a device (TCP socket or serial port).
 *
 * Events:
 * - 'data' (chunk: Buffer)
 * - 'error' (error: Error)
 * - 'close' ()
 */
export interface DeviceLink extends EventEmitter {
  readonly isOpen: boolean
  /** Human readable endpoint for log lines, e.g. "192.168.0.100:5432" */
  readonly description: string
  open(): Promise<void>
  close(): Promise<void>
  write(data: Buffer): Promise<void>
  /** Stop emitting 'data' until resume(); the transport holds incoming bytes meanwhile */
  pause(): void
  resume(): void
}
