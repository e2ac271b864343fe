import EventEmitter from 'events'
import { SerialPort } from 'serialport'

import { createLogger } from '../../libs/logger'
import { ConnectionError, ValidationError } from '../waveline-errors'
import type { DeviceLink } from './device-link'

const log = createLogger('SerialLink')

export const DEFAULT_BAUD_RATE = 115200

/**
 * Serial port link addressed by URL: `serial:<path>?baudrate=<n>`
 * e.g. `serial:/dev/ttyACM0?baudrate=115200` or `serial:COM6`.
 */
export class SerialLink extends EventEmitter implements DeviceLink {
  readonly path: string
  readonly baudRate: number
  private port: SerialPort | null = null

  /**
   *
   * @param uri
   */
  constructor(uri: URL) {
    super()
    if (uri.protocol !== 'serial:') {
      throw new ValidationError(`Unsupported link URI '${uri.href}', expected serial:<path>`)
    }
    this.path = decodeURIComponent(uri.pathname)
    if (!this.path) {
      throw new ValidationError(`Missing serial port path in '${uri.href}'`)
    }
    const baud = uri.searchParams.get('baudrate')
    this.baudRate = baud ? Number.parseInt(baud, 10) : DEFAULT_BAUD_RATE
    if (!Number.isInteger(this.baudRate) || this.baudRate <= 0) {
      throw new ValidationError(`Invalid baud rate '${baud}'`)
    }
  }

  /**
   *
   * @param path
   * @param baudRate
   */
  static fromPath(path: string, baudRate = DEFAULT_BAUD_RATE): SerialLink {
    return new SerialLink(new URL(`serial:${encodeURI(path)}?baudrate=${baudRate}`))
  }

  get isOpen(): boolean {
    return this.port?.isOpen ?? false
  }

  get description(): string {
    return this.path
  }

  async open(): Promise<void> {
    if (this.isOpen) {
      return
    }

    const port = new SerialPort({
      path: this.path,
      baudRate: this.baudRate,
      dataBits: 8,
      autoOpen: false,
    })

    await new Promise<void>((resolve, reject) => {
      port.open((error) => {
        if (error) {
          reject(new ConnectionError(`Failed to open port ${this.path}: ${error.message}`))
          return
        }
        resolve()
      })
    })
    log.debug(`Opened ${this.path} @ ${this.baudRate} baud`)

    port.on('data', (data: Buffer) => this.emit('data', data))
    port.on('error', (error: Error) => {
      log.error(`Serial error on ${this.path}: ${error.message}`)
      this.emit('error', error)
    })
    port.on('close', () => {
      log.debug(`Closed ${this.path}`)
      this.port = null
      this.emit('close')
    })
    this.port = port
  }

  async close(): Promise<void> {
    const port = this.port
    if (!port || !port.isOpen) {
      return
    }
    await new Promise<void>((resolve, reject) => {
      port.close((error) => (error ? reject(error) : resolve()))
    })
  }

  async write(data: Buffer): Promise<void> {
    const port = this.port
    if (!port || !port.isOpen) {
      throw new ConnectionError(`Port ${this.path} is not open`)
    }
    await new Promise<void>((resolve, reject) => {
      port.write(data, (error) => {
        if (error) {
          reject(error)
          return
        }
        port.drain((drainError) => (drainError ? reject(drainError) : resolve()))
      })
    })
  }

  pause(): void {
    this.port?.pause()
  }

  resume(): void {
    this.port?.resume()
  }
}
