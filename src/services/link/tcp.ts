import EventEmitter from 'events'
import { Socket } from 'net'

import { createLogger } from '../../libs/logger'
import { ConnectionError } from '../waveline-errors'
import type { DeviceLink } from './device-link'

const log = createLogger('TcpLink')

export const DEFAULT_CONNECT_TIMEOUT = 10000

/**
 * TCP client link.
 *
 * Forwards socket 'data' / 'error' / 'close' events; writes resolve once the
 * chunk has been handed to the kernel.
 */
export class TcpLink extends EventEmitter implements DeviceLink {
  private socket: Socket | null = null
  private connected = false

  /**
   *
   * @param host
   * @param port
   * @param connectTimeoutMs
   */
  constructor(
    readonly host: string,
    readonly port: number,
    private readonly connectTimeoutMs = DEFAULT_CONNECT_TIMEOUT
  ) {
    super()
  }

  get isOpen(): boolean {
    return this.connected
  }

  get description(): string {
    return `${this.host}:${this.port}`
  }

  async open(): Promise<void> {
    if (this.connected) {
      return
    }

    const socket = new Socket()
    socket.setNoDelay(true)
    this.socket = socket

    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        socket.destroy()
        reject(new ConnectionError(`Connection to ${this.description} timed out`))
      }, this.connectTimeoutMs)

      const onConnectError = (error: Error): void => {
        clearTimeout(timeout)
        reject(new ConnectionError(`Failed to connect to ${this.description}: ${error.message}`))
      }

      socket.once('error', onConnectError)
      socket.once('connect', () => {
        clearTimeout(timeout)
        socket.off('error', onConnectError)
        this.connected = true
        log.debug(`Connected to ${this.description}`)
        resolve()
      })

      socket.connect(this.port, this.host)
    })

    socket.on('data', (data: Buffer) => this.emit('data', data))
    socket.on('error', (error: Error) => {
      log.error(`Socket error on ${this.description}: ${error.message}`)
      this.emit('error', error)
    })
    socket.on('close', () => {
      log.debug(`Disconnected from ${this.description}`)
      this.connected = false
      this.socket = null
      this.emit('close')
    })
  }

  async close(): Promise<void> {
    const socket = this.socket
    if (!socket) {
      return
    }
    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve())
      socket.end()
      socket.destroy()
    })
  }

  async write(data: Buffer): Promise<void> {
    const socket = this.socket
    if (!socket || !this.connected) {
      throw new ConnectionError(`Link to ${this.description} is not open`)
    }
    await new Promise<void>((resolve, reject) => {
      socket.write(data, (error?: Error | null) => (error ? reject(error) : resolve()))
    })
  }

  pause(): void {
    this.socket?.pause()
  }

  resume(): void {
    this.socket?.resume()
  }
}
