import EventEmitter from 'events'
import { SerialPort } from 'serialport'

/**
 * Event-driven duplex byte link. Emits 'data' (Buffer), 'error' (Error) and 'close'.
 */
export interface ByteLink {
  readonly isOpen: boolean
  open(): Promise<void>
  close(): Promise<void>
  write(data: Buffer): Promise<void>
  /** Discard data buffered by the OS in both directions */
  flush(): Promise<void>
  on(event: 'data', listener: (data: Buffer) => void): this
  on(event: 'error', listener: (error: Error) => void): this
  on(event: 'close', listener: () => void): this
  removeAllListeners(): this
}

/**
 * Serial port link addressed by a `serial:<path>?baudrate=<n>` URI.
 */
export class SerialLink extends EventEmitter implements ByteLink {
  readonly path: string
  readonly baudRate: number
  private port: SerialPort

  /**
   *
   * @param uri
   */
  constructor(uri: URL) {
    super()
    if (uri.protocol !== 'serial:') {
      throw new Error(`Unsupported link URI: ${uri.href}`)
    }

    this.path = decodeURIComponent(uri.pathname)
    const baud = Number(uri.searchParams.get('baudrate') ?? '115200')
    if (!Number.isInteger(baud) || baud <= 0) {
      throw new Error(`Invalid baudrate in link URI: ${uri.href}`)
    }
    this.baudRate = baud

    this.port = new SerialPort({ path: this.path, baudRate: this.baudRate, autoOpen: false })
    this.port.on('data', (data: Buffer) => this.emit('data', data))
    this.port.on('error', (error: Error) => this.emit('error', error))
    this.port.on('close', () => this.emit('close'))
  }

  get isOpen(): boolean {
    return this.port.isOpen
  }

  /**
   *
   */
  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.open((error) => (error ? reject(error) : resolve()))
    })
  }

  /**
   *
   */
  close(): Promise<void> {
    if (!this.port.isOpen) {
      return Promise.resolve()
    }
    return new Promise((resolve, reject) => {
      this.port.close((error) => (error ? reject(error) : resolve()))
    })
  }

  // * Write and wait until the OS has transmitted the bytes.
  /**
   *
   * @param data
   */
  write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.write(data, (writeError) => {
        if (writeError) {
          reject(writeError)
          return
        }
        this.port.drain((drainError) => (drainError ? reject(drainError) : resolve()))
      })
    })
  }

  /**
   *
   */
  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.flush((error) => (error ? reject(error) : resolve()))
    })
  }
}

/**
 * Build the URI understood by {@link SerialLink}.
 * @param path - Device path, e.g. /dev/ttyUSB0 or COM3
 * @param baudRate
 */
export function serialLinkUri(path: string, baudRate: number): URL {
  return new URL(`serial:${path}?baudrate=${baudRate}`)
}
