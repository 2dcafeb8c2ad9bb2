// * Byte Transport (TypeScript)
// * Pull-style reads with explicit per-call timeouts over an event-driven byte link.
// * ARCHITECTURE:
// * - Incoming 'data' chunks accumulate in an inbox buffer
// * - A read resolves once the inbox holds the requested byte count, or fails on its own timer
// * - At most one read is outstanding at a time
// * - close() and unexpected link closure fail the outstanding read immediately

import { ByteLink, SerialLink, serialLinkUri } from './link/serial'

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class ConnectError extends Error {
  /**
   *
   * @param message
   * @param cause
   */
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'ConnectError'
  }
}

/**
 *
 */
export class TransportIOError extends Error {
  /**
   *
   * @param message
   * @param cause
   */
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'TransportIOError'
  }
}

/**
 *
 */
export class TransportClosedError extends TransportIOError {
  /**
   *
   * @param message
   */
  constructor(message = 'Transport closed') {
    super(message)
    this.name = 'TransportClosedError'
  }
}

/**
 * Fewer bytes than requested arrived within the timeout. The bytes that did arrive
 * were consumed and are carried in `partial`.
 */
export class TransportTimeoutError extends Error {
  /**
   *
   * @param requested
   * @param partial
   * @param timeoutMs
   */
  constructor(readonly requested: number, readonly partial: Buffer, readonly timeoutMs: number) {
    super(`Read timed out after ${timeoutMs}ms: got ${partial.length} of ${requested} bytes`)
    this.name = 'TransportTimeoutError'
  }
}

// ============================================================================
// Transport Contract
// ============================================================================

/**
 *
 */
export interface ByteTransport {
  readonly isOpen: boolean
  write(data: Buffer): Promise<void>
  /**
   * Read exactly `n` bytes.
   * @throws TransportTimeoutError if fewer than `n` bytes arrive within `timeoutMs`
   */
  readExactly(n: number, timeoutMs: number): Promise<Buffer>
  /**
   * Read single bytes (each bounded by `pollTimeoutMs`) until one equals `target`.
   * Resolves to the number of bytes discarded before the match.
   * @throws TransportTimeoutError once `deadlineMs` has elapsed
   */
  readUntilMatch(target: number, pollTimeoutMs: number, deadlineMs: number): Promise<number>
  /** Drop everything received so far */
  discardInput(): Promise<void>
  close(): Promise<void>
}

export type LinkFactory = (path: string, baudRate: number) => ByteLink

interface PendingRead {
  n: number
  timer: NodeJS.Timeout
  resolve: (data: Buffer) => void
  reject: (error: Error) => void
}

// ============================================================================
// LinkTransport Class
// ============================================================================

/**
 *
 */
export class LinkTransport implements ByteTransport {
  private inbox: Buffer = Buffer.alloc(0)
  private pending: PendingRead | null = null
  private closed = false
  private closing: Promise<void> | null = null

  /**
   *
   * @param link - Already open link; the transport takes ownership
   */
  constructor(private readonly link: ByteLink) {
    this.link.on('data', (data: Buffer) => this.handleData(data))
    this.link.on('error', (error: Error) => this.handleLinkError(error))
    this.link.on('close', () => this.handleLinkClose())
  }

  /**
   * Open a serial port and wrap it.
   * @param path
   * @param baudRate
   * @param createLink - Link factory (tests inject fakes here)
   * @throws ConnectError when the port cannot be opened
   */
  static async open(path: string, baudRate: number, createLink: LinkFactory = createSerialLink): Promise<LinkTransport> {
    console.log(`[LinkTransport] Opening ${path} at ${baudRate} baud`)
    let link: ByteLink
    try {
      link = createLink(path, baudRate)
      await link.open()
    } catch (error) {
      console.error(`[LinkTransport] Failed to open ${path}:`, error)
      throw new ConnectError(`Failed to open port ${path}: ${errorMessage(error)}`, error)
    }
    return new LinkTransport(link)
  }

  get isOpen(): boolean {
    return !this.closed && this.link.isOpen
  }

  /**
   *
   * @param data
   */
  async write(data: Buffer): Promise<void> {
    if (this.closed) {
      throw new TransportClosedError()
    }
    try {
      await this.link.write(data)
    } catch (error) {
      throw new TransportIOError(`Write failed: ${errorMessage(error)}`, error)
    }
  }

  /**
   *
   * @param n
   * @param timeoutMs
   */
  readExactly(n: number, timeoutMs: number): Promise<Buffer> {
    if (this.closed) {
      return Promise.reject(new TransportClosedError())
    }
    if (this.pending) {
      return Promise.reject(new TransportIOError('A read is already outstanding'))
    }
    if (this.inbox.length >= n) {
      return Promise.resolve(this.take(n))
    }

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null
        reject(new TransportTimeoutError(n, this.take(Math.min(n, this.inbox.length)), timeoutMs))
      }, timeoutMs)
      this.pending = { n, timer, resolve, reject }
    })
  }

  /**
   *
   * @param target
   * @param pollTimeoutMs
   * @param deadlineMs
   */
  async readUntilMatch(target: number, pollTimeoutMs: number, deadlineMs: number): Promise<number> {
    const deadline = Date.now() + deadlineMs
    let discarded = 0

    // eslint-disable-next-line no-constant-condition -- bounded by the deadline check
    while (true) {
      const remaining = deadline - Date.now()
      if (remaining <= 0) {
        throw new TransportTimeoutError(1, Buffer.alloc(0), deadlineMs)
      }

      let chunk: Buffer
      try {
        chunk = await this.readExactly(1, Math.min(pollTimeoutMs, remaining))
      } catch (error) {
        if (error instanceof TransportTimeoutError) {
          continue
        }
        throw error
      }

      if (chunk[0] === target) {
        return discarded
      }
      discarded++
    }
  }

  /**
   *
   */
  async discardInput(): Promise<void> {
    if (this.closed) {
      throw new TransportClosedError()
    }
    const dropped = this.inbox.length
    this.inbox = Buffer.alloc(0)
    try {
      await this.link.flush()
    } catch (error) {
      throw new TransportIOError(`Flush failed: ${errorMessage(error)}`, error)
    }
    if (dropped > 0) {
      console.log(`[LinkTransport] Discarded ${dropped} buffered bytes`)
    }
  }

  /**
   *
   */
  close(): Promise<void> {
    // Later callers wait for the same release of the link
    if (!this.closing) {
      this.closed = true
      this.failPending(new TransportClosedError())
      this.closing = this.releaseLink()
    }
    return this.closing
  }

  // ========================================================================
  // Internal Helpers
  // ========================================================================

  /**
   *
   */
  private async releaseLink(): Promise<void> {
    try {
      await this.link.close()
    } catch (error) {
      console.error('[LinkTransport] Error closing link:', error)
    }
    this.link.removeAllListeners()
  }

  /**
   *
   * @param data
   */
  private handleData(data: Buffer): void {
    this.inbox = this.inbox.length === 0 ? Buffer.from(data) : Buffer.concat([this.inbox, data])

    const pending = this.pending
    if (pending && this.inbox.length >= pending.n) {
      clearTimeout(pending.timer)
      this.pending = null
      pending.resolve(this.take(pending.n))
    }
  }

  /**
   *
   * @param error
   */
  private handleLinkError(error: Error): void {
    console.error('[LinkTransport] Link error:', error)
    this.failPending(new TransportIOError(`Link error: ${error.message}`, error))
  }

  /**
   *
   */
  private handleLinkClose(): void {
    if (this.closed) {
      return
    }
    console.warn('[LinkTransport] Link closed unexpectedly')
    this.closed = true
    this.failPending(new TransportClosedError('Link closed unexpectedly'))
  }

  /**
   *
   * @param error
   */
  private failPending(error: Error): void {
    const pending = this.pending
    if (!pending) {
      return
    }
    clearTimeout(pending.timer)
    this.pending = null
    pending.reject(error)
  }

  /**
   *
   * @param n
   */
  private take(n: number): Buffer {
    const out = Buffer.from(this.inbox.subarray(0, n))
    this.inbox = this.inbox.subarray(n)
    return out
  }
}

/**
 *
 * @param path
 * @param baudRate
 */
function createSerialLink(path: string, baudRate: number): ByteLink {
  return new SerialLink(serialLinkUri(path, baudRate))
}

/**
 *
 * @param error
 */
function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
