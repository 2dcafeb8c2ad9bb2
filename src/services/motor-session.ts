// * Motor Acquisition Session (TypeScript)
// * Host side of one handshake -> start -> run -> transfer cycle with the motor controller.
// * ARCHITECTURE:
// * - Strictly linear state machine, no state is revisited
// * - Each control exchange is one write followed by one single-byte read with its own timeout
// * - Only the handshake tolerates unexpected bytes; every later mismatch ends the session
// * - Yields a complete SampleBuffer or a typed SessionError, never a partial buffer
// ! The session does not own the transport; the caller opens and closes it.

import EventEmitter from 'events'
import { v4 as uuidv4 } from 'uuid'

import { SampleBuffer, SessionTimeouts } from '../types/motor'
import { ByteTransport, TransportIOError, TransportTimeoutError } from './byte-transport'
import {
  ConnectTimeoutError,
  ControlToken,
  DATA_STREAM_END,
  DATA_STREAM_START,
  decodeFloatArray,
  DEFAULT_SAMPLE_COUNT,
  DEFAULT_SAMPLE_PERIOD_S,
  FormatError,
  LinkFailureError,
  matchMarker,
  MAX_TIMEOUT_MS,
  matchToken,
  PayloadSection,
  payloadLength,
  ProtocolMismatchError,
  SessionAbortedError,
  SessionError,
  TestFailedError,
  TestTimeoutError,
  TIMEOUT_CONTROL_BYTE,
  TIMEOUT_HANDSHAKE,
  TIMEOUT_HANDSHAKE_POLL,
  TIMEOUT_TEST_RUN,
  TIMEOUT_TRANSFER,
  TruncatedTransferError,
} from './motor-protocol'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 *
 */
export enum SessionState {
  IDLE = 'idle',
  CONNECTING = 'connecting',
  READY_TO_START = 'ready_to_start',
  STARTING = 'starting',
  RUNNING = 'running',
  REQUESTING_DATA = 'requesting_data',
  TRANSFERRING = 'transferring',
  COMPLETE = 'complete',
  FAILED = 'failed',
}

const STATE_ORDER: readonly SessionState[] = [
  SessionState.IDLE,
  SessionState.CONNECTING,
  SessionState.READY_TO_START,
  SessionState.STARTING,
  SessionState.RUNNING,
  SessionState.REQUESTING_DATA,
  SessionState.TRANSFERRING,
  SessionState.COMPLETE,
]

/**
 * Resolves when the experiment may start (operator pressed Enter, automation fired...).
 * Rejecting cancels the session.
 */
export type StartTrigger = () => Promise<void>

export type SessionResult = { success: true; data: SampleBuffer } | { success: false; error: SessionError }

/**
 *
 */
export interface SessionOptions {
  /** Samples per payload array, defaults to 4096 */
  sampleCount?: number
  /** Sample period in seconds, defaults to 0.01 */
  samplePeriodS?: number
  timeouts?: Partial<SessionTimeouts>
  /** Defaults to starting immediately */
  awaitStart?: StartTrigger
}

export const DEFAULT_TIMEOUTS: Readonly<SessionTimeouts> = Object.freeze({
  handshake: TIMEOUT_HANDSHAKE,
  handshakePoll: TIMEOUT_HANDSHAKE_POLL,
  start: TIMEOUT_CONTROL_BYTE,
  testRun: TIMEOUT_TEST_RUN,
  transfer: TIMEOUT_TRANSFER,
})

const TIMEOUT_PHASES: readonly (keyof SessionTimeouts)[] = ['handshake', 'handshakePoll', 'start', 'testRun', 'transfer']

// ============================================================================
// MotorSession Class
// ============================================================================

// * One acquisition cycle against a connected controller.
// * EVENT EMISSION: 'state-change' (SessionState).
/**
 *
 */
export class MotorSession extends EventEmitter {
  readonly sessionId: string = uuidv4()
  readonly sampleCount: number
  readonly samplePeriodS: number
  readonly timeouts: Readonly<SessionTimeouts>

  private state: SessionState = SessionState.IDLE
  private failedPhase: SessionState = SessionState.IDLE
  private buffer: SampleBuffer | null = null

  /**
   *
   * @param transport
   * @param options
   */
  constructor(private readonly transport: ByteTransport, options: Omit<SessionOptions, 'awaitStart'> = {}) {
    super()
    this.sampleCount = options.sampleCount ?? DEFAULT_SAMPLE_COUNT
    this.samplePeriodS = options.samplePeriodS ?? DEFAULT_SAMPLE_PERIOD_S
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts }

    if (!Number.isInteger(this.sampleCount) || this.sampleCount <= 0) {
      throw new RangeError(`sampleCount must be a positive integer, got ${this.sampleCount}`)
    }
    if (!(this.samplePeriodS > 0)) {
      throw new RangeError(`samplePeriodS must be positive, got ${this.samplePeriodS}`)
    }
    for (const phase of TIMEOUT_PHASES) {
      const timeoutMs = this.timeouts[phase]
      if (!(timeoutMs > 0 && timeoutMs <= MAX_TIMEOUT_MS)) {
        throw new RangeError(`${phase} timeout must be positive and at most ${MAX_TIMEOUT_MS}ms, got ${timeoutMs}`)
      }
    }
  }

  /**
   *
   */
  getState(): SessionState {
    return this.state
  }

  // * Copy of the buffer of a completed session, null otherwise.
  /**
   *
   */
  getSampleBuffer(): SampleBuffer | null {
    return this.buffer ? copySampleBuffer(this.buffer) : null
  }

  /**
   * Run the full protocol once. Protocol and link failures are returned, not thrown.
   * @param awaitStart - Extension point between the handshake and the start command
   */
  async run(awaitStart: StartTrigger = async () => undefined): Promise<SessionResult> {
    if (this.state !== SessionState.IDLE) {
      throw new Error(`Session ${this.sessionId} already ran (state: ${this.state})`)
    }

    console.log(`[MotorSession] Session ${this.sessionId} starting (${this.sampleCount} samples)`)

    try {
      await this.connect()

      this.transition(SessionState.READY_TO_START)
      await this.waitForTrigger(awaitStart)

      await this.startTest()
      await this.waitForCompletion()
      await this.requestData()
      const [inputRaw, angleRaw] = await this.receivePayload()

      this.buffer = this.buildSampleBuffer(inputRaw, angleRaw)
      this.transition(SessionState.COMPLETE)
      console.log(`[MotorSession] Session ${this.sessionId} complete`)

      return { success: true, data: copySampleBuffer(this.buffer) }
    } catch (error) {
      this.transition(SessionState.FAILED)
      const sessionError = toSessionError(error)
      if (!sessionError) {
        throw error
      }
      console.error(`[MotorSession] Session ${this.sessionId} failed in ${this.failedPhase}: ${sessionError.message}`)
      return { success: false, error: sessionError }
    }
  }

  // ========================================================================
  // Protocol Phases
  // ========================================================================

  // * Send the connection check once, then poll until the controller answers.
  // * Bytes other than the confirmation are boot chatter and are skipped.
  /**
   *
   */
  private async connect(): Promise<void> {
    this.transition(SessionState.CONNECTING)
    await this.transport.write(tokenBuffer(ControlToken.HOST_CHECK_CONNECTION))

    console.log('[MotorSession] Waiting for connection confirmation...')
    try {
      const skipped = await this.transport.readUntilMatch(
        ControlToken.DEVICE_CHECK_CONNECTION,
        this.timeouts.handshakePoll,
        this.timeouts.handshake
      )
      if (skipped > 0) {
        console.warn(`[MotorSession] Ignored ${skipped} bytes before connection confirmation`)
      }
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        throw new ConnectTimeoutError(this.timeouts.handshake)
      }
      throw error
    }
    console.log('[MotorSession] Connection confirmed')
  }

  /**
   *
   * @param awaitStart
   */
  private async waitForTrigger(awaitStart: StartTrigger): Promise<void> {
    try {
      await awaitStart()
    } catch (error) {
      throw new SessionAbortedError(error instanceof Error ? error.message : String(error))
    }
  }

  /**
   *
   */
  private async startTest(): Promise<void> {
    this.transition(SessionState.STARTING)
    await this.transport.write(tokenBuffer(ControlToken.HOST_START_TEST))
    await this.expectToken(ControlToken.DEVICE_ACK_START, this.timeouts.start)
    console.log('[MotorSession] Start acknowledged, test running...')
  }

  // * The controller runs the whole experiment before answering; this is the one long read.
  /**
   *
   */
  private async waitForCompletion(): Promise<void> {
    this.transition(SessionState.RUNNING)
    const expectedS = this.sampleCount * this.samplePeriodS
    console.log(`[MotorSession] Waiting for test completion (approx. ${expectedS.toFixed(0)} s)...`)

    const actual = await this.readControlByte(this.timeouts.testRun)
    if (actual === null) {
      throw new TestTimeoutError(this.timeouts.testRun)
    }
    if (!matchToken(actual, ControlToken.DEVICE_TEST_SUCCESS)) {
      throw new TestFailedError(actual)
    }
    console.log('[MotorSession] Test completed successfully')
  }

  /**
   *
   */
  private async requestData(): Promise<void> {
    this.transition(SessionState.REQUESTING_DATA)
    await this.transport.write(tokenBuffer(ControlToken.HOST_REQUEST_DATA))
    await this.expectToken(ControlToken.DEVICE_DATA_REQUEST_ACK, this.timeouts.transfer)
    console.log('[MotorSession] Data request acknowledged, receiving stream...')
  }

  /**
   *
   */
  private async receivePayload(): Promise<[Buffer, Buffer]> {
    this.transition(SessionState.TRANSFERRING)

    const header = await this.readMarker(DATA_STREAM_START.length)
    if (!matchMarker(header, DATA_STREAM_START)) {
      throw new FormatError(`Invalid data header. Received: ${JSON.stringify(header.toString('latin1'))}`)
    }

    const inputRaw = await this.readArray('input')
    const angleRaw = await this.readArray('angle')

    // Both arrays are length-checked already; a damaged footer does not invalidate them
    const footer = await this.readMarker(DATA_STREAM_END.length)
    if (!matchMarker(footer, DATA_STREAM_END)) {
      console.warn(
        `[MotorSession] Invalid data footer, keeping payload. Received: ${JSON.stringify(footer.toString('latin1'))}`
      )
    }

    return [inputRaw, angleRaw]
  }

  // ========================================================================
  // Internal Helpers: Reads
  // ========================================================================

  /**
   *
   * @param expected
   * @param timeoutMs
   */
  private async expectToken(expected: ControlToken, timeoutMs: number): Promise<void> {
    const actual = await this.readControlByte(timeoutMs)
    if (!matchToken(actual, expected)) {
      throw new ProtocolMismatchError(expected, actual)
    }
  }

  // * One byte, or null when nothing arrived in time.
  /**
   *
   * @param timeoutMs
   */
  private async readControlByte(timeoutMs: number): Promise<number | null> {
    try {
      const data = await this.transport.readExactly(1, timeoutMs)
      return data[0]
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        return null
      }
      throw error
    }
  }

  // * Whatever arrived for a marker, possibly short.
  /**
   *
   * @param length
   */
  private async readMarker(length: number): Promise<Buffer> {
    try {
      return await this.transport.readExactly(length, this.timeouts.transfer)
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        return error.partial
      }
      throw error
    }
  }

  /**
   *
   * @param section
   */
  private async readArray(section: PayloadSection): Promise<Buffer> {
    const expected = payloadLength(this.sampleCount)
    console.log(`[MotorSession] Reading ${this.sampleCount} ${section} samples...`)
    try {
      return await this.transport.readExactly(expected, this.timeouts.transfer)
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        throw new TruncatedTransferError(section, expected, error.partial.length)
      }
      throw error
    }
  }

  // ========================================================================
  // Internal Helpers: State and Result
  // ========================================================================

  /**
   *
   * @param inputRaw
   * @param angleRaw
   */
  private buildSampleBuffer(inputRaw: Buffer, angleRaw: Buffer): SampleBuffer {
    const input = decodeFloatArray(inputRaw, this.sampleCount)
    const angle = decodeFloatArray(angleRaw, this.sampleCount)

    const samples = input.map((value, i) =>
      Object.freeze({ time: i * this.samplePeriodS, input: value, angle: angle[i] })
    )

    return Object.freeze({
      sessionId: this.sessionId,
      samplePeriodS: this.samplePeriodS,
      sampleCount: this.sampleCount,
      samples: Object.freeze(samples),
    })
  }

  /**
   *
   * @param next
   */
  private transition(next: SessionState): void {
    if (next === SessionState.FAILED) {
      this.failedPhase = this.state
    } else if (STATE_ORDER.indexOf(next) <= STATE_ORDER.indexOf(this.state)) {
      throw new Error(`Illegal session transition ${this.state} -> ${next}`)
    }

    this.state = next
    this.emit('state-change', next)
  }
}

// ============================================================================
// Functions
// ============================================================================

/**
 * Run one session over an open transport.
 * @param transport
 * @param options
 */
export async function runSession(transport: ByteTransport, options: SessionOptions = {}): Promise<SessionResult> {
  const { awaitStart, ...sessionOptions } = options
  const session = new MotorSession(transport, sessionOptions)
  return session.run(awaitStart)
}

/**
 * Independent copy of a buffer for handing out to callers.
 * @param buffer
 */
export function copySampleBuffer(buffer: SampleBuffer): SampleBuffer {
  return {
    sessionId: buffer.sessionId,
    samplePeriodS: buffer.samplePeriodS,
    sampleCount: buffer.sampleCount,
    samples: buffer.samples.map((sample) => ({ ...sample })),
  }
}

/**
 *
 * @param token
 */
function tokenBuffer(token: ControlToken): Buffer {
  return Buffer.from([token])
}

/**
 *
 * @param error
 */
function toSessionError(error: unknown): SessionError | null {
  if (error instanceof SessionError) {
    return error
  }
  if (error instanceof TransportIOError) {
    return new LinkFailureError(error)
  }
  return null
}
