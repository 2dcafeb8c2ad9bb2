/**
 * Motor Controller Acquisition Protocol (TypeScript)
 *
 * Wire constants, codec and error taxonomy for the host-to-controller link of the
 * motor identification rig. The link is a bare byte stream: no framing, no checksums,
 * no flow control. Synchronization relies entirely on single-byte control tokens,
 * fixed ASCII frame markers and fixed-length payloads.
 *
 * WIRE SEQUENCE:
 * - host 0x01 -> device 0x02 (connection check, device may emit boot chatter first)
 * - host 0x03 -> device 0x04 (start), later device 0x05 (test finished)
 * - host 0x06 -> device 0x07, "DATA_START", N x float32 input, N x float32 angle, "DATA_END"
 */

// ============================================================================
// Protocol Constants
// ============================================================================

/**
 * Single-byte command and acknowledgement codes.
 */
export enum ControlToken {
  HOST_CHECK_CONNECTION = 0x01,
  DEVICE_CHECK_CONNECTION = 0x02,
  HOST_START_TEST = 0x03,
  DEVICE_ACK_START = 0x04,
  DEVICE_TEST_SUCCESS = 0x05,
  HOST_REQUEST_DATA = 0x06,
  DEVICE_DATA_REQUEST_ACK = 0x07,
}

/** Marker preceding the binary payload */
export const DATA_STREAM_START = Buffer.from('DATA_START', 'ascii')

/** Marker following the binary payload */
export const DATA_STREAM_END = Buffer.from('DATA_END', 'ascii')

/** Bytes per encoded sample value (IEEE-754 single precision) */
export const FLOAT_SIZE = 4

// ============================================================================
// Defaults (from the controller firmware and bench setup)
// ============================================================================

export const DEFAULT_SERIAL_PORT = '/dev/ttyUSB0'
export const DEFAULT_BAUD_RATE = 115200
export const DEFAULT_SAMPLE_COUNT = 4096
export const DEFAULT_SAMPLE_PERIOD_S = 0.01 // 10 ms control loop

export const DELAY_POST_OPEN = 2000 // Controller resets when the port opens
export const TIMEOUT_HANDSHAKE = 10000
export const TIMEOUT_HANDSHAKE_POLL = 2000
export const TIMEOUT_CONTROL_BYTE = 2000
export const TIMEOUT_TEST_RUN = 120000 // 4096 * 10 ms is ~41 s
export const TIMEOUT_TRANSFER = 2000
/** Longest delay a Node.js timer honours; larger values fire after 1 ms */
export const MAX_TIMEOUT_MS = 2147483647

// ============================================================================
// Error Taxonomy
// ============================================================================

export type SessionErrorKind =
  | 'connect_timeout'
  | 'protocol_mismatch'
  | 'test_failed'
  | 'test_timeout'
  | 'truncated_transfer'
  | 'format'
  | 'link'
  | 'aborted'

/**
 * Base class of every failure a session reports to its caller.
 */
export abstract class SessionError extends Error {
  abstract readonly kind: SessionErrorKind
}

/**
 * No handshake reply within the overall deadline. The caller may retry with a new session.
 */
export class ConnectTimeoutError extends SessionError {
  readonly kind = 'connect_timeout'

  /**
   *
   * @param deadlineMs
   */
  constructor(readonly deadlineMs: number) {
    super(`No connection confirmation within ${deadlineMs}ms`)
    this.name = 'ConnectTimeoutError'
  }
}

/**
 * A control byte other than the one required was received (or none at all).
 */
export class ProtocolMismatchError extends SessionError {
  readonly kind = 'protocol_mismatch'

  /**
   *
   * @param expected
   * @param actual - Received byte, null when the read timed out empty
   */
  constructor(readonly expected: ControlToken, readonly actual: number | null) {
    super(`Expected ${describeByte(expected)} (${ControlToken[expected]}), received ${describeByte(actual)}`)
    this.name = 'ProtocolMismatchError'
  }
}

/**
 * The controller answered the test run with something other than success.
 */
export class TestFailedError extends SessionError {
  readonly kind = 'test_failed'

  /**
   *
   * @param actual
   */
  constructor(readonly actual: number) {
    super(`Test failed: controller reported ${describeByte(actual)}`)
    this.name = 'TestFailedError'
  }
}

/**
 *
 */
export class TestTimeoutError extends SessionError {
  readonly kind = 'test_timeout'

  /**
   *
   * @param timeoutMs
   */
  constructor(readonly timeoutMs: number) {
    super(`Test did not complete within ${timeoutMs}ms`)
    this.name = 'TestTimeoutError'
  }
}

export type PayloadSection = 'input' | 'angle'

/**
 * A payload array arrived short. The whole transfer is discarded.
 */
export class TruncatedTransferError extends SessionError {
  readonly kind = 'truncated_transfer'

  /**
   *
   * @param section
   * @param expected - Required byte count
   * @param received - Bytes that arrived before the timeout
   */
  constructor(readonly section: PayloadSection, readonly expected: number, readonly received: number) {
    super(`Incomplete ${section} data: expected ${expected} bytes, got ${received}`)
    this.name = 'TruncatedTransferError'
  }
}

/**
 * Frame marker or array length invariant violated.
 */
export class FormatError extends SessionError {
  readonly kind = 'format'

  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'FormatError'
  }
}

/**
 * The transport failed underneath the session (port closed, I/O error).
 */
export class LinkFailureError extends SessionError {
  readonly kind = 'link'

  /**
   *
   * @param linkError - Transport error that ended the session
   */
  constructor(readonly linkError: Error) {
    super(`Serial link failed: ${linkError.message}`, { cause: linkError })
    this.name = 'LinkFailureError'
  }
}

/**
 * The start trigger was cancelled before the test was started.
 */
export class SessionAbortedError extends SessionError {
  readonly kind = 'aborted'

  /**
   *
   * @param reason
   */
  constructor(reason: string) {
    super(`Session aborted: ${reason}`)
    this.name = 'SessionAbortedError'
  }
}

// ============================================================================
// Codec
// ============================================================================

/**
 * Render a wire byte for logs, e.g. `0x04`.
 * @param byte - Byte value, or null when nothing was received
 */
export function describeByte(byte: number | null | undefined): string {
  if (byte === null || byte === undefined) {
    return 'none'
  }
  return `0x${byte.toString(16).padStart(2, '0')}`
}

/**
 * Exact comparison of a received byte against a control token. A missing byte never matches.
 * @param byte
 * @param expected
 */
export function matchToken(byte: number | null | undefined, expected: ControlToken): boolean {
  return byte === expected
}

/**
 * Exact, order-sensitive comparison of a received run against a frame marker.
 * @param bytes
 * @param expected
 */
export function matchMarker(bytes: Uint8Array, expected: Uint8Array): boolean {
  return bytes.length === expected.length && Buffer.compare(bytes, expected) === 0
}

/**
 * Decode `count` little-endian float32 values.
 * @param buffer - Raw payload, must be exactly `count * 4` bytes
 * @param count - Number of values
 * @throws FormatError on length mismatch
 */
export function decodeFloatArray(buffer: Buffer, count: number): number[] {
  const expectedLength = count * FLOAT_SIZE
  if (buffer.length !== expectedLength) {
    throw new FormatError(`Float array length mismatch: expected ${expectedLength} bytes, got ${buffer.length}`)
  }

  const values = new Array<number>(count)
  for (let i = 0; i < count; i++) {
    values[i] = buffer.readFloatLE(i * FLOAT_SIZE)
  }
  return values
}

/**
 * Encode values as little-endian float32, the layout the controller transmits.
 * @param values
 */
export function encodeFloatArray(values: readonly number[]): Buffer {
  const buffer = Buffer.alloc(values.length * FLOAT_SIZE)
  values.forEach((value, i) => buffer.writeFloatLE(value, i * FLOAT_SIZE))
  return buffer
}

/**
 * Byte length of one payload array for the given sample count.
 * @param sampleCount
 */
export function payloadLength(sampleCount: number): number {
  return sampleCount * FLOAT_SIZE
}
