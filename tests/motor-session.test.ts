/**
 * Unit tests for the motor acquisition session
 *
 * These tests drive the session state machine against an in-process fake controller
 * and check each failure mode of the protocol.
 */

import { afterEach, describe, expect, it, vi } from 'vitest'

import { LinkTransport, TransportClosedError } from '../src/services/byte-transport'
import {
  ConnectTimeoutError,
  ControlToken,
  FormatError,
  LinkFailureError,
  ProtocolMismatchError,
  SessionAbortedError,
  SessionError,
  TestFailedError,
  TestTimeoutError,
  TruncatedTransferError,
  encodeFloatArray,
} from '../src/services/motor-protocol'
import { MotorSession, runSession, SessionResult, SessionState } from '../src/services/motor-session'
import { SessionTimeouts } from '../src/types/motor'
import { ControllerScript, makeSignals, MockMotorLink } from './helpers/mock-motor-link'

// ============================================================================
// Test Utilities
// ============================================================================

const FAST_TIMEOUTS: SessionTimeouts = {
  handshake: 200,
  handshakePoll: 50,
  start: 100,
  testRun: 200,
  transfer: 100,
}

const N = 16

/**
 *
 * @param script
 */
async function connectedTransport(script: Partial<ControllerScript> = {}): Promise<{
  link: MockMotorLink
  transport: LinkTransport
}> {
  const link = new MockMotorLink({ ...makeSignals(N), ...script })
  await link.open()
  return { link, transport: new LinkTransport(link) }
}

/**
 *
 * @param result
 * @param type
 */
function failureOf<E extends SessionError>(result: SessionResult, type: abstract new (...args: never[]) => E): E {
  if (result.success) {
    throw new Error('Expected the session to fail')
  }
  if (!(result.error instanceof type)) {
    throw new Error(`Expected ${type.name}, got ${result.error.name}: ${result.error.message}`)
  }
  return result.error
}

// ============================================================================
// Tests
// ============================================================================

describe('MotorSession', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('Successful Session', () => {
    it('should return exactly N decoded samples for a full 4096-sample transfer', async () => {
      const signals = makeSignals(4096)
      const link = new MockMotorLink(signals)
      await link.open()
      const transport = new LinkTransport(link)

      const result = await runSession(transport, { sampleCount: 4096, timeouts: FAST_TIMEOUTS })

      expect(result.success).toBe(true)
      if (!result.success) return
      expect(result.data.sampleCount).toBe(4096)
      expect(result.data.samples).toHaveLength(4096)
      expect(result.data.samplePeriodS).toBe(0.01)
      expect(result.data.samples[0]).toEqual({ time: 0, input: signals.input[0], angle: 0 })
      expect(result.data.samples[4095].input).toBe(signals.input[4095])
      expect(result.data.samples[4095].angle).toBe(2047.5)
      expect(result.data.samples[100].time).toBeCloseTo(1.0, 10)
    })

    it('should write exactly the three host commands in order', async () => {
      const { link, transport } = await connectedTransport()

      await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      expect(link.writtenBytes()).toEqual([
        ControlToken.HOST_CHECK_CONNECTION,
        ControlToken.HOST_START_TEST,
        ControlToken.HOST_REQUEST_DATA,
      ])
    })

    it('should pass through every state once, in order', async () => {
      const { transport } = await connectedTransport()
      const session = new MotorSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })
      const states: SessionState[] = []
      session.on('state-change', (state: SessionState) => states.push(state))

      await session.run()

      expect(states).toEqual([
        SessionState.CONNECTING,
        SessionState.READY_TO_START,
        SessionState.STARTING,
        SessionState.RUNNING,
        SessionState.REQUESTING_DATA,
        SessionState.TRANSFERRING,
        SessionState.COMPLETE,
      ])
      expect(session.getState()).toBe(SessionState.COMPLETE)
    })

    it('should derive timestamps from the sample period', async () => {
      const { transport } = await connectedTransport()

      const result = await runSession(transport, { sampleCount: N, samplePeriodS: 0.5, timeouts: FAST_TIMEOUTS })

      if (!result.success) throw result.error
      expect(result.data.samples.map((sample) => sample.time)).toEqual(
        Array.from({ length: N }, (_, i) => i * 0.5)
      )
    })

    it('should ignore boot chatter before the connection confirmation', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
      const { transport } = await connectedTransport({ bootChatter: [0x00, 0x41, ControlToken.DEVICE_ACK_START] })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      expect(result.success).toBe(true)
      expect(warnSpy).toHaveBeenCalledWith('[MotorSession] Ignored 3 bytes before connection confirmation')
    })

    it('should accept a corrupted footer and log a warning', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
      const { transport } = await connectedTransport({ footer: Buffer.from('DATA_ENX', 'ascii') })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      expect(result.success).toBe(true)
      if (!result.success) return
      expect(result.data.samples).toHaveLength(N)
      expect(warnSpy).toHaveBeenCalledWith('[MotorSession] Invalid data footer, keeping payload. Received: "DATA_ENX"')
    })

    it('should accept a missing footer and log a warning', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
      const { transport } = await connectedTransport({ footer: Buffer.alloc(0) })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      expect(result.success).toBe(true)
      expect(warnSpy).toHaveBeenCalledWith('[MotorSession] Invalid data footer, keeping payload. Received: ""')
    })

    it('should hand out copies of the sample buffer', async () => {
      const { transport } = await connectedTransport()
      const session = new MotorSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const result = await session.run()
      if (!result.success) throw result.error

      const first = session.getSampleBuffer()
      const second = session.getSampleBuffer()
      expect(first).toEqual(result.data)
      expect(first).not.toBe(second)
      expect(first?.samples[0]).not.toBe(result.data.samples[0])
    })
  })

  describe('Start Trigger', () => {
    it('should not send the start command before the trigger resolves', async () => {
      const { link, transport } = await connectedTransport()
      let writesAtTrigger: number[] = []

      const result = await runSession(transport, {
        sampleCount: N,
        timeouts: FAST_TIMEOUTS,
        awaitStart: async () => {
          writesAtTrigger = link.writtenBytes()
        },
      })

      expect(result.success).toBe(true)
      expect(writesAtTrigger).toEqual([ControlToken.HOST_CHECK_CONNECTION])
    })

    it('should abort when the trigger rejects', async () => {
      const { link, transport } = await connectedTransport()

      const result = await runSession(transport, {
        sampleCount: N,
        timeouts: FAST_TIMEOUTS,
        awaitStart: async () => {
          throw new Error('operator cancelled')
        },
      })

      const error = failureOf(result, SessionAbortedError)
      expect(error.kind).toBe('aborted')
      expect(error.message).toBe('Session aborted: operator cancelled')
      expect(link.writtenBytes()).toEqual([ControlToken.HOST_CHECK_CONNECTION])
    })
  })

  describe('Handshake', () => {
    it('should fail with ConnectTimeout and write nothing after the connection check', async () => {
      const { link, transport } = await connectedTransport({ confirmConnection: false, bootChatter: [0x7f] })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const error = failureOf(result, ConnectTimeoutError)
      expect(error.kind).toBe('connect_timeout')
      expect(error.deadlineMs).toBe(200)
      expect(link.writtenBytes()).toEqual([ControlToken.HOST_CHECK_CONNECTION])
    })
  })

  describe('Control Byte Mismatches', () => {
    it('should report ProtocolMismatch, not TestTimeout, for a wrong start ack', async () => {
      const { link, transport } = await connectedTransport({ startAck: 0x07, testResult: null })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const error = failureOf(result, ProtocolMismatchError)
      expect(error.expected).toBe(ControlToken.DEVICE_ACK_START)
      expect(error.actual).toBe(0x07)
      expect(error.message).toBe('Expected 0x04 (DEVICE_ACK_START), received 0x07')
      expect(link.writtenBytes()).toEqual([ControlToken.HOST_CHECK_CONNECTION, ControlToken.HOST_START_TEST])
    })

    it('should report ProtocolMismatch with no byte when the start ack never comes', async () => {
      const { transport } = await connectedTransport({ startAck: null, testResult: null })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const error = failureOf(result, ProtocolMismatchError)
      expect(error.actual).toBeNull()
      expect(error.message).toBe('Expected 0x04 (DEVICE_ACK_START), received none')
    })

    it('should report TestFailed when the controller answers the run with another byte', async () => {
      const { transport } = await connectedTransport({ testResult: 0x09 })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const error = failureOf(result, TestFailedError)
      expect(error.kind).toBe('test_failed')
      expect(error.actual).toBe(0x09)
    })

    it('should report TestTimeout when the run exceeds its timeout', async () => {
      const { transport } = await connectedTransport({ testResult: null })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const error = failureOf(result, TestTimeoutError)
      expect(error.timeoutMs).toBe(200)
    })

    it('should report ProtocolMismatch for a wrong data request ack', async () => {
      const { transport } = await connectedTransport({ dataAck: ControlToken.DEVICE_CHECK_CONNECTION })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const error = failureOf(result, ProtocolMismatchError)
      expect(error.expected).toBe(ControlToken.DEVICE_DATA_REQUEST_ACK)
      expect(error.actual).toBe(ControlToken.DEVICE_CHECK_CONNECTION)
    })
  })

  describe('Transfer', () => {
    it('should report FormatError for a wrong stream header', async () => {
      const { transport } = await connectedTransport({ header: Buffer.from('DATA_STRT!', 'ascii') })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const error = failureOf(result, FormatError)
      expect(error.message).toBe('Invalid data header. Received: "DATA_STRT!"')
    })

    it('should report TruncatedTransfer for a short input array and build no buffer', async () => {
      const signals = makeSignals(N)
      const { transport } = await connectedTransport({
        inputPayload: encodeFloatArray(signals.input).subarray(0, 10),
        anglePayload: Buffer.alloc(0),
        footer: Buffer.alloc(0),
      })
      const session = new MotorSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const result = await session.run()

      const error = failureOf(result, TruncatedTransferError)
      expect(error.section).toBe('input')
      expect(error.expected).toBe(N * 4)
      expect(error.received).toBe(10)
      expect(session.getSampleBuffer()).toBeNull()
      expect(session.getState()).toBe(SessionState.FAILED)
    })

    it('should report TruncatedTransfer for a short angle array', async () => {
      const signals = makeSignals(N)
      const { transport } = await connectedTransport({
        anglePayload: encodeFloatArray(signals.angle).subarray(0, N * 4 - 1),
        footer: Buffer.alloc(0),
      })

      const result = await runSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      const error = failureOf(result, TruncatedTransferError)
      expect(error.section).toBe('angle')
      expect(error.received).toBe(N * 4 - 1)
    })
  })

  describe('Cancellation', () => {
    it('should fail promptly when the transport is closed during the test run', async () => {
      const { transport } = await connectedTransport({ testResult: null })
      const session = new MotorSession(transport, {
        sampleCount: N,
        timeouts: { ...FAST_TIMEOUTS, testRun: 60000 },
      })
      let closing: Promise<void> = Promise.resolve()
      session.on('state-change', (state: SessionState) => {
        if (state === SessionState.RUNNING) {
          setTimeout(() => {
            closing = transport.close()
          }, 20)
        }
      })

      const startedAt = Date.now()
      const result = await session.run()
      await closing

      const error = failureOf(result, LinkFailureError)
      expect(error.kind).toBe('link')
      expect(error.linkError).toBeInstanceOf(TransportClosedError)
      expect(Date.now() - startedAt).toBeLessThan(5000)
    })
  })

  describe('Lifecycle', () => {
    it('should refuse to run twice', async () => {
      const { transport } = await connectedTransport()
      const session = new MotorSession(transport, { sampleCount: N, timeouts: FAST_TIMEOUTS })

      await session.run()

      await expect(session.run()).rejects.toThrow(/already ran/)
    })

    it('should reject invalid sample counts', () => {
      const link = new MockMotorLink()
      const transport = new LinkTransport(link)

      expect(() => new MotorSession(transport, { sampleCount: 0 })).toThrow(RangeError)
      expect(() => new MotorSession(transport, { sampleCount: 1.5 })).toThrow(RangeError)
      expect(() => new MotorSession(transport, { samplePeriodS: 0 })).toThrow(RangeError)
    })

    it('should reject timeouts a Node.js timer cannot honour', () => {
      const transport = new LinkTransport(new MockMotorLink())

      expect(() => new MotorSession(transport, { timeouts: { testRun: 3_000_000_000 } })).toThrow(
        'testRun timeout must be positive and at most 2147483647ms, got 3000000000'
      )
      expect(() => new MotorSession(transport, { timeouts: { transfer: 0 } })).toThrow(RangeError)
      expect(() => new MotorSession(transport, { timeouts: { testRun: 2147483647 } })).not.toThrow()
    })

    it('should fill unspecified timeouts with defaults', () => {
      const transport = new LinkTransport(new MockMotorLink())
      const session = new MotorSession(transport, { timeouts: { testRun: 5000 } })

      expect(session.timeouts).toEqual({
        handshake: 10000,
        handshakePoll: 2000,
        start: 2000,
        testRun: 5000,
        transfer: 2000,
      })
      expect(session.sampleCount).toBe(4096)
    })
  })
})
