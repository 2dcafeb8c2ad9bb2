/**
 * Motor Experiment Runner
 *
 * Owns the serial transport for exactly one acquisition session:
 * open -> settle -> discard stale input -> run session -> close.
 * The transport is closed on every exit path before the result is returned.
 */

import { SampleBuffer, SampleSummary } from '../types/motor'
import { ConnectError, LinkFactory, LinkTransport, TransportIOError } from './byte-transport'
import { LinkFailureError, SessionAbortedError } from './motor-protocol'
import { MotorSession, SessionOptions, SessionResult, SessionState } from './motor-session'

/**
 *
 */
export interface ExperimentOptions {
  port: string
  baudRate: number
  /** Wait after opening the port, the controller reboots on connect */
  settleMs: number
  session?: SessionOptions
  /** Aborting closes the transport, failing any read in flight */
  signal?: AbortSignal
  /** Link factory override (tests) */
  createLink?: LinkFactory
  /** Observer for session state changes */
  onStateChange?: (state: SessionState) => void
}

export type ExperimentResult = SessionResult | { success: false; error: ConnectError }

/**
 * Run one experiment against the controller on `options.port`.
 * @param options
 */
export async function runExperiment(options: ExperimentOptions): Promise<ExperimentResult> {
  console.log(`[MotorExperiment] Starting experiment on ${options.port} @ ${options.baudRate} baud`)

  if (options.signal?.aborted) {
    return { success: false, error: new SessionAbortedError('aborted before the port was opened') }
  }

  const transport = await openTransport(options)
  if (transport instanceof ConnectError) {
    return { success: false, error: transport }
  }

  const onAbort = (): void => {
    console.warn('[MotorExperiment] Abort requested, closing transport')
    transport.close().catch((error) => console.error('[MotorExperiment] Error closing transport:', error))
  }
  options.signal?.addEventListener('abort', onAbort, { once: true })

  try {
    await delay(options.settleMs, options.signal)
    if (options.signal?.aborted) {
      return { success: false, error: new SessionAbortedError('aborted while the controller was starting') }
    }
    await transport.discardInput()

    const { awaitStart, ...sessionOptions }: SessionOptions = options.session ?? {}
    const session = new MotorSession(transport, sessionOptions)
    if (options.onStateChange) {
      session.on('state-change', options.onStateChange)
    }
    const result = await session.run(awaitStart)
    if (!result.success && options.signal?.aborted && !(result.error instanceof SessionAbortedError)) {
      return { success: false, error: new SessionAbortedError(`aborted by caller (${result.error.message})`) }
    }
    return result
  } catch (error) {
    if (error instanceof TransportIOError) {
      return { success: false, error: new LinkFailureError(error) }
    }
    throw error
  } finally {
    options.signal?.removeEventListener('abort', onAbort)
    await transport.close()
    console.log('[MotorExperiment] Serial port closed')
  }
}

/**
 *
 * @param options
 */
async function openTransport(options: ExperimentOptions): Promise<LinkTransport | ConnectError> {
  try {
    return await LinkTransport.open(options.port, options.baudRate, options.createLink)
  } catch (error) {
    if (error instanceof ConnectError) {
      return error
    }
    throw error
  }
}

/**
 * Range and duration figures of a sample buffer.
 * @param buffer
 */
export function summarizeSamples(buffer: SampleBuffer): SampleSummary {
  const input = { min: Infinity, max: -Infinity }
  const angle = { min: Infinity, max: -Infinity }

  for (const sample of buffer.samples) {
    input.min = Math.min(input.min, sample.input)
    input.max = Math.max(input.max, sample.input)
    angle.min = Math.min(angle.min, sample.angle)
    angle.max = Math.max(angle.max, sample.angle)
  }

  return {
    sampleCount: buffer.sampleCount,
    durationS: buffer.sampleCount * buffer.samplePeriodS,
    input,
    angle,
  }
}

/**
 * Resolves after `ms`, or early when the signal aborts.
 * @param ms
 * @param signal
 */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve()
      return
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })

    /**
     *
     */
    function done(): void {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
  })
}
