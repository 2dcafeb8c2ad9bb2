/**
 * One decoded sample of a motor identification run.
 */
export interface Sample {
  /** Seconds since the experiment started (index * sample period) */
  time: number
  /** Input signal sent to the motor driver (speed setpoint) */
  input: number
  /** Measured shaft angle */
  angle: number
}

/**
 * Fixed-length result of a successful acquisition session.
 * Always holds exactly `sampleCount` samples.
 */
export interface SampleBuffer {
  /** UUID of the session that produced the buffer */
  sessionId: string
  /** Sample period used to derive `Sample.time`, in seconds */
  samplePeriodS: number
  /** Number of samples, equal to `samples.length` */
  sampleCount: number
  samples: readonly Readonly<Sample>[]
}

/**
 * Per-phase read timeouts, in milliseconds.
 */
export interface SessionTimeouts {
  /** Overall deadline for the connection handshake */
  handshake: number
  /** Bound of each single-byte read while polling for the handshake reply */
  handshakePoll: number
  /** Wait for the start acknowledgement */
  start: number
  /** Wait for the test-success byte; must exceed the remote test duration */
  testRun: number
  /** Each read of the data-request ack, frame markers and payload arrays */
  transfer: number
}

/**
 * Summary figures printed after an experiment.
 */
export interface SampleSummary {
  sampleCount: number
  durationS: number
  input: { min: number; max: number }
  angle: { min: number; max: number }
}
