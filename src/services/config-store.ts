import Conf from 'conf'

import {
  DEFAULT_BAUD_RATE,
  DEFAULT_SAMPLE_COUNT,
  DEFAULT_SAMPLE_PERIOD_S,
  DEFAULT_SERIAL_PORT,
  DELAY_POST_OPEN,
  MAX_TIMEOUT_MS,
  TIMEOUT_CONTROL_BYTE,
  TIMEOUT_HANDSHAKE,
  TIMEOUT_HANDSHAKE_POLL,
  TIMEOUT_TEST_RUN,
  TIMEOUT_TRANSFER,
} from './motor-protocol'
import { SessionOptions } from './motor-session'

/**
 * Persisted experiment settings.
 */
export type ExperimentSettings = {
  /** Serial device path, e.g. /dev/ttyUSB0 or COM3 */
  serialPort: string
  baudRate: number
  /** Samples per payload array, must match the controller firmware */
  sampleCount: number
  /** Controller sample period in seconds */
  samplePeriodS: number
  /** Wait after opening the port while the controller reboots */
  settleMs: number
  handshakeTimeoutMs: number
  handshakePollMs: number
  startTimeoutMs: number
  testRunTimeoutMs: number
  transferTimeoutMs: number
}

export const DEFAULT_SETTINGS: Readonly<ExperimentSettings> = Object.freeze({
  serialPort: DEFAULT_SERIAL_PORT,
  baudRate: DEFAULT_BAUD_RATE,
  sampleCount: DEFAULT_SAMPLE_COUNT,
  samplePeriodS: DEFAULT_SAMPLE_PERIOD_S,
  settleMs: DELAY_POST_OPEN,
  handshakeTimeoutMs: TIMEOUT_HANDSHAKE,
  handshakePollMs: TIMEOUT_HANDSHAKE_POLL,
  startTimeoutMs: TIMEOUT_CONTROL_BYTE,
  testRunTimeoutMs: TIMEOUT_TEST_RUN,
  transferTimeoutMs: TIMEOUT_TRANSFER,
})

export interface SettingsStoreOptions {
  /** Directory holding the settings file; defaults to the OS config directory */
  cwd?: string
}

/**
 * Create a settings store validated against the settings schema.
 * @param options
 */
export function createSettingsStore(options: SettingsStoreOptions = {}): Conf<ExperimentSettings> {
  return new Conf<ExperimentSettings>({
    projectName: 'motor-ident-host',
    cwd: options.cwd,
    configName: 'settings',
    defaults: { ...DEFAULT_SETTINGS },
    schema: {
      serialPort: { type: 'string', minLength: 1 },
      baudRate: { type: 'integer', minimum: 1 },
      sampleCount: { type: 'integer', minimum: 1 },
      samplePeriodS: { type: 'number', exclusiveMinimum: 0 },
      settleMs: { type: 'integer', minimum: 0, maximum: MAX_TIMEOUT_MS },
      handshakeTimeoutMs: { type: 'integer', minimum: 1, maximum: MAX_TIMEOUT_MS },
      handshakePollMs: { type: 'integer', minimum: 1, maximum: MAX_TIMEOUT_MS },
      startTimeoutMs: { type: 'integer', minimum: 1, maximum: MAX_TIMEOUT_MS },
      testRunTimeoutMs: { type: 'integer', minimum: 1, maximum: MAX_TIMEOUT_MS },
      transferTimeoutMs: { type: 'integer', minimum: 1, maximum: MAX_TIMEOUT_MS },
    },
  })
}

let storeInstance: Conf<ExperimentSettings> | null = null

/**
 * Shared store in the OS config directory (lazy initialization).
 */
export function getSettingsStore(): Conf<ExperimentSettings> {
  if (!storeInstance) {
    storeInstance = createSettingsStore()
    console.log(`[SettingsStore] Using ${storeInstance.path}`)
  }
  return storeInstance
}

/**
 * Stored settings with per-run overrides applied.
 * @param store
 * @param overrides
 */
export function loadSettings(
  store: Conf<ExperimentSettings>,
  overrides: Partial<ExperimentSettings> = {}
): ExperimentSettings {
  return { ...DEFAULT_SETTINGS, ...store.store, ...definedOnly(overrides) }
}

/**
 * Persist per-run overrides.
 * @param store
 * @param overrides
 */
export function saveSettings(store: Conf<ExperimentSettings>, overrides: Partial<ExperimentSettings>): void {
  store.set(definedOnly(overrides))
}

// Flags that were not given arrive as undefined and must not clobber stored values
/**
 *
 * @param overrides
 */
function definedOnly<T extends object>(overrides: Partial<T>): Partial<T> {
  const result: Partial<T> = {}
  for (const key in overrides) {
    if (overrides[key] !== undefined) {
      result[key] = overrides[key]
    }
  }
  return result
}

/**
 *
 * @param settings
 */
export function toSessionOptions(settings: ExperimentSettings): SessionOptions {
  return {
    sampleCount: settings.sampleCount,
    samplePeriodS: settings.samplePeriodS,
    timeouts: {
      handshake: settings.handshakeTimeoutMs,
      handshakePoll: settings.handshakePollMs,
      start: settings.startTimeoutMs,
      testRun: settings.testRunTimeoutMs,
      transfer: settings.transferTimeoutMs,
    },
  }
}

/**
 * Sanity warnings for a settings combination. Empty when nothing looks wrong.
 * @param settings
 */
export function checkSettings(settings: ExperimentSettings): string[] {
  const warnings: string[] = []

  const expectedRunMs = settings.sampleCount * settings.samplePeriodS * 1000
  if (settings.testRunTimeoutMs <= expectedRunMs) {
    warnings.push(
      `Test run timeout (${settings.testRunTimeoutMs}ms) does not exceed the expected test duration (${Math.round(expectedRunMs)}ms)`
    )
  }

  // 10 bits per byte on the wire (8N1)
  const payloadMs = ((settings.sampleCount * 4 * 10) / settings.baudRate) * 1000
  if (settings.transferTimeoutMs <= payloadMs) {
    warnings.push(
      `Transfer timeout (${settings.transferTimeoutMs}ms) is shorter than one payload array takes at ${settings.baudRate} baud (${Math.round(payloadMs)}ms)`
    )
  }

  if (settings.handshakePollMs > settings.handshakeTimeoutMs) {
    warnings.push(
      `Handshake poll interval (${settings.handshakePollMs}ms) exceeds the handshake deadline (${settings.handshakeTimeoutMs}ms)`
    )
  }

  return warnings
}
