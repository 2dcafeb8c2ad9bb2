#!/usr/bin/env node
/**
 * motor-ident: run one identification experiment against the motor controller.
 */

import * as readline from 'readline/promises'
import { SerialPort } from 'serialport'
import { parseArgs } from 'util'

import {
  checkSettings,
  ExperimentSettings,
  getSettingsStore,
  loadSettings,
  saveSettings,
  toSessionOptions,
} from './services/config-store'
import { routeProgressToStderr } from './services/log-routing'
import { runExperiment, summarizeSamples } from './services/motor-experiment'
import { SampleBuffer } from './types/motor'

const USAGE = `Usage: motor-ident [options]

  --port <path>          Serial device (default from settings, /dev/ttyUSB0)
  --baud <n>             Baud rate (default 115200)
  --samples <n>          Samples per array, must match the firmware (default 4096)
  --period <s>           Sample period in seconds (default 0.01)
  --test-timeout <ms>    Wait for test completion (default 120000)
  --yes                  Start without waiting for Enter
  --json                 Print the sample buffer as JSON
  --save                 Store the given options as new defaults
  --list                 List serial ports and exit
  --help                 Show this help`

/**
 *
 */
async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      port: { type: 'string' },
      baud: { type: 'string' },
      samples: { type: 'string' },
      period: { type: 'string' },
      'test-timeout': { type: 'string' },
      yes: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      save: { type: 'boolean', default: false },
      list: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
  })

  if (values.help) {
    console.log(USAGE)
    return 0
  }

  if (values.list) {
    const ports = await SerialPort.list()
    if (ports.length === 0) {
      console.log('No serial ports found')
    }
    for (const port of ports) {
      console.log(`${port.path}\t${port.manufacturer ?? ''}`)
    }
    return 0
  }

  // stdout carries only the JSON document
  const restoreLog = values.json ? routeProgressToStderr() : () => undefined

  const overrides: Partial<ExperimentSettings> = {
    serialPort: values.port,
    baudRate: parseNumberFlag('--baud', values.baud),
    sampleCount: parseNumberFlag('--samples', values.samples),
    samplePeriodS: parseNumberFlag('--period', values.period),
    testRunTimeoutMs: parseNumberFlag('--test-timeout', values['test-timeout']),
  }

  const store = getSettingsStore()
  if (values.save) {
    saveSettings(store, overrides)
  }
  const settings = loadSettings(store, overrides)
  for (const warning of checkSettings(settings)) {
    console.warn(`Warning: ${warning}`)
  }

  const abort = new AbortController()
  const rl = readline.createInterface({ input: process.stdin, output: values.json ? process.stderr : process.stdout })
  const onSigint = (): void => {
    console.log('\nOperation cancelled by user.')
    rl.close()
    abort.abort()
  }
  process.once('SIGINT', onSigint)
  rl.on('SIGINT', onSigint)

  try {
    const result = await runExperiment({
      port: settings.serialPort,
      baudRate: settings.baudRate,
      settleMs: settings.settleMs,
      signal: abort.signal,
      session: {
        ...toSessionOptions(settings),
        awaitStart: async () => {
          if (values.yes) {
            return
          }
          await rl.question('Press [Enter] to start the experiment...', { signal: abort.signal })
        },
      },
    })

    if (!result.success) {
      console.error(`Experiment failed (${result.error.name}): ${result.error.message}`)
      return 1
    }

    if (values.json) {
      process.stdout.write(`${JSON.stringify(result.data)}\n`)
    } else {
      printSummary(result.data)
    }
    return 0
  } finally {
    process.removeListener('SIGINT', onSigint)
    rl.close()
    restoreLog()
  }
}

/**
 *
 * @param flag
 * @param raw
 */
function parseNumberFlag(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined
  }
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new Error(`${flag} expects a number, got '${raw}'`)
  }
  return value
}

/**
 *
 * @param buffer
 */
function printSummary(buffer: SampleBuffer): void {
  const summary = summarizeSamples(buffer)
  console.log('Experiment finished successfully.')
  console.log(`  Session:  ${buffer.sessionId}`)
  console.log(`  Samples:  ${summary.sampleCount} over ${summary.durationS.toFixed(2)} s`)
  console.log(`  Input:    ${summary.input.min} .. ${summary.input.max}`)
  console.log(`  Angle:    ${summary.angle.min} .. ${summary.angle.max}`)
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error('An unexpected error occurred:', error)
    process.exitCode = 1
  }
)
