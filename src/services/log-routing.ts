/**
 * Send `console.log` progress lines to stderr, leaving stdout to machine-readable output.
 * Returns a function that restores the previous `console.log`.
 */
export function routeProgressToStderr(): () => void {
  const original = console.log
  console.log = (...args: unknown[]) => console.error(...args)
  return () => {
    console.log = original
  }
}
