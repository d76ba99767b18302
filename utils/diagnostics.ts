export type DiagnosticLevel = 'log' | 'error'

export type DiagnosticLogger = (level: DiagnosticLevel, step: string, payload?: Record<string, unknown>) => void

export function diagnosticTimestamp() {
  return new Date().toISOString()
}

export function logDiagnostic(level: DiagnosticLevel, event: string, payload?: Record<string, unknown>) {
  const message = `[diagnostic] ${diagnosticTimestamp()} ${event} ${JSON.stringify(payload ?? {})}`
  if (level === 'error') {
    console.error(message)
  } else {
    console.log(message)
  }
}

/**
 * Bind a logger to a component scope. `base` is merged into every payload,
 * so per-session loggers can carry their subject and session ids.
 */
export function createDiagnosticLogger(scope: string, base?: Record<string, unknown>): DiagnosticLogger {
  return (level, step, payload) => {
    const enriched = base ? { ...base, ...(payload ?? {}) } : payload
    logDiagnostic(level, `${scope}:${step}`, enriched)
  }
}

export const silentLogger: DiagnosticLogger = () => {}
