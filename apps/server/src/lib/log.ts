/**
 * Structured JSON-line logging. Events go to stdout, errors to stderr.
 */

export function logEvent(event: string, fields: Record<string, unknown> = {}): void {
  process.stdout.write(JSON.stringify({ ts: new Date().toISOString(), event, ...fields }) + '\n')
}

export interface ErrorLogOptions {
  /** Include the stack trace. Off in production. */
  includeStack: boolean
  fields?: Record<string, unknown>
}

export function logError(op: string, error: unknown, options: ErrorLogOptions): void {
  const entry = {
    ts: new Date().toISOString(),
    level: 'error',
    op,
    ...options.fields,
    error: error instanceof Error ? error.message : String(error),
    stack: options.includeStack && error instanceof Error ? error.stack : undefined,
  }
  process.stderr.write(JSON.stringify(entry) + '\n')
}
