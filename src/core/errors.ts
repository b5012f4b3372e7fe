/**
 * Error categories recognised by the server
 */
export type SttErrorKind =
  | 'malformed_control_message'
  | 'transcription_failure'
  | 'connection_lost'
  | 'cancellation_race'

export class SttError extends Error {
  readonly kind: SttErrorKind

  constructor(kind: SttErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SttError'
    this.kind = kind
  }
}

/**
 * Wrap anything thrown by a backend into an SttError
 */
export function toSttError(error: unknown, kind: SttErrorKind = 'transcription_failure'): SttError {
  if (error instanceof SttError) {
    return error
  }

  const message = error instanceof Error ? error.message : String(error)
  return new SttError(kind, message, { cause: error })
}
