/**
 * Lifecycle state of a streaming session
 *
 * idle -> active -> closing -> idle, with closed as the terminal state once the
 * underlying connection is gone.
 */
export type SessionState = 'idle' | 'active' | 'closing' | 'closed'

/**
 * Audio block handed to a transcriber
 */
export interface Segment {
  /** Copy of the buffered audio bytes */
  readonly audio: Buffer
  /** True when the segment ends an utterance and its text is kept */
  readonly isFinal: boolean
}

/**
 * Control commands accepted in text frames
 */
export type ControlCommand = 'start' | 'stop' | 'ping'

/**
 * Messages sent to the peer as JSON text frames
 */
export type OutboundMessage =
  | { type: 'connected'; message: string; mode: 'streaming' }
  | { type: 'session_started' }
  | { type: 'partial'; text: string; is_final: false }
  | { type: 'final'; text: string; is_final: true }
  | { type: 'session_ended' }
  | { type: 'pong' }

/**
 * Outgoing side of a connection as seen by a session
 */
export interface SessionTransport {
  /**
   * Send a protocol message
   * @returns false when the connection can no longer be written to
   */
  sendJson(message: OutboundMessage): boolean
}
