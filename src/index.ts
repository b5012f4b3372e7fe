/**
 * stream-stt-server: WebSocket service that turns a live audio stream into a growing transcript
 *
 * @packageDocumentation
 */

// Core exports
export * from './core/index.js'
export * from './types/index.js'
export * from './plugins/index.js'
export { loadConfig, type ServerConfig } from './config.js'

// Re-export WebSocket type from ws
export { WebSocket } from 'ws'

import type { WebSocket } from 'ws'
import { VoiceWebSocketServer, type WebSocketConfig, type MessageType } from './core/websocket.js'
import { StreamingSession, type SessionConfig } from './core/session.js'
import type { Logger } from './core/logger.js'
import { silentLogger } from './core/logger.js'
import type { Transcriber } from './plugins/index.js'

/**
 * Streaming STT server configuration
 */
export interface StreamingSttServerConfig {
  /** WebSocket server configuration */
  websocket: WebSocketConfig
  /** Segmentation and scheduling settings applied to every session */
  session?: SessionConfig
  /** Transcriber shared by all sessions */
  transcriber: Transcriber
  /** Logger (default: silent) */
  logger?: Logger
}

/**
 * Streaming STT Server
 * Creates one StreamingSession per WebSocket connection and routes frames to it
 */
export class StreamingSttServer {
  private wsServer: VoiceWebSocketServer
  private sessions: Map<string, StreamingSession> = new Map()
  private config: StreamingSttServerConfig
  private logger: Logger

  constructor(config: StreamingSttServerConfig) {
    this.config = config
    this.logger = config.logger ?? silentLogger

    this.wsServer = new VoiceWebSocketServer(config.websocket, {
      onConnection: (ws, sessionId) => this.onConnection(ws, sessionId),
      onMessage: (ws, sessionId, message) => this.onMessage(ws, sessionId, message),
      onClose: (ws, sessionId) => this.onClose(ws, sessionId),
      onError: (ws, sessionId, error) => this.onError(ws, sessionId, error)
    }, this.logger)
  }

  /**
   * Start accepting connections
   */
  async start(): Promise<void> {
    await this.wsServer.start()
    this.logger.info('Streaming STT server started', { transcriber: this.config.transcriber.name })
  }

  /**
   * Close every connection and stop the server
   */
  async stop(): Promise<void> {
    await this.wsServer.stop()
    await Promise.all(Array.from(this.sessions.values(), (session) => session.close()))
    this.sessions.clear()
    this.logger.info('Streaming STT server stopped')
  }

  /**
   * Port the server listens on, or null when stopped
   */
  port(): number | null {
    return this.wsServer.port()
  }

  getSession(sessionId: string): StreamingSession | undefined {
    return this.sessions.get(sessionId)
  }

  getSessionCount(): number {
    return this.sessions.size
  }

  /**
   * Handle new WebSocket connection
   */
  private onConnection(ws: WebSocket, sessionId: string): void {
    const session = new StreamingSession(
      sessionId,
      { sendJson: (message) => this.wsServer.sendJson(ws, message) },
      this.config.transcriber,
      this.config.session,
      this.logger
    )
    this.sessions.set(sessionId, session)
  }

  /**
   * Handle WebSocket message
   */
  private async onMessage(_ws: WebSocket, sessionId: string, message: MessageType): Promise<void> {
    const session = this.sessions.get(sessionId)
    if (!session) {
      this.logger.warn('Message for unknown session', { sessionId })
      return
    }

    if (message.type === 'audio') {
      session.handleAudio(message.data)
    } else {
      await session.handleText(message.message)
    }
  }

  /**
   * Handle WebSocket close
   */
  private async onClose(_ws: WebSocket, sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId)
    if (!session) {
      return
    }

    this.sessions.delete(sessionId)
    await session.close()
  }

  /**
   * Handle WebSocket error
   */
  private onError(_ws: WebSocket, sessionId: string, error: Error): void {
    this.logger.debug('Connection error reported', { sessionId, error: error.message })
  }
}

/**
 * Default export
 */
export default StreamingSttServer
