import { randomUUID } from 'crypto'
import { WebSocketServer, WebSocket, type RawData } from 'ws'
import type { OutboundMessage } from '../types/index.js'
import type { Logger } from './logger.js'
import { describeError, silentLogger } from './logger.js'
import { connectedMessage, serializeMessage } from './protocol.js'

/**
 * WebSocket server configuration
 */
export interface WebSocketConfig {
  /** Port to listen on (0 picks a free port) */
  port: number
  /** Host to bind to (default: '0.0.0.0') */
  host?: string
  /** WebSocket path (default: '/') */
  path?: string
  /** Heartbeat ping interval in ms (default: 15000) */
  pingInterval?: number
  /** Maximum payload size in bytes (default: 10MB) */
  maxPayload?: number
  /** Text of the greeting sent on connect */
  welcomeMessage?: string
}

/**
 * Message types that can be received
 */
export type MessageType =
  | { type: 'audio'; data: Buffer }
  | { type: 'text'; message: string }

/**
 * Event handlers for WebSocket connections
 */
export interface WebSocketHandlers {
  /** Called when a new connection is established */
  onConnection?: (ws: WebSocket, sessionId: string) => void | Promise<void>
  /** Called when a message is received */
  onMessage?: (ws: WebSocket, sessionId: string, message: MessageType) => void | Promise<void>
  /** Called when connection closes */
  onClose?: (ws: WebSocket, sessionId: string) => void | Promise<void>
  /** Called when an error occurs */
  onError?: (ws: WebSocket, sessionId: string, error: Error) => void
}

/**
 * WebSocket connection tracking
 */
interface ConnectionInfo {
  sessionId: string
  isAlive: boolean
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data
  }

  if (Array.isArray(data)) {
    return Buffer.concat(data)
  }

  return Buffer.from(data)
}

/**
 * Voice WebSocket Server
 * Accepts streaming connections and routes binary audio and JSON control frames
 */
export class VoiceWebSocketServer {
  private wss: WebSocketServer | null = null
  private connections: Map<WebSocket, ConnectionInfo> = new Map()
  private heartbeatTimer: NodeJS.Timeout | null = null
  private config: Required<WebSocketConfig>
  private handlers: WebSocketHandlers
  private logger: Logger

  constructor(config: WebSocketConfig, handlers: WebSocketHandlers = {}, logger: Logger = silentLogger) {
    this.config = {
      host: '0.0.0.0',
      path: '/',
      pingInterval: 15000,
      maxPayload: 10 * 1024 * 1024,
      welcomeMessage: 'Connected to streaming STT service',
      ...config
    }
    this.handlers = handlers
    this.logger = logger
  }

  /**
   * Start the WebSocket server
   * Resolves once the server is listening.
   */
  async start(): Promise<void> {
    if (this.wss) {
      this.logger.warn('WebSocket server already running')
      return
    }

    const wss = new WebSocketServer({
      port: this.config.port,
      host: this.config.host,
      path: this.config.path,
      maxPayload: this.config.maxPayload
    })
    this.wss = wss

    // Handle new connections
    wss.on('connection', (ws: WebSocket) => {
      this.handleConnection(ws)
    })

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        wss.off('listening', onListening)
        reject(error)
      }
      const onListening = () => {
        wss.off('error', onError)
        resolve()
      }
      wss.once('error', onError)
      wss.once('listening', onListening)
    }).catch((error: unknown) => {
      this.wss = null
      throw error
    })

    // Handle server errors after startup
    wss.on('error', (error) => {
      this.logger.error('WebSocket server error', describeError(error))
    })

    // Set up heartbeat to detect dead connections
    this.heartbeatTimer = setInterval(() => {
      this.heartbeat()
    }, this.config.pingInterval)

    this.logger.info(`WebSocket server listening on ws://${this.config.host}:${this.port()}${this.config.path}`)
  }

  /**
   * Stop the WebSocket server
   */
  async stop(): Promise<void> {
    // Stop heartbeat
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer)
      this.heartbeatTimer = null
    }

    // Close all active connections
    for (const [ws] of this.connections) {
      try {
        ws.close(1001, 'Server shutting down')
      } catch (error) {
        this.logger.error('Error closing WebSocket', describeError(error))
      }
    }

    // Close server
    const wss = this.wss
    if (wss) {
      this.wss = null
      await new Promise<void>((resolve) => {
        wss.close(() => {
          this.logger.info('WebSocket server closed')
          resolve()
        })
      })
    }
  }

  /**
   * Port the server is bound to, or null when not listening
   */
  port(): number | null {
    const address = this.wss?.address()
    if (!address || typeof address === 'string') {
      return null
    }

    return address.port
  }

  /**
   * Send a text frame to a specific WebSocket
   * Writes to a socket that is no longer open are dropped.
   */
  send(ws: WebSocket, data: string): boolean {
    if (ws.readyState !== WebSocket.OPEN) {
      return false
    }

    try {
      ws.send(data)
      return true
    } catch (error) {
      this.logger.error('Error sending data', describeError(error))
      return false
    }
  }

  /**
   * Send a protocol message as JSON
   */
  sendJson(ws: WebSocket, message: OutboundMessage): boolean {
    return this.send(ws, serializeMessage(message))
  }

  /**
   * Heartbeat to detect dead connections
   */
  private heartbeat(): void {
    for (const [ws, connection] of this.connections) {
      if (!connection.isAlive) {
        this.logger.info('Terminating dead connection', { sessionId: connection.sessionId })
        try {
          ws.terminate()
        } catch (error) {
          this.logger.error('Error terminating connection', describeError(error))
        }
        continue
      }

      connection.isAlive = false
      try {
        ws.ping()
      } catch (error) {
        this.logger.error('Error sending ping', describeError(error))
      }
    }
  }

  /**
   * Handle new WebSocket connection
   */
  private handleConnection(ws: WebSocket): void {
    const sessionId = randomUUID()
    const connection: ConnectionInfo = { sessionId, isAlive: true }
    this.connections.set(ws, connection)

    this.logger.info('WebSocket connection established', { sessionId })

    ws.on('pong', () => {
      connection.isAlive = true
    })

    this.sendJson(ws, connectedMessage(this.config.welcomeMessage))

    if (this.handlers.onConnection) {
      Promise.resolve(this.handlers.onConnection(ws, sessionId)).catch((error: unknown) => {
        this.logger.error('Error in onConnection handler', { sessionId, ...describeError(error) })
      })
    }

    ws.on('message', (data: RawData, isBinary: boolean) => {
      const message: MessageType = isBinary
        ? { type: 'audio', data: toBuffer(data) }
        : { type: 'text', message: toBuffer(data).toString('utf8') }

      this.dispatch(ws, sessionId, message)
    })

    ws.on('error', (error) => {
      this.logger.error('WebSocket error', { sessionId, ...describeError(error) })
      if (this.handlers.onError) {
        this.handlers.onError(ws, sessionId, error)
      }
    })

    ws.on('close', () => {
      this.logger.info('WebSocket connection closed', { sessionId })
      this.connections.delete(ws)

      if (this.handlers.onClose) {
        Promise.resolve(this.handlers.onClose(ws, sessionId)).catch((error: unknown) => {
          this.logger.error('Error in onClose handler', { sessionId, ...describeError(error) })
        })
      }
    })
  }

  /**
   * Hand a message to the handler without blocking further frames
   */
  private dispatch(ws: WebSocket, sessionId: string, message: MessageType): void {
    if (!this.handlers.onMessage) {
      return
    }

    try {
      Promise.resolve(this.handlers.onMessage(ws, sessionId, message)).catch((error: unknown) => {
        this.logger.error('Error processing message', { sessionId, type: message.type, ...describeError(error) })
      })
    } catch (error) {
      this.logger.error('Error processing message', { sessionId, type: message.type, ...describeError(error) })
    }
  }
}
