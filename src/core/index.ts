export * from './audio-conversion.js'
export * from './errors.js'
export * from './logger.js'
export * from './pcm.js'
export * from './protocol.js'
export * from './scheduler.js'
export * from './segment-buffer.js'
export * from './session.js'
export * from './transcript.js'
export * from './websocket.js'
