import type { ControlCommand, OutboundMessage } from '../types/index.js'
import { SttError } from './errors.js'

const COMMANDS: readonly ControlCommand[] = ['start', 'stop', 'ping']

export type ControlMessageResult =
  | { ok: true; command: ControlCommand }
  | { ok: false; error: SttError }

function isCommand(value: unknown): value is ControlCommand {
  return typeof value === 'string' && (COMMANDS as readonly string[]).includes(value)
}

/**
 * Parse a JSON control frame such as {"command":"start"}
 */
export function parseControlMessage(raw: string): ControlMessageResult {
  let data: unknown

  try {
    data = JSON.parse(raw)
  } catch (error) {
    return {
      ok: false,
      error: new SttError('malformed_control_message', 'Invalid JSON', { cause: error })
    }
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return { ok: false, error: new SttError('malformed_control_message', 'Control message is not an object') }
  }

  const command = 'command' in data ? data.command : undefined
  if (!isCommand(command)) {
    return {
      ok: false,
      error: new SttError('malformed_control_message', `Unknown command: ${String(command)}`)
    }
  }

  return { ok: true, command }
}

export function connectedMessage(message: string): OutboundMessage {
  return { type: 'connected', message, mode: 'streaming' }
}

export function partialMessage(text: string): OutboundMessage {
  return { type: 'partial', text, is_final: false }
}

export function finalMessage(text: string): OutboundMessage {
  return { type: 'final', text, is_final: true }
}

export function serializeMessage(message: OutboundMessage): string {
  return JSON.stringify(message)
}
