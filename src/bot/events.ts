/**
 * Inbound Events
 *
 * Classify incoming chat messages for the flow controller.
 */

import type { FlowCommand, InboundEvent } from '../types'

const COMMANDS: readonly FlowCommand[] = ['start', 'help', 'route', 'cancel']

function isFlowCommand(name: string): name is FlowCommand {
  return COMMANDS.some((command) => command === name)
}

/**
 * Event for a message, or null when the message should be ignored.
 *
 * `/name` and `/name@bot_username` are commands; unknown commands are
 * ignored rather than treated as place text. A message without text
 * (sticker, photo, location) is `non_text`.
 */
export function messageEvent(text: string | undefined): InboundEvent | null {
  if (text === undefined) {
    return { kind: 'non_text' }
  }
  if (!text.startsWith('/')) {
    return { kind: 'text', text }
  }
  const name = (text.slice(1).split(/\s/)[0] ?? '').split('@')[0] ?? ''
  return isFlowCommand(name) ? { kind: 'command', command: name } : null
}
