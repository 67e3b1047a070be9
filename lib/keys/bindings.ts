/**
 * Keyboard binding map for the `watch` view
 *
 * Global bindings work at any time; stepping a single generation only
 * makes sense while the clock is paused.
 */

import type { InkKeyInput, KeyBinding, ViewContext } from './types.js'

/**
 * All keyboard bindings in the application
 */
export const BINDINGS: KeyBinding[] = [
  // ========================================================================
  // GLOBAL BINDINGS
  // ========================================================================
  {
    key: 'q',
    description: 'Quit',
    action: 'quit',
    context: 'global',
  },
  {
    key: ' ',
    description: 'Pause/resume',
    action: 'toggle_pause',
    context: 'global',
  },
  {
    key: 'c',
    description: 'Recenter',
    action: 'recenter',
    context: 'global',
  },
  {
    key: '+',
    description: 'Faster',
    action: 'speed_up',
    context: 'global',
  },
  {
    key: '-',
    description: 'Slower',
    action: 'slow_down',
    context: 'global',
  },
  {
    key: 'upArrow',
    description: 'Pan',
    action: 'pan_up',
    context: 'global',
  },
  {
    key: 'downArrow',
    description: 'Pan down',
    action: 'pan_down',
    context: 'global',
    hidden: true,
  },
  {
    key: 'leftArrow',
    description: 'Pan left',
    action: 'pan_left',
    context: 'global',
    hidden: true,
  },
  {
    key: 'rightArrow',
    description: 'Pan right',
    action: 'pan_right',
    context: 'global',
    hidden: true,
  },

  // ========================================================================
  // PAUSED
  // ========================================================================
  {
    key: 'n',
    description: 'Step',
    action: 'step',
    context: 'paused',
  },
]

/**
 * Get all bindings for a specific context
 */
export function getBindingsForContext(context: ViewContext): KeyBinding[] {
  return BINDINGS.filter(
    (binding) => binding.context === context || binding.context === 'global'
  )
}

/**
 * Derive the canonical key name that the binding map uses from Ink's input
 * callback arguments.
 *
 * Ink delivers special keys via boolean flags on the `key` object and
 * printable characters via the `input` string.
 */
export function resolveKeyName(input: string, key: InkKeyInput): string {
  if (key.upArrow) return 'upArrow'
  if (key.downArrow) return 'downArrow'
  if (key.leftArrow) return 'leftArrow'
  if (key.rightArrow) return 'rightArrow'

  // Printable character (or space)
  return input
}

/**
 * Find the binding for a key in a specific context
 */
export function findBinding(key: string, context: ViewContext): KeyBinding | undefined {
  return getBindingsForContext(context).find((binding) => binding.key === key)
}

/**
 * Get footer hints for a specific context (non-hidden bindings only)
 */
export function getFooterHints(
  context: ViewContext
): Array<{ key: string; description: string }> {
  // Map special keys to readable names
  const keyMap: Record<string, string> = {
    upArrow: '↑↓←→',
    downArrow: '↓',
    leftArrow: '←',
    rightArrow: '→',
    ' ': 'Space',
  }

  return getBindingsForContext(context)
    .filter((binding) => !binding.hidden)
    .map((binding) => ({
      key: keyMap[binding.key] ?? binding.key,
      description: binding.description,
    }))
}
