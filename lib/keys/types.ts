/**
 * Keyboard binding types for the `watch` terminal view.
 */

/**
 * View context where a key binding is active
 */
export type ViewContext = 'global' | 'running' | 'paused'

/**
 * A single keyboard binding definition
 *
 * Bindings are pure data - they describe WHAT keys do WHERE, not HOW.
 * The action handlers are connected separately in the app component.
 */
export interface KeyBinding {
  /** The key character or name ('q', 'upArrow', ' ', etc.) */
  key: string

  /** Human-readable description for the footer */
  description: string

  /** Action identifier (e.g., 'quit', 'pan_up', 'step') */
  action: string

  /** Where this binding is active */
  context: ViewContext

  /** Don't show in footer */
  hidden?: boolean
}

/**
 * Ink's useInput key input structure
 * Used for mapping between Ink and our binding system
 */
export interface InkKeyInput {
  upArrow: boolean
  downArrow: boolean
  leftArrow: boolean
  rightArrow: boolean
}
