import { describe, it, expect } from 'vitest'
import {
  BINDINGS,
  findBinding,
  getBindingsForContext,
  getFooterHints,
  resolveKeyName,
} from '@/lib/keys/bindings'

const NO_KEYS = {
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
}

describe('key bindings', () => {
  it('should resolve global keys in every context', () => {
    expect(findBinding('q', 'running')?.action).toBe('quit')
    expect(findBinding('q', 'paused')?.action).toBe('quit')
  })

  it('should only allow stepping while paused', () => {
    expect(findBinding('n', 'running')).toBeUndefined()
    expect(findBinding('n', 'paused')?.action).toBe('step')
  })

  it('should not repeat a key within one context', () => {
    for (const context of ['running', 'paused'] as const) {
      const keys = getBindingsForContext(context).map((b) => b.key)
      expect(new Set(keys).size).toBe(keys.length)
    }
  })

  it('should give every binding a unique action', () => {
    const actions = BINDINGS.map((b) => b.action)
    expect(new Set(actions).size).toBe(actions.length)
  })

  it('should render readable footer hints without hidden bindings', () => {
    expect(getFooterHints('running')).toEqual([
      { key: 'q', description: 'Quit' },
      { key: 'Space', description: 'Pause/resume' },
      { key: 'c', description: 'Recenter' },
      { key: '+', description: 'Faster' },
      { key: '-', description: 'Slower' },
      { key: '↑↓←→', description: 'Pan' },
    ])
  })

  it('should add the step hint while paused', () => {
    expect(getFooterHints('paused').at(-1)).toEqual({ key: 'n', description: 'Step' })
  })
})

describe('resolveKeyName', () => {
  it('should name arrow keys', () => {
    expect(resolveKeyName('', { ...NO_KEYS, leftArrow: true })).toBe('leftArrow')
  })

  it('should pass printable input through', () => {
    expect(resolveKeyName(' ', NO_KEYS)).toBe(' ')
  })

  it('should give only bound keys a symbolic name', () => {
    const symbolic = ['upArrow', 'downArrow', 'leftArrow', 'rightArrow']
    for (const name of symbolic) {
      expect(resolveKeyName('', { ...NO_KEYS, [name]: true })).toBe(name)
      expect(findBinding(name, 'global')).toBeDefined()
    }
    expect(resolveKeyName('\r', NO_KEYS)).toBe('\r')
  })
})
