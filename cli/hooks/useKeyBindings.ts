/**
 * Keyboard handler for the `watch` view.
 *
 * Bridges Ink's `useInput` hook with the declarative binding map from
 * `@/lib/keys/bindings.ts`. Callers pass a context (running or paused) and a
 * handler map keyed by action name; this hook matches the physical keypress
 * to the right action.
 */

import { useInput } from "ink";

import { findBinding, resolveKeyName } from "@/lib/keys/bindings.js";
import type { InkKeyInput, ViewContext } from "@/lib/keys/types.js";

// ---------------------------------------------------------------------------
// Hook
// ---------------------------------------------------------------------------

/**
 * Register keyboard handlers for the active view context.
 *
 * @param context  - Which bindings are eligible alongside the `global` set.
 * @param handlers - Map of action name to callback. Actions without a
 *                   handler are ignored.
 */
export function useKeyBindings(
  context: ViewContext,
  handlers: Record<string, () => void>,
): void {
  useInput((input: string, key: InkKeyInput) => {
    const keyName = resolveKeyName(input, key);
    if (!keyName) return;

    const binding = findBinding(keyName, context);
    if (!binding) return;

    const handler = handlers[binding.action];
    if (handler) {
      handler();
    }
  });
}
