// ─────────────────────────────────────────────────────────────────────────────
// Text helpers shared by nodes that read variables from authored strings
// ─────────────────────────────────────────────────────────────────────────────

import { parseCompareValue } from '../model/conditions'
import type { VariableValue } from '../model/variables'
import type { StoryContext } from '../runtime/context'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Replace `{name}` with the variable's value. Unknown names render as `[name]`.
 */
export function interpolateVariables(text: string, context: StoryContext): string {
  return text.replace(PLACEHOLDER, (_match, name: string) => {
    const value = context.getValue(name)
    return value === null ? `[${name}]` : String(value)
  })
}

/**
 * Resolve an authored operand. `$name` reads a variable (null when absent);
 * anything else is parsed as a literal.
 */
export function resolveOperand(raw: string, context: StoryContext): VariableValue | null {
  if (raw.startsWith('$')) {
    return context.getValue(raw.slice(1))
  }
  return parseCompareValue(raw)
}
