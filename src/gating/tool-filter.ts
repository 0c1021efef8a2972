import type { FilterContext, IntentPrecedence, ToolMap } from '../types.js';

/**
 * Names of the fixed filter stages, in pipeline order.
 */
export type FilterName = 'TaskTypeFilter' | 'ResourceFilter' | 'SecurityFilter';

/**
 * One stage of the gating pipeline. A stage never mutates its input and
 * returns the input map itself when it has nothing to remove.
 */
export interface ToolFilter {
  readonly name: FilterName;
  apply(tools: ToolMap, context: FilterContext): ToolMap;
}

/**
 * Policy flags the task-type stage reads on every request.
 */
export interface GatingPolicy {
  intentPrecedence: IntentPrecedence;
  intentFallbackToAll: boolean;
  strictContextLimit: boolean;
}

/**
 * True when policy forbids falling back to the full catalog.
 */
export function isStrictNoFallback(policy: GatingPolicy): boolean {
  return policy.strictContextLimit || !policy.intentFallbackToAll;
}

/**
 * Set-equality of two tool maps by name.
 */
export function sameToolNames(a: ToolMap, b: ToolMap): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const name of a.keys()) {
    if (!b.has(name)) {
      return false;
    }
  }
  return true;
}
