/**
 * Context budget estimation for serialized tool descriptors.
 *
 * Per-tool sizes are computed once from the catalog with tiktoken when it can
 * be loaded, otherwise with the byte-length / 4 approximation. The table is
 * never written after construction.
 */

import { approxTokenCounter, getTiktokenCounter, type TokenCounter } from '../utils/tokenizer.js';
import { logger } from '../utils/logger.js';
import type { EstimatorMode, Tool, ToolMap } from '../types.js';

export type EstimatorPreference = 'auto' | 'approx';

/**
 * Wire form of a descriptor as it is counted.
 */
export function serializableTool(tool: Tool): Record<string, unknown> {
  return {
    name: tool.name,
    description: tool.description,
    method: tool.method,
    path: tool.path,
    request_schema: tool.requestSchema ?? null,
    response_schema: tool.responseSchema,
    task_types: tool.taskTypes,
    priority: tool.priority,
    required_scopes: tool.requiredScopes ?? null
  };
}

export class ContextBudgetEstimator {
  private counter: TokenCounter;
  private readonly sizes: Map<string, number> = new Map();
  private readonly total: number;

  constructor(
    catalog: ToolMap,
    preference: EstimatorPreference = 'auto',
    loadCounter: () => TokenCounter | null = getTiktokenCounter
  ) {
    this.counter = preference === 'auto' ? loadCounter() ?? approxTokenCounter : approxTokenCounter;

    try {
      this.fillSizes(catalog);
    } catch (error) {
      logger.warn('Tokenizer failed during precompute; falling back to approximation', {
        error: error instanceof Error ? error.message : String(error)
      });
      this.counter = approxTokenCounter;
      this.sizes.clear();
      this.fillSizes(catalog);
    }

    this.total = [...this.sizes.values()].reduce((sum, size) => sum + size, 0);
  }

  get mode(): EstimatorMode {
    return this.counter.mode;
  }

  /**
   * Combined size of every catalog tool.
   */
  get catalogSize(): number {
    return this.total;
  }

  /**
   * Size of a tool set: the sum of precomputed sizes when every tool has
   * one, otherwise an estimate of the serialized set.
   */
  estimate(tools: ToolMap): number {
    let sum = 0;
    let complete = true;
    for (const name of tools.keys()) {
      const size = this.sizes.get(name);
      if (size === undefined) {
        complete = false;
        break;
      }
      sum += size;
    }
    if (complete) {
      return sum;
    }

    const serialized = JSON.stringify([...tools.values()].map(serializableTool));
    try {
      return this.counter.count(serialized);
    } catch (error) {
      logger.warn('Tokenizer failed; using approximate count', {
        error: error instanceof Error ? error.message : String(error)
      });
      return approxTokenCounter.count(serialized);
    }
  }

  private fillSizes(catalog: ToolMap): void {
    for (const [name, tool] of catalog) {
      this.sizes.set(name, this.counter.count(JSON.stringify(serializableTool(tool))));
    }
  }
}
