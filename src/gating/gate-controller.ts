/**
 * Tool gate controller.
 *
 * Runs the fixed pipeline TaskTypeFilter -> ResourceFilter -> SecurityFilter
 * over the full catalog and sizes the result against the context budget.
 */

import { CONTEXT_LIMITS } from '../constants.js';
import { ContextBudgetExceededError } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';
import type { EstimatorMode, FilterConfig, FilterContext, ToolMap } from '../types.js';
import { ContextBudgetEstimator, type EstimatorPreference } from './context-budget.js';
import { ResourceFilter } from './resource-filter.js';
import { SecurityFilter } from './security-filter.js';
import { TaskTypeFilter } from './task-type-filter.js';
import { sameToolNames, type FilterName, type GatingPolicy, type ToolFilter } from './tool-filter.js';

export interface GateSettings extends GatingPolicy {
  defaultMaxTools: number;
}

export interface GateControllerOptions {
  estimator?: EstimatorPreference;
}

export interface GateDecision {
  tools: ToolMap;
  filtersApplied: FilterName[];
}

export class ToolGateController {
  readonly taskTypeFilter: TaskTypeFilter;
  private readonly filters: readonly ToolFilter[];
  private readonly budget: ContextBudgetEstimator;

  constructor(
    private readonly allTools: ToolMap,
    readonly config: FilterConfig,
    private readonly settings: GateSettings,
    options: GateControllerOptions = {}
  ) {
    this.taskTypeFilter = new TaskTypeFilter(config.taskTypeAllowlists, settings);
    this.filters = [
      this.taskTypeFilter,
      new ResourceFilter(config.maxTools || settings.defaultMaxTools),
      new SecurityFilter(config.blocklist)
    ];
    this.budget = new ContextBudgetEstimator(allTools, options.estimator);

    logger.info('Tool gate controller ready', {
      tools: allTools.size,
      estimator: this.budget.mode,
      catalog_size: this.budget.catalogSize
    });
  }

  get estimatorMode(): EstimatorMode {
    return this.budget.mode;
  }

  /**
   * Narrow the catalog for one request and report the stages that changed it.
   */
  getAvailableTools(context: FilterContext): GateDecision {
    let tools: ToolMap = new Map(this.allTools);
    const filtersApplied: FilterName[] = [];

    for (const filter of this.filters) {
      const next = filter.apply(tools, context);
      if (!sameToolNames(tools, next)) {
        filtersApplied.push(filter.name);
      }
      tools = next;
    }

    return { tools, filtersApplied };
  }

  listActiveTools(): string[] {
    return [...this.allTools.keys()];
  }

  /**
   * Estimated token cost of a tool set.
   *
   * Above the hard limit this logs an error and, when enforcement is on
   * (explicitly or via STRICT_CONTEXT_LIMIT), throws instead of returning.
   */
  getContextSize(tools: ToolMap, enforceHardLimit?: boolean): number {
    const enforce = enforceHardLimit ?? this.settings.strictContextLimit;
    const tokenCount = this.budget.estimate(tools);

    if (tokenCount > CONTEXT_LIMITS.HARD_LIMIT) {
      const error = new ContextBudgetExceededError(tokenCount, CONTEXT_LIMITS.HARD_LIMIT);
      metrics.increment(MetricNames.CONTEXT_LIMIT_EXCEEDED);
      logger.error(error.message, { token_count: tokenCount, enforced: enforce });
      if (enforce) {
        throw error;
      }
    }

    if (tokenCount > CONTEXT_LIMITS.WARN_THRESHOLD) {
      logger.warn('Context size exceeds recommended threshold', {
        token_count: tokenCount,
        threshold: CONTEXT_LIMITS.WARN_THRESHOLD
      });
    }

    return tokenCount;
  }
}
