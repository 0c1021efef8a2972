/**
 * Task-type relevance stage.
 *
 * Resolves the request's task types (explicit header/param or classifier
 * output, by precedence), normalizes them against the configured allowlists
 * and keeps the tools that are both allowlisted and self-tagged for one of
 * the resolved labels.
 */

import { META_TASK_TYPE } from '../constants.js';
import { logger } from '../utils/logger.js';
import type { FilterContext, ToolMap } from '../types.js';
import { isStrictNoFallback, type GatingPolicy, type ToolFilter } from './tool-filter.js';

const OPS_SUFFIX = '-ops';
const MAX_LOGGED_QUERY = 100;

type ClassificationSource = 'intent' | 'explicit' | 'none';

/**
 * Trim and lower-case a label; empty input yields undefined.
 */
export function normalizeTaskTypeKey(value: string | null | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return normalized || undefined;
}

/**
 * Alias candidates for a canonical key: `-ops` stripped, hyphens as
 * underscores, and that form with underscores removed.
 */
export function aliasCandidates(canonical: string): string[] {
  const aliases = new Set<string>();

  if (canonical.endsWith(OPS_SUFFIX)) {
    const trimmed = canonical.slice(0, -OPS_SUFFIX.length);
    if (trimmed) {
      aliases.add(trimmed);
    }
  }

  const underscored = canonical.replace(/-/g, '_');
  if (underscored && underscored !== canonical) {
    aliases.add(underscored);
  }

  const compact = underscored.replace(/_/g, '');
  if (compact && compact !== canonical) {
    aliases.add(compact);
  }

  return [...aliases];
}

function truncateQuery(query: string): string {
  return query.length > MAX_LOGGED_QUERY ? `${query.slice(0, MAX_LOGGED_QUERY)}...` : query;
}

export class TaskTypeFilter implements ToolFilter {
  readonly name = 'TaskTypeFilter' as const;

  private readonly allowlists: Map<string, readonly string[]> = new Map();
  private readonly aliases: Map<string, string> = new Map();

  constructor(
    taskTypeAllowlists: Record<string, readonly string[]>,
    private readonly policy: GatingPolicy
  ) {
    for (const [rawKey, toolNames] of Object.entries(taskTypeAllowlists)) {
      const canonical = normalizeTaskTypeKey(rawKey);
      if (!canonical) continue;
      this.allowlists.set(canonical, toolNames);
    }

    // Aliases never shadow a canonical key; the first canonical key claiming an alias keeps it.
    for (const canonical of this.allowlists.keys()) {
      for (const alias of aliasCandidates(canonical)) {
        if (this.allowlists.has(alias) || this.aliases.has(alias)) continue;
        this.aliases.set(alias, canonical);
      }
    }
  }

  /**
   * Canonical allowlist keys, in configuration order.
   */
  get canonicalTaskTypes(): string[] {
    return [...this.allowlists.keys()];
  }

  /**
   * Resolve one raw label to its canonical allowlist key, if any.
   */
  resolveTaskType(label: string | null | undefined): string | undefined {
    const key = normalizeTaskTypeKey(label);
    if (!key) return undefined;
    if (this.allowlists.has(key)) return key;
    return this.aliases.get(key);
  }

  apply(tools: ToolMap, context: FilterContext): ToolMap {
    if (
      context.query !== undefined &&
      context.detectedTaskTypes !== undefined &&
      context.detectedTaskTypes.length === 0 &&
      isStrictNoFallback(this.policy)
    ) {
      logger.warn('Strict no-match mode: returning empty tool set', {
        request_id: context.requestId,
        query: truncateQuery(context.query)
      });
      return new Map();
    }

    const { labels, source } = this.selectLabels(context);
    const resolved = this.normalizeTaskTypes(labels);

    if (resolved.length === 0) {
      const filtered: ToolMap = new Map();
      for (const [name, tool] of tools) {
        if (!tool.taskTypes.includes(META_TASK_TYPE)) {
          filtered.set(name, tool);
        }
      }
      logger.debug('TaskTypeFilter excluded meta-ops tools by default', {
        request_id: context.requestId,
        remaining: filtered.size
      });
      return filtered;
    }

    const merged = this.mergeAllowlists(resolved);

    if (merged.size === 0) {
      if (isStrictNoFallback(this.policy)) {
        logger.warn('Unknown task types and strict mode enabled; returning empty set', {
          request_id: context.requestId,
          source
        });
        return new Map();
      }
      logger.warn('Unknown task types; returning all tools (fallback enabled)', {
        request_id: context.requestId,
        source
      });
      return tools;
    }

    const filtered: ToolMap = new Map();
    for (const [name, tool] of tools) {
      if (merged.has(name) && resolved.some(taskType => tool.taskTypes.includes(taskType))) {
        filtered.set(name, tool);
      }
    }

    logger.debug('TaskTypeFilter applied', {
      request_id: context.requestId,
      task_types: resolved,
      source,
      allowlist: [...merged],
      remaining: filtered.size
    });

    return filtered;
  }

  private selectLabels(context: FilterContext): { labels: string[]; source: ClassificationSource } {
    const detected = context.detectedTaskTypes ?? [];
    const explicit = context.taskType;

    if (this.policy.intentPrecedence === 'intent') {
      if (detected.length > 0) return { labels: detected, source: 'intent' };
      if (explicit) return { labels: [explicit], source: 'explicit' };
    } else {
      if (explicit) return { labels: [explicit], source: 'explicit' };
      if (detected.length > 0) return { labels: detected, source: 'intent' };
    }

    return { labels: [], source: 'none' };
  }

  private normalizeTaskTypes(labels: string[]): string[] {
    const resolved: string[] = [];
    for (const label of labels) {
      const canonical = this.resolveTaskType(label);
      if (canonical && !resolved.includes(canonical)) {
        resolved.push(canonical);
      }
    }
    return resolved;
  }

  private mergeAllowlists(taskTypes: string[]): Set<string> {
    const merged = new Set<string>();
    for (const taskType of taskTypes) {
      for (const toolName of this.allowlists.get(taskType) ?? []) {
        merged.add(toolName);
      }
    }
    return merged;
  }
}
