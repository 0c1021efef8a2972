/**
 * Gating configuration file (`filter-config.json`).
 *
 * A missing file yields defaults derived from the registered tools; a file
 * that is not valid JSON or has the wrong shape is fatal.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { Errors } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import type { KeywordMappings } from '../intent/classifier.js';
import type { FilterConfig, ToolMap } from '../types.js';
import type { GatewaySettings } from './settings.js';

const FilterConfigFileSchema = z.object({
  task_type_allowlists: z.record(z.string(), z.array(z.string())).nullable().optional(),
  max_tools: z.number().int().min(0).nullable().optional(),
  blocklist: z.array(z.string()).nullable().optional(),
  intent_keywords: z.record(z.string(), z.array(z.string())).nullable().optional(),
}).passthrough();

export interface LoadedFilterConfig {
  config: FilterConfig;
  intentKeywords?: KeywordMappings;
}

/**
 * One allowlist per task type, naming every tool tagged with it.
 */
export function buildDefaultAllowlists(tools: ToolMap): Record<string, string[]> {
  const allowlists: Record<string, string[]> = {};
  for (const [name, tool] of tools) {
    for (const taskType of tool.taskTypes) {
      const names = allowlists[taskType] ?? [];
      names.push(name);
      allowlists[taskType] = names;
    }
  }
  return allowlists;
}

export function loadFilterConfig(
  settings: Pick<GatewaySettings, 'filterConfigPath' | 'defaultMaxTools'>,
  tools: ToolMap
): LoadedFilterConfig {
  const path = settings.filterConfigPath;
  const defaultAllowlists = buildDefaultAllowlists(tools);

  let raw: string;
  try {
    raw = fs.readFileSync(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn('Filter config not found; using automatic defaults', { path });
      return {
        config: { taskTypeAllowlists: defaultAllowlists, maxTools: settings.defaultMaxTools, blocklist: [] }
      };
    }
    throw Errors.invalidConfig('FILTER_CONFIG_PATH', error instanceof Error ? error.message : String(error));
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw Errors.malformedJson(path, error instanceof Error ? error.message : String(error));
  }

  const parsed = FilterConfigFileSchema.safeParse(decoded);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw Errors.invalidConfig(`${path}: ${issue.path.join('.') || 'root'}`, issue.message);
  }
  const data = parsed.data;

  const allowlists = data.task_type_allowlists && Object.keys(data.task_type_allowlists).length > 0
    ? data.task_type_allowlists
    : defaultAllowlists;
  const intentKeywords = data.intent_keywords && Object.keys(data.intent_keywords).length > 0
    ? data.intent_keywords
    : undefined;

  const config: FilterConfig = {
    taskTypeAllowlists: allowlists,
    maxTools: data.max_tools || settings.defaultMaxTools,
    blocklist: data.blocklist ?? []
  };

  logger.info('Loaded filter config', {
    path,
    task_types: Object.keys(config.taskTypeAllowlists).length,
    max_tools: config.maxTools,
    blocklist: config.blocklist.length,
    intent_keyword_overrides: intentKeywords !== undefined
  });

  return { config, intentKeywords };
}
