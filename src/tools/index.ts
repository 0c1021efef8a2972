import type { ApplianceTransport } from '../client/appliance-client.js';
import type { GatewaySettings } from '../config/settings.js';
import type { ToolGroup } from '../types.js';
import { MetaTools } from './meta.js';
import { ToolRegistry } from './registry.js';
import { SharingTools } from './sharing.js';
import { SnapshotTools } from './snapshots.js';
import { StorageTools } from './storage.js';
import { SystemTools } from './system.js';
import { UserTools } from './users.js';

export { ToolRegistry, TASK_TYPE_MAP, buildInputSchema } from './registry.js';

/**
 * Appliance tool groups enabled by the settings.
 */
export function createToolGroups(
  client: ApplianceTransport,
  settings: Pick<GatewaySettings, 'enableDebugTools' | 'enableDestructiveOperations'>
): ToolGroup[] {
  const options = { allowDestructive: settings.enableDestructiveOperations };
  const groups: ToolGroup[] = [
    new StorageTools(client, options),
    new SnapshotTools(client, options),
    new UserTools(client, options),
    new SharingTools(client, options)
  ];
  if (settings.enableDebugTools) {
    groups.push(new SystemTools(client, options));
  }
  return groups;
}

/**
 * Registry over the enabled groups plus the catalog introspection tools.
 */
export function createToolRegistry(
  client: ApplianceTransport,
  settings: Pick<GatewaySettings, 'enableDebugTools' | 'enableDestructiveOperations'>
): ToolRegistry {
  const registry = new ToolRegistry(createToolGroups(client, settings));
  registry.register(new MetaTools(registry));
  return registry;
}
