/**
 * Plugin Registry
 *
 * Registry pattern for tool plugins, keyed by plugin name.
 */

import type { ToolPlugin } from './types';
import { logger } from '../logger';

const pluginRegistry = new Map<string, ToolPlugin>();

/**
 * Register a plugin. Overwrites any existing plugin with the same name.
 */
export function registerPlugin(plugin: ToolPlugin): void {
  pluginRegistry.set(plugin.name, plugin);

  logger.debug('Registered plugin', {
    plugin: plugin.name,
    version: plugin.version,
    description: plugin.description,
  });
}

export function getPlugin(name: string): ToolPlugin | undefined {
  return pluginRegistry.get(name);
}

/**
 * @throws Error if no plugin is registered under that name
 */
export function getPluginOrThrow(name: string): ToolPlugin {
  const plugin = pluginRegistry.get(name);
  if (!plugin) {
    throw new Error(`No plugin registered with name: ${name}`);
  }
  return plugin;
}

export function hasPlugin(name: string): boolean {
  return pluginRegistry.has(name);
}

/**
 * Names of all registered plugins, in registration order.
 */
export function getRegisteredPlugins(): string[] {
  return Array.from(pluginRegistry.keys());
}

/**
 * Clear all registered plugins.
 * Useful for testing.
 */
export function clearRegistry(): void {
  pluginRegistry.clear();
}
