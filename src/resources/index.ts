/**
 * MCP Resources Module
 *
 * Exports resource handlers for the MCP protocol.
 */

export { RESOURCES, listResources, getResourceContent } from './catalog.js';
export type { Resource } from './catalog.js';
