/**
 * Tool catalogue
 * The closed set of tools the engine exposes, one handler per name
 */

import { SchemaRegistry } from './registry.js';
import { updateFiltersTool } from './update-filters.js';
import { updateMapViewportTool } from './map-viewport.js';
import { toggleOverlayTool } from './toggle-overlay.js';
import { selectSensorsTool } from './select-sensors.js';
import { summaryStatisticsTool } from './summary-statistics.js';
import { listFilterOptionsTool } from './filter-options.js';
import { sensorTimeSeriesTool } from './sensor-time-series.js';
import { documentSearchTool } from './document-search.js';
import { resolveDocumentPassageTool } from './resolve-passage.js';
import { exportCurrentViewTool } from './export-view.js';
import { refreshDataTool } from './refresh-data.js';
import type { ToolHandler } from './types.js';

export const TOOL_NAMES = [
  'update_filters',
  'update_map_viewport',
  'toggle_overlay',
  'select_sensors',
  'summary_statistics',
  'list_filter_options',
  'sensor_time_series',
  'document_search',
  'resolve_document_passage',
  'export_current_view',
  'refresh_data',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const TOOL_HANDLERS: Readonly<Record<ToolName, ToolHandler>> = Object.freeze({
  update_filters: updateFiltersTool,
  update_map_viewport: updateMapViewportTool,
  toggle_overlay: toggleOverlayTool,
  select_sensors: selectSensorsTool,
  summary_statistics: summaryStatisticsTool,
  list_filter_options: listFilterOptionsTool,
  sensor_time_series: sensorTimeSeriesTool,
  document_search: documentSearchTool,
  resolve_document_passage: resolveDocumentPassageTool,
  export_current_view: exportCurrentViewTool,
  refresh_data: refreshDataTool,
});

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((candidate) => candidate === name);
}

export function getHandler(name: string): ToolHandler | undefined {
  return isToolName(name) ? TOOL_HANDLERS[name] : undefined;
}

/**
 * Registry holding the definition of every catalogued tool
 */
export function createToolRegistry(): SchemaRegistry {
  const registry = new SchemaRegistry();
  registry.swap(TOOL_NAMES.map((name) => TOOL_HANDLERS[name].definition));
  return registry;
}
