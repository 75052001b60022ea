/**
 * update_map_viewport
 * Pans and zooms the map
 */

import { markerSize } from '../config/air-quality.js';
import { optionalNumber } from './args.js';
import type { MapViewport } from '../types/session.js';
import type { StateMutatingTool } from './types.js';

export const updateMapViewportTool: StateMutatingTool = {
  kind: 'state-mutating',
  definition: {
    name: 'update_map_viewport',
    description: 'Move the map centre and/or change the zoom level. Omitted values are left unchanged.',
    role: 'none',
    sideEffect: 'state-mutating',
    parameters: [
      { name: 'lat', type: 'number', required: false, description: 'Latitude of the map centre', min: -90, max: 90 },
      { name: 'lon', type: 'number', required: false, description: 'Longitude of the map centre', min: -180, max: 180 },
      { name: 'zoom', type: 'number', required: false, description: 'Zoom level', min: 0, max: 22 },
    ],
  },

  computeChange(args, state) {
    const viewport: Partial<MapViewport> = {};
    const lat = optionalNumber(args, 'lat');
    const lon = optionalNumber(args, 'lon');
    const zoom = optionalNumber(args, 'zoom');
    if (lat !== undefined) viewport.lat = lat;
    if (lon !== undefined) viewport.lon = lon;
    if (zoom !== undefined) viewport.zoom = zoom;

    const next = { ...state.viewport, ...viewport };
    return {
      delta: { viewport },
      payload: { viewport: next, marker_size: markerSize(next.zoom) },
    };
  },
};
