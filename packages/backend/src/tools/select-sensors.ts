/**
 * select_sensors
 * Picks individual sensors on the map, as a click or lasso would. The
 * selection drives the per-site charts and survives filter changes.
 */

import { MAX_SELECTED_SITES } from '../config/dashboard.js';
import { ConstraintViolationError } from '../utils/errors.js';
import { oneOf, optionalStringList, requireString } from './args.js';
import type { StateMutatingTool } from './types.js';

const MODES = ['replace', 'add', 'remove', 'clear'] as const;
type SelectionMode = (typeof MODES)[number];

function nextSelection(mode: SelectionMode, current: readonly string[], sites: string[]): string[] {
  switch (mode) {
    case 'replace':
      return sites;
    case 'add':
      return [...current, ...sites];
    case 'remove':
      return current.filter((site) => !sites.includes(site));
    case 'clear':
      return [];
  }
}

export const selectSensorsTool: StateMutatingTool = {
  kind: 'state-mutating',
  definition: {
    name: 'select_sensors',
    description:
      'Select individual sensors by site id for the time series and comparison charts. ' +
      '"replace" (default) selects only the given sites, "add" and "remove" adjust the selection, "clear" empties it.',
    role: 'none',
    sideEffect: 'state-mutating',
    parameters: [
      {
        name: 'sites',
        type: 'string-list',
        required: false,
        description: 'Site ids, e.g. "WAN-01"',
        maxItems: MAX_SELECTED_SITES,
      },
      { name: 'mode', type: 'string', required: false, description: 'How to combine with the current selection', enum: MODES, default: 'replace' },
    ],
  },

  computeChange(args, state) {
    const mode = oneOf(requireString(args, 'mode'), MODES) ?? 'replace';
    const sites = (optionalStringList(args, 'sites') ?? []).map((site) => site.trim()).filter((site) => site.length > 0);
    if (mode !== 'clear' && sites.length === 0) {
      throw new ConstraintViolationError('sites', `must name at least one site for mode '${mode}'`);
    }

    const selected = Array.from(new Set(nextSelection(mode, state.selectedSites, sites))).sort();
    if (selected.length > MAX_SELECTED_SITES) {
      throw new ConstraintViolationError('sites', `would select more than ${MAX_SELECTED_SITES} sites`);
    }

    return {
      delta: { selectedSites: selected },
      payload: { mode, selected_sites: selected },
    };
  },
};
