/**
 * toggle_overlay
 * Shows or hides a map overlay; without `visible` the overlay flips
 */

import { OVERLAYS } from '../config/dashboard.js';
import { optionalBoolean, requireString } from './args.js';
import type { StateMutatingTool } from './types.js';

export const toggleOverlayTool: StateMutatingTool = {
  kind: 'state-mutating',
  definition: {
    name: 'toggle_overlay',
    description: 'Show or hide a map overlay. Leave "visible" out to flip its current state.',
    role: 'none',
    sideEffect: 'state-mutating',
    parameters: [
      { name: 'overlay', type: 'string', required: true, description: 'Overlay name', enum: OVERLAYS },
      { name: 'visible', type: 'boolean', required: false, description: 'Target visibility' },
    ],
  },

  computeChange(args, state) {
    const overlay = requireString(args, 'overlay');
    const visible = optionalBoolean(args, 'visible') ?? !(state.overlays[overlay] ?? false);
    return {
      delta: { overlays: { [overlay]: visible } },
      payload: { overlay, visible },
    };
  },
};
