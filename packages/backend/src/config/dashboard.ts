/**
 * Dashboard vocabulary: the fixed values filters and overlays accept
 */

export const BOROUGHS = ['Wandsworth', 'Richmond', 'Merton'] as const;

export const SENSOR_TYPES = ['DT', 'Clarity', 'Automatic'] as const;

export const AVERAGING_PERIODS = ['Annual', 'Month'] as const;

export const OVERLAYS = ['borough_boundaries', 'sensor_labels', 'who_guideline', 'uk_limit'] as const;

export const MIN_YEAR = 2000;
export const MAX_YEAR = 2100;

export const MAX_SELECTED_SITES = 200;
