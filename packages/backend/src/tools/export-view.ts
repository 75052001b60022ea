/**
 * export_current_view
 * Issues a CSV download for the rows behind the current filters
 */

import { config } from '../config/index.js';
import { toWireFilters } from '../utils/wire.js';
import { optionalNumber } from './args.js';
import { fetchExportRows, queryFromFilters } from './query.js';
import type { ExportTool } from './types.js';

export const exportCurrentViewTool: ExportTool = {
  kind: 'export',
  timeoutMs: config.timeouts.exportAssemblyMs,
  definition: {
    name: 'export_current_view',
    description: 'Prepare a CSV download of the data behind the current filters. Returns a download link.',
    role: 'none',
    sideEffect: 'export',
    parameters: [
      { name: 'format', type: 'string', required: false, description: 'File format', enum: ['csv'], default: 'csv' },
      {
        name: 'max_rows',
        type: 'integer',
        required: false,
        description: 'Row cap for the file',
        min: 1,
        max: config.exports.maxRows,
      },
    ],
  },

  async execute(args, context) {
    const { exports } = context.services;
    const query = queryFromFilters(context.filters);
    const maxRows = exports.resolveMaxRows(optionalNumber(args, 'max_rows'));
    const rows = await fetchExportRows(context, query, maxRows);

    // Register the handle last, and only while the call is still live
    context.signal.throwIfAborted();
    const entry = exports.create({
      sessionId: context.sessionId,
      format: 'csv',
      filters: context.filters,
      query,
      rows,
    });
    context.log.info({ handle: entry.handle, rowCount: entry.rowCount }, 'Export prepared');

    return {
      handle: entry.handle,
      format: entry.format,
      filename: entry.filename,
      download_url: `/api/v1/exports/${entry.handle}`,
      row_count: entry.rowCount,
      max_rows: maxRows,
      expires_at: new Date(entry.expiresAt).toISOString(),
      filters: toWireFilters(entry.filters),
    };
  },
};
