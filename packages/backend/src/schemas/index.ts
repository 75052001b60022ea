/**
 * Request validation schemas using Zod
 */

import { z } from 'zod';

// ============================================================================
// Common
// ============================================================================

const IdentifierSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._:-]+$/, 'may only contain letters, digits and . _ : -');

// ============================================================================
// Tool calls
// ============================================================================

export const ToolCallRequestSchema = z.object({
  session_id: IdentifierSchema,
  caller_id: IdentifierSchema,
  tool: z.string().min(1).max(100),
  arguments: z.record(z.unknown()).default({}),
  message: z.string().max(4000).optional(),
});

export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;

// ============================================================================
// Sessions
// ============================================================================

export const SessionParamsSchema = z.object({
  sessionId: IdentifierSchema,
});

export type SessionParams = z.infer<typeof SessionParamsSchema>;

// ============================================================================
// Exports
// ============================================================================

export const ExportParamsSchema = z.object({
  handle: z.string().min(1).max(128),
});

export type ExportParams = z.infer<typeof ExportParamsSchema>;
