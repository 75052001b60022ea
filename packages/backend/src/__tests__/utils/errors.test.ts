/**
 * Error classes tests
 */

import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConstraintViolationError,
  DuplicateToolError,
  ForbiddenError,
  InternalError,
  InvalidParameterTypeError,
  InvalidRequestError,
  MissingRequiredParameterError,
  NotFoundError,
  RateLimitError,
  TimeoutError,
  UnauthorizedError,
  UnknownChunkError,
  UnknownToolError,
  UpstreamUnavailableError,
  isAppError,
} from '../../utils/errors.js';

describe('Error Classes', () => {
  describe('AppError', () => {
    it('should have correct properties', () => {
      const error = new UnknownToolError('zoom_in');
      expect(error.kind).toBe('UnknownTool');
      expect(error.message).toBe("Unknown tool 'zoom_in'");
      expect(error.statusCode).toBe(404);
    });

    it('should generate correct response', () => {
      const error = new InvalidRequestError('Test', [{ field: 'session_id', message: 'Required' }]);
      const response = error.toResponse('corr_123');

      expect(response.error.kind).toBe('InvalidRequest');
      expect(response.error.message).toBe('Test');
      expect(response.error.correlationId).toBe('corr_123');
      expect(response.error.details).toHaveLength(1);
    });

    it('should produce a kind/message envelope', () => {
      expect(new ForbiddenError('nope').toEnvelope()).toEqual({ kind: 'Forbidden', message: 'nope' });
    });
  });

  describe('Parameter errors', () => {
    it('should name the offending parameter', () => {
      const missing = new MissingRequiredParameterError('query');
      expect(missing.kind).toBe('MissingRequiredParameter');
      expect(missing.parameter).toBe('query');
      expect(missing.message).toBe("Missing required parameter 'query'");
      expect(missing.details).toEqual([{ field: 'query', message: "Missing required parameter 'query'" }]);

      const invalid = new InvalidParameterTypeError('year', 'an integer');
      expect(invalid.message).toBe("Parameter 'year' must be an integer");

      const constraint = new ConstraintViolationError('month', 'must be <= 12');
      expect(constraint.message).toBe("Parameter 'month' must be <= 12");
    });
  });

  describe('Status Code Mapping', () => {
    it('should have correct status codes', () => {
      expect(new InvalidRequestError('test').statusCode).toBe(400);
      expect(new MissingRequiredParameterError('p').statusCode).toBe(400);
      expect(new UnauthorizedError().statusCode).toBe(401);
      expect(new ForbiddenError().statusCode).toBe(403);
      expect(new NotFoundError().statusCode).toBe(404);
      expect(new UnknownChunkError('c').statusCode).toBe(404);
      expect(new DuplicateToolError('t').statusCode).toBe(409);
      expect(new RateLimitError().statusCode).toBe(429);
      expect(new InternalError().statusCode).toBe(500);
      expect(new UpstreamUnavailableError('down', 'sensor-api').statusCode).toBe(502);
      expect(new TimeoutError().statusCode).toBe(504);
    });
  });

  describe('Error Kinds', () => {
    it('should carry the taxonomy kind', () => {
      expect(new RateLimitError('slow down', 1500).kind).toBe('RateLimited');
      expect(new RateLimitError('slow down', 1500).retryAfterMs).toBe(1500);
      expect(new TimeoutError().kind).toBe('Timeout');
      expect(new UpstreamUnavailableError('down', 'sensor-api').kind).toBe('UpstreamUnavailable');
      expect(new UnknownChunkError('doc:v1:0').kind).toBe('UnknownChunk');
      expect(new DuplicateToolError('update_filters').kind).toBe('DuplicateTool');
    });
  });

  describe('isAppError', () => {
    it('should return true for AppError instances', () => {
      expect(isAppError(new NotFoundError())).toBe(true);
      expect(isAppError(new AppError('Internal', 'x', 500))).toBe(true);
    });

    it('should return false for other errors', () => {
      expect(isAppError(new Error('plain'))).toBe(false);
      expect(isAppError('string')).toBe(false);
      expect(isAppError(null)).toBe(false);
    });
  });
});
