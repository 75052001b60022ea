/**
 * Schema Registry
 * Holds the declarative contract of every tool and validates call arguments
 */

import { z } from 'zod';
import {
  AppError,
  ConstraintViolationError,
  DuplicateToolError,
  InvalidParameterTypeError,
  MissingRequiredParameterError,
  UnknownToolError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type {
  ArgumentValue,
  ParameterSpec,
  ToolArguments,
  ToolDefinition,
} from './types.js';

interface RegisteredTool {
  definition: ToolDefinition;
  schema: z.ZodTypeAny;
}

export interface CatalogueEntry {
  name: string;
  description: string;
  role: ToolDefinition['role'];
  side_effect: ToolDefinition['sideEffect'];
  parameters: {
    type: 'object';
    properties: Record<string, Record<string, unknown>>;
    required: string[];
    additionalProperties: false;
  };
}

const TYPE_LABELS: Record<ParameterSpec['type'], string> = {
  string: 'a string',
  integer: 'an integer',
  number: 'a number',
  boolean: 'a boolean',
  'string-list': 'a string or a list of strings',
};

/**
 * Case-insensitive match against the declared values, returning the
 * declared spelling
 */
function enumValue(allowed: readonly string[]) {
  return (value: string, ctx: z.RefinementCtx): string => {
    const match = allowed.find((candidate) => candidate.toLowerCase() === value.trim().toLowerCase());
    if (match === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be one of: ${allowed.join(', ')}`,
      });
      return z.NEVER;
    }
    return match;
  };
}

function stringSchema(param: ParameterSpec): z.ZodTypeAny {
  let schema = z.string();
  if (param.minLength !== undefined) {
    schema = schema.min(param.minLength, { message: `must be at least ${param.minLength} characters` });
  }
  if (param.maxLength !== undefined) {
    schema = schema.max(param.maxLength, { message: `must be at most ${param.maxLength} characters` });
  }
  return param.enum ? schema.transform(enumValue(param.enum)) : schema;
}

function numberSchema(param: ParameterSpec): z.ZodTypeAny {
  let schema = z.number().finite();
  if (param.type === 'integer') schema = schema.int();
  if (param.min !== undefined) schema = schema.min(param.min, { message: `must be >= ${param.min}` });
  if (param.max !== undefined) schema = schema.max(param.max, { message: `must be <= ${param.max}` });
  return schema;
}

function listSchema(param: ParameterSpec): z.ZodTypeAny {
  const item = param.enum ? z.string().transform(enumValue(param.enum)) : z.string();
  let list = z.array(item);
  if (param.maxItems !== undefined) {
    list = list.max(param.maxItems, { message: `must have at most ${param.maxItems} items` });
  }
  return z.preprocess(
    (value) => (typeof value === 'string' ? [value] : value),
    list.transform((items) => Array.from(new Set(items)))
  );
}

function baseSchema(param: ParameterSpec): z.ZodTypeAny {
  switch (param.type) {
    case 'string':
      return stringSchema(param);
    case 'integer':
    case 'number':
      return numberSchema(param);
    case 'boolean':
      return z.boolean();
    case 'string-list':
      return listSchema(param);
  }
}

function parameterSchema(param: ParameterSpec): z.ZodTypeAny {
  const schema = baseSchema(param);
  if (param.required) return schema;
  return param.default !== undefined ? schema.default(param.default) : schema.optional();
}

function compile(definition: ToolDefinition): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of definition.parameters) {
    shape[param.name] = parameterSchema(param);
  }
  return z.object(shape).strict();
}

function toParameterError(issue: z.ZodIssue, definition: ToolDefinition): AppError {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return new ConstraintViolationError(issue.keys[0] ?? 'arguments', 'is not declared by this tool');
  }

  const name = issue.path.length > 0 ? String(issue.path[0]) : 'arguments';
  const param = definition.parameters.find((p) => p.name === name);
  if (!param) {
    return new InvalidParameterTypeError(name, 'an object');
  }

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === 'undefined' && issue.path.length === 1) {
        return new MissingRequiredParameterError(name);
      }
      return new InvalidParameterTypeError(name, TYPE_LABELS[param.type]);
    case z.ZodIssueCode.too_small:
    case z.ZodIssueCode.too_big:
    case z.ZodIssueCode.custom:
    case z.ZodIssueCode.not_finite:
      return new ConstraintViolationError(name, issue.message);
    default:
      return new InvalidParameterTypeError(name, TYPE_LABELS[param.type]);
  }
}

function isArgumentValue(value: unknown): value is ArgumentValue {
  if (Array.isArray(value)) return value.every((item) => typeof item === 'string');
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function freezeDefinition(definition: ToolDefinition): ToolDefinition {
  return Object.freeze({
    ...definition,
    parameters: Object.freeze(
      definition.parameters.map((p) =>
        Object.freeze({ ...p, enum: p.enum ? Object.freeze([...p.enum]) : undefined })
      )
    ),
  });
}

export class SchemaRegistry {
  // Replaced wholesale on swap, never edited in place
  private tools: ReadonlyMap<string, RegisteredTool> = new Map();

  /**
   * Register a new tool
   */
  register(definition: ToolDefinition): void {
    if (this.tools.has(definition.name)) {
      throw new DuplicateToolError(definition.name);
    }
    const next = new Map(this.tools);
    const frozen = freezeDefinition(definition);
    next.set(frozen.name, { definition: frozen, schema: compile(frozen) });
    this.tools = next;
    logger.debug({ toolName: definition.name }, 'Tool registered');
  }

  /**
   * Replace the whole tool set at once. Readers holding the old set keep
   * seeing it unchanged.
   */
  swap(definitions: readonly ToolDefinition[]): void {
    const next = new Map<string, RegisteredTool>();
    for (const definition of definitions) {
      if (next.has(definition.name)) {
        throw new DuplicateToolError(definition.name);
      }
      const frozen = freezeDefinition(definition);
      next.set(frozen.name, { definition: frozen, schema: compile(frozen) });
    }
    this.tools = next;
    logger.info({ toolCount: next.size }, 'Tool definitions swapped');
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name)?.definition;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  /**
   * Validate raw arguments, returning the normalized mapping
   */
  validate(name: string, args: unknown): ToolArguments {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }

    const parsed = tool.schema.safeParse(args ?? {});
    if (!parsed.success) {
      const [first] = parsed.error.issues;
      throw toParameterError(first, tool.definition);
    }

    const normalized: ToolArguments = {};
    const data: unknown = parsed.data;
    if (typeof data === 'object' && data !== null) {
      for (const [key, value] of Object.entries(data)) {
        if (isArgumentValue(value)) normalized[key] = value;
      }
    }
    return normalized;
  }

  /**
   * Serialized tool set exposed to the conversational agent
   */
  catalogue(): CatalogueEntry[] {
    return this.list().map((definition) => {
      const properties: Record<string, Record<string, unknown>> = {};
      for (const param of definition.parameters) {
        properties[param.name] = describeParameter(param);
      }
      return {
        name: definition.name,
        description: definition.description,
        role: definition.role,
        side_effect: definition.sideEffect,
        parameters: {
          type: 'object',
          properties,
          required: definition.parameters.filter((p) => p.required).map((p) => p.name),
          additionalProperties: false,
        },
      };
    });
  }
}

function describeParameter(param: ParameterSpec): Record<string, unknown> {
  const base: Record<string, unknown> = { description: param.description };
  if (param.default !== undefined) base.default = param.default;

  if (param.type === 'string-list') {
    return {
      ...base,
      type: 'array',
      items: param.enum ? { type: 'string', enum: [...param.enum] } : { type: 'string' },
      ...(param.maxItems !== undefined && { maxItems: param.maxItems }),
    };
  }

  return {
    ...base,
    type: param.type,
    ...(param.enum && { enum: [...param.enum] }),
    ...(param.min !== undefined && { minimum: param.min }),
    ...(param.max !== undefined && { maximum: param.max }),
    ...(param.minLength !== undefined && { minLength: param.minLength }),
    ...(param.maxLength !== undefined && { maxLength: param.maxLength }),
  };
}
