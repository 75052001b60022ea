/**
 * Typed readers over normalized tool arguments
 */

import { InvalidParameterTypeError } from '../utils/errors.js';
import type { ToolArguments } from './types.js';

export function optionalString(args: ToolArguments, name: string): string | undefined {
  const value = args[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new InvalidParameterTypeError(name, 'a string');
  return value;
}

export function requireString(args: ToolArguments, name: string): string {
  const value = optionalString(args, name);
  if (value === undefined) throw new InvalidParameterTypeError(name, 'a string');
  return value;
}

export function optionalNumber(args: ToolArguments, name: string): number | undefined {
  const value = args[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') throw new InvalidParameterTypeError(name, 'a number');
  return value;
}

export function optionalBoolean(args: ToolArguments, name: string): boolean | undefined {
  const value = args[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new InvalidParameterTypeError(name, 'a boolean');
  return value;
}

export function optionalStringList(args: ToolArguments, name: string): string[] | undefined {
  const value = args[name];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw new InvalidParameterTypeError(name, 'a list of strings');
  return value;
}

/**
 * Narrow a string to one of the declared values
 */
export function oneOf<T extends string>(value: string, allowed: readonly T[]): T | undefined {
  return allowed.find((candidate) => candidate === value);
}
