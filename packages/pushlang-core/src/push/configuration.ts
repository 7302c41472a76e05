/**
 * Interpreter configuration
 *
 * Evaluation budgets, random ranges and initial stack contents. Supplied at
 * construction; nothing in the engine hard-codes these values.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * What the engine does with an identifier that has no binding:
 * - 'ignore': drop it (no-op step)
 * - 'push-name': push it onto the NAME stack
 */
export type UnboundIdentifierPolicy = 'ignore' | 'push-name';

/**
 * Initial stack contents, each array listed bottom to top.
 * `code` is program source parsed onto the CODE stack.
 */
export interface InitialStacks {
  boolean?: boolean[];
  integer?: number[];
  float?: number[];
  name?: string[];
  code?: string;
}

export interface PushConfiguration {
  /** Steps executed before a run is cut off */
  maxSteps: number;
  /** Maximum total points across all stacks */
  growthCap: number;
  minRandomInteger: number;
  maxRandomInteger: number;
  minRandomFloat: number;
  maxRandomFloat: number;
  maxPointsInRandomExpressions: number;
  maxVectorLength: number;
  seed?: number;
  unboundIdentifiers: UnboundIdentifierPolicy;
  initialStacks: InitialStacks;
}

export function defaultConfiguration(): PushConfiguration {
  return {
    maxSteps: 1000,
    growthCap: 10000,
    minRandomInteger: -100,
    maxRandomInteger: 100,
    minRandomFloat: -1,
    maxRandomFloat: 1,
    maxPointsInRandomExpressions: 25,
    maxVectorLength: 1000,
    unboundIdentifiers: 'ignore',
    initialStacks: {},
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectNumber(field: string, value: unknown, integer: boolean): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Invalid configuration: ${field} must be a finite number`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new Error(`Invalid configuration: ${field} must be an integer`);
  }
  return value;
}

function expectArray<T>(field: string, value: unknown, check: (v: unknown) => v is T): T[] {
  if (!Array.isArray(value) || !value.every(check)) {
    throw new Error(`Invalid configuration: ${field} has the wrong element type`);
  }
  return value;
}

const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isInteger = (v: unknown): v is number => typeof v === 'number' && Number.isInteger(v);
const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isString = (v: unknown): v is string => typeof v === 'string';

function resolveInitialStacks(value: unknown): InitialStacks {
  if (!isRecord(value)) {
    throw new Error('Invalid configuration: initialStacks must be an object');
  }
  const stacks: InitialStacks = {};
  for (const [key, entry] of Object.entries(value)) {
    switch (key) {
      case 'boolean':
        stacks.boolean = expectArray('initialStacks.boolean', entry, isBoolean);
        break;
      case 'integer':
        stacks.integer = expectArray('initialStacks.integer', entry, isInteger);
        break;
      case 'float':
        stacks.float = expectArray('initialStacks.float', entry, isFiniteNumber);
        break;
      case 'name':
        stacks.name = expectArray('initialStacks.name', entry, isString);
        break;
      case 'code':
        if (typeof entry !== 'string') {
          throw new Error('Invalid configuration: initialStacks.code must be program source');
        }
        stacks.code = entry;
        break;
      default:
        throw new Error(`Invalid configuration: unknown stack initialStacks.${key}`);
    }
  }
  return stacks;
}

/**
 * Merge a partial configuration over the defaults, validating every field.
 * Throws an Error naming the first offending field.
 */
export function resolveConfiguration(input: unknown = {}): PushConfiguration {
  if (!isRecord(input)) {
    throw new Error('Invalid configuration: expected an object');
  }
  const config = defaultConfiguration();

  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) continue;
    switch (key) {
      case 'maxSteps':
      case 'growthCap':
      case 'maxPointsInRandomExpressions':
      case 'maxVectorLength': {
        const n = expectNumber(key, value, true);
        if (n < 0) {
          throw new Error(`Invalid configuration: ${key} must not be negative`);
        }
        config[key] = n;
        break;
      }
      case 'minRandomInteger':
      case 'maxRandomInteger':
        config[key] = expectNumber(key, value, true);
        break;
      case 'minRandomFloat':
      case 'maxRandomFloat':
        config[key] = expectNumber(key, value, false);
        break;
      case 'seed':
        config.seed = expectNumber(key, value, true);
        break;
      case 'unboundIdentifiers':
        if (value !== 'ignore' && value !== 'push-name') {
          throw new Error(`Invalid configuration: unboundIdentifiers must be 'ignore' or 'push-name'`);
        }
        config.unboundIdentifiers = value;
        break;
      case 'initialStacks':
        config.initialStacks = resolveInitialStacks(value);
        break;
      default:
        throw new Error(`Invalid configuration: unknown field ${key}`);
    }
  }

  if (config.minRandomInteger > config.maxRandomInteger) {
    throw new Error('Invalid configuration: minRandomInteger exceeds maxRandomInteger');
  }
  if (config.minRandomFloat > config.maxRandomFloat) {
    throw new Error('Invalid configuration: minRandomFloat exceeds maxRandomFloat');
  }

  return config;
}

/**
 * Load a JSON configuration file
 *
 * @param configPath Path to the file
 * @param baseDir Base directory for relative paths
 */
export function loadConfiguration(configPath: string, baseDir: string = process.cwd()): PushConfiguration {
  const resolvedPath = path.isAbsolute(configPath)
    ? configPath
    : path.resolve(baseDir, configPath);

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`Configuration file not found: ${resolvedPath}`);
  }

  const content = fs.readFileSync(resolvedPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Configuration file ${resolvedPath} is not valid JSON: ${reason}`);
  }

  if (process.env.DEBUG_CONFIG) {
    console.error(`[config] loaded ${resolvedPath}`);
  }

  return resolveConfiguration(parsed);
}
