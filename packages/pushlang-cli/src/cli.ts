#!/usr/bin/env tsx
/**
 * pushlang CLI - run a Push program and print the final stacks
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import {
  PushInterpreter,
  createInstructionSet,
  defaultConfiguration,
  loadConfiguration,
  type PushConfiguration,
  type PushState,
} from 'pushlang-core';
import { reportError } from './report.js';

interface CliOptions {
  eval?: string;
  config?: string;
  maxSteps?: string;
  growthCap?: string;
  seed?: string;
  pushUnboundNames?: boolean;
  stacks?: string[];
}

function parseCount(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${flag} expects a non-negative integer, got ${value}`);
  }
  return n;
}

/**
 * Apply command line overrides on top of the loaded configuration
 */
function buildConfiguration(options: CliOptions): PushConfiguration {
  const config = options.config ? loadConfiguration(options.config) : defaultConfiguration();
  if (options.maxSteps !== undefined) config.maxSteps = parseCount('--max-steps', options.maxSteps);
  if (options.growthCap !== undefined) config.growthCap = parseCount('--growth-cap', options.growthCap);
  if (options.seed !== undefined) {
    const seed = Number(options.seed);
    if (!Number.isInteger(seed)) {
      throw new Error(`--seed expects an integer, got ${options.seed}`);
    }
    config.seed = seed;
  }
  if (options.pushUnboundNames) config.unboundIdentifiers = 'push-name';
  return config;
}

function renderState(state: PushState, only: readonly string[] | undefined): string {
  if (!only || only.length === 0) {
    return state.toString();
  }
  const wanted = new Set(only.map(name => name.toUpperCase()));
  return state
    .namedStacks()
    .filter(([label, stack]) => wanted.has(label) && !stack.isEmpty())
    .map(([label, stack]) => `${label}: ${stack.toString()}`)
    .join('\n');
}

const program = new Command();

program
  .name('pushlang')
  .description('Interpreter for the Push stack-based programming language')
  .version('0.1.0')
  .option('-e, --eval <source>', 'Program source to run')
  .option('-c, --config <file>', 'JSON configuration file')
  .option('--max-steps <n>', 'Maximum number of execution steps')
  .option('--growth-cap <n>', 'Maximum total points across all stacks')
  .option('--seed <n>', 'Seed for the random instructions')
  .option('--push-unbound-names', 'Push unbound identifiers onto the NAME stack')
  .option('--stacks <names...>', 'Only print these stacks')
  .argument('[file]', 'Push program file')
  .action((file: string | undefined, options: CliOptions) => {
    try {
      let source: string;
      if (options.eval !== undefined) {
        source = options.eval;
      } else if (file && file.trim() !== '') {
        const programPath = path.resolve(file);
        if (!fs.existsSync(programPath)) {
          console.error(`Error: Program file not found: ${file}`);
          process.exit(1);
        }
        source = fs.readFileSync(programPath, 'utf-8');
      } else {
        console.error('Error: A program file or --eval source is required');
        process.exit(1);
      }

      const config = buildConfiguration(options);
      const interpreter = PushInterpreter.fromConfiguration(createInstructionSet(), config);
      interpreter.loadProgram(source);

      const result = interpreter.run();
      console.log(`status: ${result.status} (${result.steps} steps)`);
      const output = renderState(interpreter.state, options.stacks);
      if (output.length > 0) {
        console.log(output);
      }
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  });

program.parse();
