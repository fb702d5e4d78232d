/**
 * Filter engine: a jq-compatible subset behind a swappable interface.
 */

import { FilterError, FilterRuntimeError } from '../errors.js';
import type { JsonValue } from '../output/types.js';
import { compileNode } from './compile.js';
import { parseFilter } from './parser.js';

export interface CompiledFilter {
  /** Run against one input. Returns every output in order (possibly none). */
  run(input: JsonValue): JsonValue[];
}

export interface FilterEngine {
  /** Parse and compile. Throws FilterParseError or FilterCompileError. */
  compile(expression: string): CompiledFilter;
}

export function createFilterEngine(): FilterEngine {
  return {
    compile(expression: string): CompiledFilter {
      const evaluate = compileNode(parseFilter(expression));
      return {
        run(input: JsonValue): JsonValue[] {
          try {
            return Array.from(evaluate(input));
          } catch (err) {
            if (err instanceof FilterError) throw err;
            // e.g. RangeError from very deep recursion
            throw new FilterRuntimeError(err instanceof Error ? err.message : String(err));
          }
        },
      };
    },
  };
}

const defaultEngine = createFilterEngine();

/**
 * Evaluate `expression` against `value` with the given (or built-in) engine.
 */
export function applyFilter(
  value: JsonValue,
  expression: string,
  engine: FilterEngine = defaultEngine,
): JsonValue[] {
  return engine.compile(expression).run(value);
}

export { parseFilter } from './parser.js';
export type { FilterNode } from './ast.js';
