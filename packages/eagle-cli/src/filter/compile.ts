/**
 * Compile a parsed filter into an evaluator closure.
 *
 * Function calls are resolved against the builtin table here, so an unknown
 * name or a wrong arity fails before any input is read.
 */

import { FilterCompileError, FilterRuntimeError } from '../errors.js';
import type { JsonObject, JsonValue } from '../output/types.js';
import { indexField, indexValue, iterateValue, recurseValues, sliceValue } from './access.js';
import type { FilterNode, IfBranch, ObjectEntry } from './ast.js';
import { BUILTINS, builtinKey, type Evaluator } from './builtins.js';
import { applyArithmetic, compareValues, describe, isTruthy } from './values.js';

export function compileNode(node: FilterNode): Evaluator {
  switch (node.type) {
    case 'identity':
      return function* (input) {
        yield input;
      };

    case 'recurse':
      return recurseValues;

    case 'literal': {
      const value = node.value;
      return function* () {
        yield value;
      };
    }

    case 'field': {
      const target = compileNode(node.target);
      const name = node.name;
      return function* (input) {
        for (const value of target(input)) yield indexField(value, name);
      };
    }

    case 'index': {
      const target = compileNode(node.target);
      const index = compileNode(node.index);
      return function* (input) {
        for (const key of index(input)) {
          for (const value of target(input)) yield indexValue(value, key);
        }
      };
    }

    case 'slice': {
      const target = compileNode(node.target);
      const from = node.from === null ? null : compileNode(node.from);
      const to = node.to === null ? null : compileNode(node.to);
      return function* (input) {
        for (const end of to === null ? [null] : to(input)) {
          for (const start of from === null ? [null] : from(input)) {
            for (const value of target(input)) yield sliceValue(value, start, end);
          }
        }
      };
    }

    case 'iterate': {
      const target = compileNode(node.target);
      return function* (input) {
        for (const value of target(input)) yield* iterateValue(value);
      };
    }

    case 'optional': {
      const body = compileNode(node.body);
      return function* (input) {
        try {
          yield* body(input);
        } catch (err) {
          if (!(err instanceof FilterRuntimeError)) throw err;
        }
      };
    }

    case 'array': {
      const body = node.body === null ? null : compileNode(node.body);
      return function* (input) {
        yield body === null ? [] : [...body(input)];
      };
    }

    case 'object':
      return compileObject(node.entries);

    case 'pipe': {
      const left = compileNode(node.left);
      const right = compileNode(node.right);
      return function* (input) {
        for (const value of left(input)) yield* right(value);
      };
    }

    case 'comma': {
      const left = compileNode(node.left);
      const right = compileNode(node.right);
      return function* (input) {
        yield* left(input);
        yield* right(input);
      };
    }

    case 'binary': {
      const left = compileNode(node.left);
      const right = compileNode(node.right);
      const operator = node.operator;
      return function* (input) {
        for (const b of right(input)) {
          for (const a of left(input)) {
            switch (operator) {
              case '==':
                yield compareValues(a, b) === 0;
                break;
              case '!=':
                yield compareValues(a, b) !== 0;
                break;
              case '<':
                yield compareValues(a, b) < 0;
                break;
              case '<=':
                yield compareValues(a, b) <= 0;
                break;
              case '>':
                yield compareValues(a, b) > 0;
                break;
              case '>=':
                yield compareValues(a, b) >= 0;
                break;
              default:
                yield applyArithmetic(operator, a, b);
            }
          }
        }
      };
    }

    case 'and': {
      const left = compileNode(node.left);
      const right = compileNode(node.right);
      return function* (input) {
        for (const a of left(input)) {
          if (!isTruthy(a)) {
            yield false;
            continue;
          }
          for (const b of right(input)) yield isTruthy(b);
        }
      };
    }

    case 'or': {
      const left = compileNode(node.left);
      const right = compileNode(node.right);
      return function* (input) {
        for (const a of left(input)) {
          if (isTruthy(a)) {
            yield true;
            continue;
          }
          for (const b of right(input)) yield isTruthy(b);
        }
      };
    }

    case 'alternative': {
      const left = compileNode(node.left);
      const right = compileNode(node.right);
      return function* (input) {
        let produced = false;
        try {
          for (const value of left(input)) {
            if (isTruthy(value)) {
              produced = true;
              yield value;
            }
          }
        } catch (err) {
          if (!(err instanceof FilterRuntimeError)) throw err;
        }
        if (!produced) yield* right(input);
      };
    }

    case 'negate': {
      const body = compileNode(node.body);
      return function* (input) {
        for (const value of body(input)) {
          if (typeof value !== 'number') {
            throw new FilterRuntimeError(`${describe(value)} cannot be negated`);
          }
          yield -value;
        }
      };
    }

    case 'if':
      return compileIf(node.branches, node.otherwise);

    case 'call': {
      const builtin = BUILTINS.get(builtinKey(node.name, node.args.length));
      if (builtin === undefined) {
        throw new FilterCompileError(`${builtinKey(node.name, node.args.length)} is not defined`);
      }
      const args = node.args.map(compileNode);
      return (input) => builtin(input, args);
    }
  }
}

function compileObject(entries: ObjectEntry[]): Evaluator {
  const compiled = entries.map((entry) => ({
    key: compileNode(entry.key),
    value: compileNode(entry.value),
  }));

  return function* (input) {
    let partials: JsonObject[] = [{}];
    for (const { key, value } of compiled) {
      const next: JsonObject[] = [];
      for (const partial of partials) {
        for (const k of key(input)) {
          if (typeof k !== 'string') {
            throw new FilterRuntimeError(`Object keys must be strings, got ${describe(k)}`);
          }
          for (const v of value(input)) {
            next.push({ ...partial, [k]: v });
          }
        }
      }
      partials = next;
    }
    yield* partials;
  };
}

function compileIf(branches: IfBranch[], otherwise: FilterNode | null): Evaluator {
  const compiled = branches.map((branch) => ({
    condition: compileNode(branch.condition),
    then: compileNode(branch.then),
  }));
  const fallback: Evaluator =
    otherwise === null
      ? function* (input: JsonValue) {
          yield input;
        }
      : compileNode(otherwise);

  function* evaluateFrom(input: JsonValue, i: number): Generator<JsonValue> {
    const branch = compiled[i];
    if (branch === undefined) {
      yield* fallback(input);
      return;
    }
    for (const condition of branch.condition(input)) {
      if (isTruthy(condition)) {
        yield* branch.then(input);
      } else {
        yield* evaluateFrom(input, i + 1);
      }
    }
  }

  return (input) => evaluateFrom(input, 0);
}
