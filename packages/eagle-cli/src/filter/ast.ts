/**
 * Filter expression syntax tree.
 */

import type { JsonValue } from '../output/types.js';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator;

export interface ObjectEntry {
  key: FilterNode;
  value: FilterNode;
}

export interface IfBranch {
  condition: FilterNode;
  then: FilterNode;
}

export type FilterNode =
  | { type: 'identity' }
  | { type: 'recurse' }
  | { type: 'literal'; value: JsonValue }
  | { type: 'field'; target: FilterNode; name: string }
  | { type: 'index'; target: FilterNode; index: FilterNode }
  | { type: 'slice'; target: FilterNode; from: FilterNode | null; to: FilterNode | null }
  | { type: 'iterate'; target: FilterNode }
  | { type: 'optional'; body: FilterNode }
  | { type: 'array'; body: FilterNode | null }
  | { type: 'object'; entries: ObjectEntry[] }
  | { type: 'pipe'; left: FilterNode; right: FilterNode }
  | { type: 'comma'; left: FilterNode; right: FilterNode }
  | { type: 'binary'; operator: BinaryOperator; left: FilterNode; right: FilterNode }
  | { type: 'and'; left: FilterNode; right: FilterNode }
  | { type: 'or'; left: FilterNode; right: FilterNode }
  | { type: 'alternative'; left: FilterNode; right: FilterNode }
  | { type: 'negate'; body: FilterNode }
  | { type: 'if'; branches: IfBranch[]; otherwise: FilterNode | null }
  | { type: 'call'; name: string; args: FilterNode[]; position: number };
