// src/rules/types.ts

/**
 * The parts of a smart list rule that matter for external list lookups.
 * Evaluation itself belongs to the rule engine.
 */
export interface RuleExpression {
  memberName: string;
  operator: string;
  targetValue?: string | null;
}

export interface RuleSet {
  expressions?: RuleExpression[] | null;
  maxItems?: number | null;
}

export const EXTERNAL_LIST_FIELD = 'ExternalList';

export type ListOrderDirection = 'asc' | 'desc';
