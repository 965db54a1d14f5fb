/**
 * Policy types for the safety validator.
 *
 * Every candidate statement is inspected by a textual pre-filter and then by
 * AST-based rules. Both layers report violations in the same shape.
 */

export type RuleName =
  | 'null_byte'
  | 'unterminated_quote'
  | 'comment'
  | 'single_statement'
  | 'forbidden_keyword'
  | 'parse_error'
  | 'read_only'
  | 'nested_statement'
  | 'select_into'
  | 'locking_clause'
  | 'foreign_schema'
  | 'unknown_table'
  | 'unknown_qualifier'
  | 'unknown_column'
  | 'unsupported_from'
  | 'dangerous_function';

export interface RuleViolation {
  rule: RuleName;
  reason: string;
}

/** Outcome of inspecting a statement against the policy. */
export type ValidationResult =
  | {
      allowed: true;
      /** Statement text with the trailing terminator removed */
      sql: string;
      violations: [];
    }
  | {
      allowed: false;
      violations: RuleViolation[];
    };
