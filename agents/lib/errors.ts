/**
 * @module errors
 * @description Error types for the request safety guard
 */

/**
 * Base error class for all guard errors.
 */
export class GuardError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'GuardError';
    this.code = code;
  }
}

/**
 * Thrown while compiling a rule table. Only ever raised at load time.
 */
export class RuleTableError extends GuardError {
  public readonly ruleId: string;

  constructor(ruleId: string, reason: string) {
    super(`Invalid rule '${ruleId}': ${reason}`, 'RULE_TABLE_INVALID');
    this.name = 'RuleTableError';
    this.ruleId = ruleId;
  }
}

/**
 * Thrown when guard configuration cannot be parsed.
 */
export class ConfigurationError extends GuardError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid guard configuration: ${issues.join('; ')}`, 'CONFIGURATION_INVALID');
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Field-level problem found while validating a request.
 */
export interface InputIssue {
  path: string;
  message: string;
}

/**
 * Thrown when a request does not conform to the GuardRequest schema.
 */
export class InputValidationError extends GuardError {
  public readonly issues: InputIssue[];

  constructor(issues: InputIssue[]) {
    super('Input validation failed', 'VALIDATION_FAILED');
    this.name = 'InputValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown by audit sinks when a record could not be written.
 */
export class AuditSinkError extends GuardError {
  public readonly sink: string;

  constructor(sink: string, message: string) {
    super(`Audit sink '${sink}' failed: ${message}`, 'AUDIT_WRITE_FAILED');
    this.name = 'AuditSinkError';
    this.sink = sink;
  }
}
