/**
 * @module request-guard/lib
 * @description Shared infrastructure for guard agents
 *
 * - Structured logging
 * - Startup validation
 * - Error types
 */

// Startup validation
export {
  assertStartupRequirements,
  validateStartup,
  structuredLog,
  type AgentIdentityContext,
  type LogLevel,
  type StartupCheck,
  type StartupValidationResult,
} from './startup-validator.js';

// Errors
export {
  GuardError,
  RuleTableError,
  ConfigurationError,
  InputValidationError,
  AuditSinkError,
  type InputIssue,
} from './errors.js';
