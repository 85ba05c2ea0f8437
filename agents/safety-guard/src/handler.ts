/**
 * @module handler
 * @description Edge Function handler for the Safety Guard Agent
 *
 * Provides HTTP endpoints for request evaluation.
 */

import type { AgentError } from '@request-guard/contracts';
import { InputValidationError } from '@request-guard/lib';
import { AGENT_IDENTITY, SafetyGuardAgent, createAgent } from './agent.js';
import { loadConfigFromEnv } from './config.js';
import { describeGuard } from './format.js';
import { RULESET_VERSION } from './patterns.js';

/**
 * HTTP Request interface (Edge Function compatible)
 */
export interface EdgeRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  json(): Promise<unknown>;
}

/**
 * HTTP Response interface (Edge Function compatible)
 */
export interface EdgeResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export type Handler = (request: EdgeRequest) => Promise<EdgeResponse>;

/**
 * Create JSON response helper
 */
function jsonResponse(body: unknown, status = 200): EdgeResponse {
  return {
    status,
    headers: {
      'Content-Type': 'application/json',
      'X-Agent-ID': AGENT_IDENTITY.agent_id,
      'X-Agent-Version': AGENT_IDENTITY.agent_version,
      'X-Agent-Classification': AGENT_IDENTITY.classification,
    },
    body,
  };
}

/**
 * Create error response helper
 */
function errorResponse(
  code: AgentError['code'],
  message: string,
  status: number,
  details?: Record<string, unknown>
): EdgeResponse {
  const error: AgentError = {
    code,
    message,
    agent: AGENT_IDENTITY,
    timestamp: new Date().toISOString(),
    ...(details && { details }),
  };

  return jsonResponse(error, status);
}

/**
 * Build a handler around one long-lived agent.
 *
 * Endpoints:
 * - POST /evaluate - Evaluate a request
 * - GET /health - Health check
 * - GET /info - Agent information
 */
export function createHandler(agent: SafetyGuardAgent): Handler {
  return async (request) => {
    const url = new URL(request.url, 'http://localhost');
    const path = url.pathname;

    try {
      switch (true) {
        case path === '/evaluate' && request.method === 'POST':
          return await handleEvaluate(agent, request);

        case path === '/health' && request.method === 'GET':
          return handleHealth();

        case path === '/info' && request.method === 'GET':
          return handleInfo(agent);

        default:
          return errorResponse('INVALID_INPUT', `Unknown endpoint: ${request.method} ${path}`, 404);
      }
    } catch (error) {
      if (error instanceof InputValidationError) {
        return errorResponse('VALIDATION_FAILED', error.message, 400, { errors: error.issues });
      }

      console.error('[Handler] Unexpected error:', error);
      return errorResponse(
        'INTERNAL_ERROR',
        error instanceof Error ? error.message : 'Unknown error',
        500
      );
    }
  };
}

/**
 * Handle evaluation request. Responds without waiting for the audit write;
 * the agent tracks it until `flush` or `shutdown`.
 */
async function handleEvaluate(agent: SafetyGuardAgent, request: EdgeRequest): Promise<EdgeResponse> {
  let rawInput: unknown;
  try {
    rawInput = await request.json();
  } catch {
    return errorResponse('INVALID_INPUT', 'Request body is not valid JSON', 400);
  }

  const input = agent.validateInput(rawInput);
  const check = agent.evaluate(input);

  return jsonResponse(check, 200);
}

/**
 * Handle health check
 */
function handleHealth(): EdgeResponse {
  return jsonResponse({
    status: 'healthy',
    agent: AGENT_IDENTITY.agent_id,
    version: AGENT_IDENTITY.agent_version,
    classification: AGENT_IDENTITY.classification,
    ruleset_version: RULESET_VERSION,
    timestamp: new Date().toISOString(),
  });
}

/**
 * Handle info request
 */
function handleInfo(agent: SafetyGuardAgent): EdgeResponse {
  return jsonResponse({
    agent: AGENT_IDENTITY,
    description:
      'Gates project requests before generation: blocks dangerous intent, asks for confirmation on sensitive operations.',
    endpoints: [
      { path: '/evaluate', method: 'POST', description: 'Evaluate a request' },
      { path: '/health', method: 'GET', description: 'Health check' },
      { path: '/info', method: 'GET', description: 'Agent information' },
    ],
    decisions: ['blocked', 'confirm_required', 'approved'],
    ...describeGuard(agent.config),
  });
}

let defaultHandler: Handler | null = null;

/**
 * Handler backed by an agent configured from the environment
 */
export async function handler(request: EdgeRequest): Promise<EdgeResponse> {
  defaultHandler ??= createHandler(
    createAgent({ config: loadConfigFromEnv(), logDecisions: true })
  );
  return defaultHandler(request);
}
