/**
 * @module telemetry
 * @description Telemetry emission for the observatory endpoint
 *
 * Telemetry NEVER contains raw request text. Evaluations are identified by
 * their evaluation ID and input hash only.
 */

import type { AgentIdentity, BypassTechnique, GuardDecision } from '@request-guard/contracts';
import { structuredLog } from '@request-guard/lib';

/**
 * Telemetry event types
 */
export type TelemetryEventType =
  | 'guard.evaluation.start'
  | 'guard.evaluation.complete'
  | 'guard.rule.matched'
  | 'guard.audit.success'
  | 'guard.audit.failure';

/**
 * Base telemetry event
 */
export interface TelemetryEvent {
  type: TelemetryEventType;
  agent: AgentIdentity;
  evaluation_id: string;
  timestamp: string;
  data: Record<string, unknown>;
}

/**
 * Telemetry configuration
 */
export interface TelemetryConfig {
  /** Enable telemetry emission */
  enabled: boolean;
  /** Observatory endpoint */
  observatoryUrl?: string;
  /** Batch events before sending */
  batchSize: number;
  /** Flush interval in milliseconds (0 disables the timer) */
  flushInterval: number;
  /** Emit one event per matched rule */
  detailedMetrics: boolean;
  /** Request timeout in milliseconds */
  timeout: number;
}

const DEFAULT_CONFIG: TelemetryConfig = {
  enabled: false,
  observatoryUrl: process.env.OBSERVATORY_URL || 'http://localhost:9090',
  batchSize: 10,
  flushInterval: 5000,
  detailedMetrics: false,
  timeout: 5000,
};

/**
 * Telemetry emitter. Buffers events and posts them in batches.
 */
export class TelemetryEmitter {
  private readonly config: TelemetryConfig;
  private readonly agent: AgentIdentity;
  private readonly buffer: TelemetryEvent[] = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;

  constructor(agent: AgentIdentity, config: Partial<TelemetryConfig> = {}) {
    this.agent = agent;
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (this.config.enabled && this.config.flushInterval > 0) {
      this.startFlushTimer();
    }
  }

  emitEvaluationStart(evaluationId: string, inputLength: number): void {
    this.emit('guard.evaluation.start', evaluationId, { input_length: inputLength });
  }

  emitEvaluationComplete(
    evaluationId: string,
    durationMs: number,
    decision: GuardDecision,
    confidence: number,
    ruleMatchCount: number,
    bypassAttempts: BypassTechnique[]
  ): void {
    this.emit('guard.evaluation.complete', evaluationId, {
      duration_ms: durationMs,
      decision,
      confidence_score: confidence,
      rule_match_count: ruleMatchCount,
      bypass_attempts: bypassAttempts,
    });
  }

  /**
   * Emit rule match event (for detailed metrics)
   */
  emitRuleMatched(evaluationId: string, ruleId: string, category: string, severity: string): void {
    if (!this.config.detailedMetrics) return;

    this.emit('guard.rule.matched', evaluationId, {
      rule_id: ruleId,
      category,
      severity,
    });
  }

  emitAuditSuccess(evaluationId: string, sink: string): void {
    this.emit('guard.audit.success', evaluationId, { sink });
  }

  emitAuditFailure(evaluationId: string, sink: string, error: string): void {
    this.emit('guard.audit.failure', evaluationId, { sink, error });
  }

  /**
   * Force flush all buffered events. A failed batch is logged and dropped.
   */
  async flush(): Promise<void> {
    if (!this.config.enabled || this.buffer.length === 0) return;

    const events = [...this.buffer];
    this.buffer.length = 0;

    try {
      await this.sendEvents(events);
    } catch (error) {
      structuredLog('telemetry_flush_failed', 'Failed to flush telemetry events', null, {
        agent_id: this.agent.agent_id,
        dropped_events: events.length,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Shutdown the emitter
   */
  async shutdown(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  private emit(type: TelemetryEventType, evaluationId: string, data: Record<string, unknown>): void {
    if (!this.config.enabled) return;

    this.buffer.push({
      type,
      agent: this.agent,
      evaluation_id: evaluationId,
      timestamp: new Date().toISOString(),
      data,
    });

    if (this.buffer.length >= this.config.batchSize) {
      void this.flush();
    }
  }

  private startFlushTimer(): void {
    this.flushTimer = setInterval(() => {
      void this.flush();
    }, this.config.flushInterval);
    // A pending flush must not keep a CLI process alive
    this.flushTimer.unref();
  }

  private async sendEvents(events: TelemetryEvent[]): Promise<void> {
    if (!this.config.observatoryUrl) return;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await fetch(`${this.config.observatoryUrl}/api/v1/telemetry/batch`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Agent-ID': this.agent.agent_id,
        },
        body: JSON.stringify({ events }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Observatory returned ${response.status}`);
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
