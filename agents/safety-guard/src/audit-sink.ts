/**
 * @module audit-sink
 * @description Append-only destinations for audit records
 *
 * Each record is written as one unit: one JSON line in a file, one POST to
 * the audit service. Sinks reject with AuditSinkError; the agent turns that
 * into a log line and a telemetry event, never into an evaluation failure.
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { AuditRecord } from '@request-guard/contracts';
import { AuditSinkError } from '@request-guard/lib';

export interface AuditSink {
  readonly name: string;
  append(record: AuditRecord): Promise<void>;
}

/**
 * Keeps records in memory. Used by tests and the edge handler's dry runs.
 */
export class InMemoryAuditSink implements AuditSink {
  readonly name = 'memory';
  readonly records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }
}

/**
 * Appends records to a JSON-lines file.
 *
 * Appends from one process are chained, so two records never interleave
 * within a line even when evaluations run concurrently.
 */
export class FileAuditSink implements AuditSink {
  readonly name = 'file';
  private tail: Promise<void> = Promise.resolve();
  private directoryReady: Promise<void> | null = null;

  constructor(private readonly path: string) {}

  append(record: AuditRecord): Promise<void> {
    const line = JSON.stringify(record) + '\n';
    const write = this.tail.then(() => this.write(line));
    // The chain must survive a failed write; the caller still sees the rejection
    this.tail = write.catch(() => undefined);
    return write;
  }

  private async write(line: string): Promise<void> {
    try {
      this.directoryReady ??= mkdir(dirname(this.path), { recursive: true }).then(() => undefined);
      await this.directoryReady;
      await appendFile(this.path, line, 'utf8');
    } catch (error) {
      this.directoryReady = null;
      const message = error instanceof Error ? error.message : String(error);
      throw new AuditSinkError(this.name, message);
    }
  }
}

/**
 * Configuration for the remote audit service client
 */
export interface RemoteAuditSinkConfig {
  /** Base URL of the audit service */
  baseUrl: string;
  /** API key for authentication */
  apiKey?: string;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Enable retry on transient failures */
  retryEnabled: boolean;
  /** Maximum attempts, the first one included */
  maxRetries: number;
  /** Base delay for exponential backoff in milliseconds */
  backoffMs: number;
}

const DEFAULT_REMOTE_CONFIG: Omit<RemoteAuditSinkConfig, 'baseUrl'> = {
  timeout: 5000,
  retryEnabled: true,
  maxRetries: 3,
  backoffMs: 100,
};

class ClientError extends Error {}

/**
 * Posts records to an audit service over HTTP.
 *
 * Retries transient failures with exponential backoff. 4xx responses are
 * not retried.
 */
export class RemoteAuditSink implements AuditSink {
  readonly name = 'remote';
  private readonly config: RemoteAuditSinkConfig;
  private readonly endpoint: string;

  constructor(config: Partial<RemoteAuditSinkConfig> & { baseUrl: string }) {
    this.config = { ...DEFAULT_REMOTE_CONFIG, ...config };
    this.endpoint = `${this.config.baseUrl.replace(/\/+$/, '')}/api/v1/audit/records`;
  }

  async append(record: AuditRecord): Promise<void> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Evaluation-Id': record.evaluation_id,
      'X-Ruleset-Version': record.ruleset_version,
    };

    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    const body = JSON.stringify(record);
    const maxAttempts = this.config.retryEnabled ? Math.max(1, this.config.maxRetries) : 1;
    let lastError: Error = new Error('no attempt made');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.post(headers, body);
        return;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        // Don't retry on client errors (4xx)
        if (lastError instanceof ClientError) break;

        if (attempt < maxAttempts) {
          await this.delay(Math.pow(2, attempt - 1) * this.config.backoffMs);
        }
      }
    }

    throw new AuditSinkError(this.name, lastError.message);
  }

  private async post(headers: Record<string, string>, body: string): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text().catch(() => 'Unknown error');
        const message = `audit service returned ${response.status}: ${errorBody}`;
        throw response.status >= 400 && response.status < 500
          ? new ClientError(message)
          : new Error(message);
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Writes every record to each of several sinks. Rejects if any sink fails,
 * after all of them have been tried.
 */
export class FanOutAuditSink implements AuditSink {
  readonly name: string;

  constructor(private readonly sinks: readonly AuditSink[]) {
    this.name = sinks.map((s) => s.name).join('+');
  }

  async append(record: AuditRecord): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.append(record)));
    const failures = results.flatMap((result) =>
      result.status === 'rejected'
        ? [result.reason instanceof Error ? result.reason.message : String(result.reason)]
        : []
    );

    if (failures.length > 0) {
      throw new AuditSinkError(this.name, failures.join('; '));
    }
  }
}
