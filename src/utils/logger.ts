/**
 * Structured JSON-lines logging
 *
 * Leaf payloads must never reach a log: proofs are meant to reveal a
 * single block, and logs are often shipped to third parties.
 * - Fields that may carry block contents are dropped
 * - Long strings are truncated
 * - Only counts, indices and digests are logged
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { getConfig } from '../config/index.js';
import type { AppConfig } from '../config/index.js';
import { LOG_LIMITS } from '../constants.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  event: string;
  details?: Record<string, unknown>;
  duration_ms?: number;
  error_code?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

// used when the environment fails validation, so a bad LOG_LEVEL never
// breaks tree building or verification
const FALLBACK_SETTINGS: AppConfig['logging'] = { level: 'info', console: false };

const SENSITIVE_FIELDS = ['data', 'block', 'value', 'payload', 'secret'];

class MerkleLogger {
  private configWarned = false;

  /**
   * Log an event with automatic sanitization
   */
  log(level: LogLevel, service: string, event: string, data: Partial<LogEntry> = {}): void {
    const logging = this.settings();
    if (LEVEL_RANK[level] > LEVEL_RANK[logging.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service,
      event
    };
    if (data.details) entry.details = this.sanitizeLogData(data.details);
    if (data.duration_ms !== undefined) entry.duration_ms = data.duration_ms;
    if (data.error_code) entry.error_code = data.error_code;

    if (logging.file) {
      this.writeToFile(logging.file, entry);
    }

    if (logging.console) {
      console.log(`[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.service}:${entry.event}`,
        entry.details ? JSON.stringify(entry.details) : '');
    }
  }

  error(service: string, event: string, data?: Partial<LogEntry>): void {
    this.log('error', service, event, data);
  }

  warn(service: string, event: string, data?: Partial<LogEntry>): void {
    this.log('warn', service, event, data);
  }

  info(service: string, event: string, data?: Partial<LogEntry>): void {
    this.log('info', service, event, data);
  }

  debug(service: string, event: string, data?: Partial<LogEntry>): void {
    this.log('debug', service, event, data);
  }

  /**
   * Log security events (forged or corrupted proofs)
   */
  logSecurityEvent(event: string, details?: Record<string, unknown>, errorCode?: string): void {
    this.warn('security', event, { details, error_code: errorCode });
  }

  private settings(): AppConfig['logging'] {
    try {
      return getConfig().logging;
    } catch (error) {
      if (!this.configWarned) {
        this.configWarned = true;
        console.error('Logging configuration invalid, using defaults:', error instanceof Error ? error.message : error);
      }
      return FALLBACK_SETTINGS;
    }
  }

  private sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.isSensitiveField(key)) {
        continue;
      }

      if (typeof value === 'string') {
        sanitized[key] = this.sanitizeString(value);
      } else if (Buffer.isBuffer(value)) {
        sanitized[key] = this.sanitizeString(value.toString('hex'));
      } else if (isRecord(value)) {
        sanitized[key] = this.sanitizeLogData(value);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  private isSensitiveField(fieldName: string): boolean {
    const lower = fieldName.toLowerCase();
    return SENSITIVE_FIELDS.some(field => lower.includes(field));
  }

  private sanitizeString(value: string): string {
    if (value.length > LOG_LIMITS.MAX_STRING_LENGTH) {
      return `${value.substring(0, LOG_LIMITS.MAX_STRING_LENGTH)}...[truncated]`;
    }
    return value;
  }

  private writeToFile(filePath: string, entry: LogEntry): void {
    try {
      const dir = dirname(filePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      appendFileSync(filePath, `${JSON.stringify(entry)}\n`, 'utf8');
    } catch (error) {
      // Fallback to console if file writing fails
      console.error('Failed to write to log file:', error);
      console.log('LOG:', JSON.stringify(entry));
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Export singleton instance
export const logger = new MerkleLogger();

export { MerkleLogger };
