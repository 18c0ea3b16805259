/**
 * API Configuration
 * Centralized configuration for all API modules
 */

import type { LogLevel } from '../../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// Environment helpers
// ═══════════════════════════════════════════════════════════════════════════

const getEnvNumber = (key: string, defaultValue: number): number => {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
};

const getEnvString = (key: string, defaultValue: string): string => {
  return process.env[key] || defaultValue;
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const getEnvLogLevel = (key: string, defaultValue: LogLevel): LogLevel => {
  const value = process.env[key];
  return LOG_LEVELS.find((level) => level === value) ?? defaultValue;
};

// ═══════════════════════════════════════════════════════════════════════════
// API Configuration
// ═══════════════════════════════════════════════════════════════════════════

export const API_CONFIG = {
  /** Application version */
  version: getEnvString('API_VERSION', '1.0.0'),

  /** Server configuration */
  server: {
    port: getEnvNumber('API_PORT', 5001),
    host: getEnvString('API_HOST', '0.0.0.0'),
  },

  /** Monitoring configuration */
  monitoring: {
    /** Threshold in ms for logging slow requests */
    slowRequestThresholdMs: getEnvNumber('SLOW_REQUEST_THRESHOLD_MS', 1000),
  },

  /** Logger configuration */
  logger: {
    level: getEnvLogLevel('LOG_LEVEL', 'info'),
    pretty: process.env.NODE_ENV !== 'production',
  },
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Type exports
// ═══════════════════════════════════════════════════════════════════════════

export type ApiConfig = typeof API_CONFIG;
export type ServerConfig = typeof API_CONFIG.server;
export type MonitoringConfig = typeof API_CONFIG.monitoring;
export type LoggerConfig = typeof API_CONFIG.logger;
