import Joi from 'joi';
import { LOG_LEVELS } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';

export interface CoordinationConfig {
  // Storage engine
  storage: {
    dataDir: string;
    lockStaleMs: number;  // a key lock older than this is considered abandoned
    maxRetries: number;   // retry budget before an operation surfaces Busy
  };

  // File lock table
  locks: {
    defaultTtlSeconds: number;
    maxLocksPerAgent: number;
    sweepIntervalSeconds: number;  // 0 disables the periodic sweep
  };

  // Session log retention
  sessionLog: {
    maxEvents: number;
    maxAgeDays: number;
  };

  logging: {
    level: LogLevel;
  };
}

export type CoordinationConfigOverrides = {
  [K in keyof CoordinationConfig]?: Partial<CoordinationConfig[K]>;
};

export const configSchema = Joi.object<CoordinationConfig>({
  storage: Joi.object({
    dataDir: Joi.string().default('./data'),
    lockStaleMs: Joi.number().integer().min(2000).default(10000),
    maxRetries: Joi.number().integer().min(0).max(100).default(10),
  }).default(),

  locks: Joi.object({
    defaultTtlSeconds: Joi.number().integer().min(1).max(31536000).default(86400), // 24 hours, at most a year
    maxLocksPerAgent: Joi.number().integer().min(1).default(100),
    // setInterval takes at most 2^31-1 ms
    sweepIntervalSeconds: Joi.number().integer().min(0).max(2147483).default(300),
  }).default(),

  sessionLog: Joi.object({
    maxEvents: Joi.number().integer().min(1).default(100),
    maxAgeDays: Joi.number().min(0).default(30),
  }).default(),

  logging: Joi.object({
    level: Joi.string().valid(...LOG_LEVELS).default('info'),
  }).default(),
}).default();
