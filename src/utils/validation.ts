import Joi from 'joi';
import { AGENT_TYPES } from '../types/Agent.js';
import type { AgentProfile, AgentRegisterInput } from '../types/Agent.js';
import { FILE_OPERATIONS, PRIORITIES } from '../types/Context.js';
import type { ContextEntry, ContextEntryInput, ContextOptions, WorkContext } from '../types/Context.js';
import type { AcquireLocksInput, FileLock } from '../types/FileLock.js';
import { SESSION_EVENT_KINDS } from '../types/SessionEvent.js';
import type { SessionEvent, SessionEventKind, SessionEventQuery } from '../types/SessionEvent.js';
import type { Project, ProjectCreateInput } from '../types/Project.js';
import { ValidationError } from './errors.js';

/**
 * Common validation schemas for the coordination core
 */

export const agentNameSchema = Joi.string()
  .trim()
  .min(1)
  .max(100)
  .required();

export const agentTypeSchema = Joi.string()
  .valid(...AGENT_TYPES)
  .required();

// Project ids become a storage key segment, so they are restricted to key-safe characters
export const projectIdSchema = Joi.string()
  .min(1)
  .max(100)
  .pattern(/^[a-zA-Z0-9_-]+$/)
  .required()
  .messages({
    'string.pattern.base': 'Project ID can only contain letters, numbers, hyphens, and underscores',
  });

export const projectNameSchema = Joi.string()
  .min(1)
  .max(100)
  .pattern(/^[a-zA-Z0-9_-]+$/)
  .required()
  .messages({
    'string.pattern.base': 'Project name can only contain letters, numbers, hyphens, and underscores',
  });

export const uuidSchema = Joi.string()
  .uuid()
  .required();

export const objectiveSchema = Joi.string()
  .trim()
  .min(1)
  .max(2000)
  .required();

export const filePathSchema = Joi.string()
  .min(1)
  .max(1024)
  .custom((value: string, helpers) => {
    const segments = value.replace(/\\/g, '/').split('/');
    if (segments.includes('..')) {
      return helpers.error('filePath.traversal');
    }
    return value;
  }, 'Path traversal check')
  .messages({
    'filePath.traversal': 'File path must not contain ".." segments',
  });

export const registerAgentSchema = Joi.object<Required<AgentRegisterInput>>({
  name: agentNameSchema,
  type: agentTypeSchema,
  capabilities: Joi.array().items(Joi.string().min(1).max(100)).max(50).default([]),
  clientVersion: Joi.string().min(1).max(50).default('1.0.0'),
});

export const contextOptionsSchema = Joi.object<ContextOptions>({
  taskDescription: Joi.string().allow('').max(10000).default(''),
  priority: Joi.string().valid(...PRIORITIES),
  currentFile: filePathSchema.optional(),
});

export const MAX_CONTEXT_ENTRIES = 50;

export const contextEntrySchema = Joi.object<Required<ContextEntryInput>>({
  file: filePathSchema.required(),
  operation: Joi.string().valid(...FILE_OPERATIONS).required(),
  summary: Joi.string().allow('').max(2000).default(''),
});

export const historyLimitSchema = Joi.number().integer().min(1).max(MAX_CONTEXT_ENTRIES).default(10);

// One year
export const MAX_LOCK_TTL_SECONDS = 31536000;

export const ttlSecondsSchema = Joi.number().integer().min(1).max(MAX_LOCK_TTL_SECONDS);

export const acquireLocksSchema = Joi.object<AcquireLocksInput>({
  agentId: uuidSchema,
  projectId: projectIdSchema,
  files: Joi.array().items(filePathSchema.required()).min(1).max(1000).required()
    .messages({ 'array.min': 'At least one file must be specified' }),
  reason: Joi.string().allow('').max(500).default(''),
  ttlSeconds: ttlSecondsSchema.optional(),
});

export const releaseLocksSchema = Joi.object<{ agentId: string; projectId: string; files: string[] }>({
  agentId: uuidSchema,
  projectId: projectIdSchema,
  files: Joi.array().items(filePathSchema.required()).min(1).max(1000).required()
    .messages({ 'array.min': 'At least one file must be specified' }),
});

export const extendLockSchema = Joi.object<{ agentId: string; projectId: string; filePath: string; ttlSeconds?: number }>({
  agentId: uuidSchema,
  projectId: projectIdSchema,
  filePath: filePathSchema.required(),
  ttlSeconds: ttlSecondsSchema.optional(),
});

export const sessionEventKindSchema = Joi.string<SessionEventKind>().valid(...SESSION_EVENT_KINDS);

export const sessionEventQuerySchema = Joi.object<SessionEventQuery>({
  limit: Joi.number().integer().min(1).max(1000).default(50),
  kinds: Joi.array().items(sessionEventKindSchema).optional(),
});

export const workflowStepsSchema = Joi.array<SessionEventKind[]>()
  .items(sessionEventKindSchema.required())
  .min(1)
  .required();

export const createProjectSchema = Joi.object<Required<ProjectCreateInput>>({
  name: projectNameSchema,
  description: Joi.string().allow('').max(500).default(''),
});

// Stored record schemas, applied when documents are read back from storage

const versionSchema = Joi.number().integer().min(1).required();

export const agentProfileRecordSchema = Joi.object<AgentProfile>({
  id: Joi.string().required(),
  name: Joi.string().required(),
  type: Joi.string().valid(...AGENT_TYPES).required(),
  capabilities: Joi.array().items(Joi.string()).required(),
  status: Joi.string().valid('active', 'inactive').required(),
  clientVersion: Joi.string().required(),
  createdAt: Joi.date().required(),
  lastActive: Joi.date().required(),
  totalSessions: Joi.number().integer().min(0).default(0),
  projectsInvolved: Joi.array().items(Joi.string()).default([]),
  version: versionSchema,
  isDeleted: Joi.boolean().required(),
});

const contextEntryRecordSchema = Joi.object<ContextEntry>({
  timestamp: Joi.date().required(),
  file: Joi.string().required(),
  operation: Joi.string().valid(...FILE_OPERATIONS).required(),
  summary: Joi.string().allow('').required(),
});

export const contextHistoryRecordSchema = Joi.object<{ agentId: string; entries: ContextEntry[] }>({
  agentId: Joi.string().required(),
  entries: Joi.array().items(contextEntryRecordSchema).required(),
});

export const workContextRecordSchema = Joi.object<WorkContext>({
  agentId: Joi.string().required(),
  projectId: Joi.string().required(),
  objective: Joi.string().required(),
  taskDescription: Joi.string().allow('').default(''),
  priority: Joi.string().valid(...PRIORITIES).required(),
  currentFile: Joi.string().allow(null).default(null),
  startedAt: Joi.date().required(),
  endedAt: Joi.date().allow(null).required(),
  version: versionSchema,
});

export const fileLockRecordSchema = Joi.object<FileLock>({
  projectId: Joi.string().required(),
  filePath: Joi.string().required(),
  holderAgentId: Joi.string().required(),
  reason: Joi.string().allow('').required(),
  lockedAt: Joi.date().required(),
  expiresAt: Joi.date().required(),
  version: versionSchema,
});

export const sessionEventRecordSchema = Joi.object<SessionEvent>({
  agentId: Joi.string().required(),
  timestamp: Joi.date().required(),
  kind: sessionEventKindSchema.required(),
  payload: Joi.object().unknown(true).default({}),
});

export const sessionLogRecordSchema = Joi.object<{ agentId: string; events: SessionEvent[] }>({
  agentId: Joi.string().required(),
  events: Joi.array().items(sessionEventRecordSchema).required(),
});

export const projectRecordSchema = Joi.object<Project>({
  id: Joi.string().required(),
  name: Joi.string().required(),
  description: Joi.string().allow('').default(''),
  createdAt: Joi.date().required(),
  updatedAt: Joi.date().required(),
  version: versionSchema,
  isDeleted: Joi.boolean().default(false),
});

export const projectRegistryRecordSchema = Joi.object<{ projects: Project[] }>({
  projects: Joi.array().items(projectRecordSchema).required(),
});

/**
 * Validate data against a schema
 */
export function validate<T>(schema: Joi.Schema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, {
    abortEarly: false,
    stripUnknown: false,
    allowUnknown: false,
  });

  if (error) {
    const details = error.details.map(detail => ({
      field: detail.path.join('.'),
      message: detail.message,
      value: detail.context?.value,
    }));

    const message = `Validation failed: ${details.map(d => `${d.field}: ${d.message}`).join(', ')}`;
    throw new ValidationError(message, details);
  }

  return value;
}

/**
 * Check if an error is a validation error
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
