/**
 * Task definition file loader.
 *
 * The file is JSON in the shape of ECS `RegisterTaskDefinition` input. Every
 * string value may reference the host environment as `$NAME` or `${NAME}`;
 * `$$` is a literal `$`. Unset variables expand to the empty string.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from '@ecsrun/shared';
import { ConfigurationError, errorMessage } from './errors.js';
import type { EnvLookup, TaskDefinitionSpec } from './types.js';

const log = logger.child({ module: 'task-definition' });

// ---------------------------------------------------------------------------
// Schema. Fields not listed here (secrets, volumes, mountPoints, ...) are kept
// as given and left for ECS to validate.
// ---------------------------------------------------------------------------

const keyValueSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
});

const portMappingSchema = z.object({
  containerPort: z.number().int().positive(),
  hostPort: z.number().int().nonnegative().optional(),
  protocol: z.enum(['tcp', 'udp']).optional(),
}).passthrough();

const containerDefinitionSchema = z.object({
  name: z.string().min(1),
  image: z.string().min(1),
  command: z.array(z.string()).optional(),
  entryPoint: z.array(z.string()).optional(),
  environment: z.array(keyValueSchema).optional(),
  essential: z.boolean().optional(),
  cpu: z.number().int().nonnegative().optional(),
  memory: z.number().int().positive().optional(),
  memoryReservation: z.number().int().positive().optional(),
  workingDirectory: z.string().optional(),
  portMappings: z.array(portMappingSchema).optional(),
}).passthrough();

export const taskDefinitionSchema = z.object({
  family: z.string().min(1),
  taskRoleArn: z.string().optional(),
  executionRoleArn: z.string().optional(),
  networkMode: z.enum(['bridge', 'host', 'awsvpc', 'none']).optional(),
  cpu: z.string().optional(),
  memory: z.string().optional(),
  requiresCompatibilities: z.array(z.enum(['EC2', 'FARGATE', 'EXTERNAL'])).optional(),
  containerDefinitions: z.array(containerDefinitionSchema).min(1, 'at least one container definition is required'),
}).passthrough();

// ---------------------------------------------------------------------------
// Interpolation
// ---------------------------------------------------------------------------

const VAR_PATTERN = /\$(\$|\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export function interpolate(value: string, lookup: EnvLookup): string {
  return value.replace(VAR_PATTERN, (match: string, escaped: string, braced?: string, bare?: string) => {
    if (escaped === '$') return '$';
    const name = braced ?? bare;
    if (!name) return match;
    const resolved = lookup(name);
    if (resolved === undefined) {
      log.warn({ variable: name }, 'task definition references an unset variable, using empty string');
      return '';
    }
    return resolved;
  });
}

/** Interpolate every string leaf of a parsed JSON value. Keys are left alone. */
export function interpolateDeep(value: unknown, lookup: EnvLookup): unknown {
  if (typeof value === 'string') return interpolate(value, lookup);
  if (Array.isArray(value)) return value.map((item) => interpolateDeep(item, lookup));
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = interpolateDeep(item, lookup);
    }
    return out;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function parseTaskDefinition(source: string, lookup: EnvLookup, origin = 'task definition'): TaskDefinitionSpec {
  let raw: unknown;
  try {
    raw = JSON.parse(source);
  } catch (err) {
    throw new ConfigurationError(`${origin}: invalid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const result = taskDefinitionSchema.safeParse(interpolateDeep(raw, lookup));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`${origin}: ${issues}`);
  }
  return result.data;
}

export async function loadTaskDefinition(path: string, lookup: EnvLookup): Promise<TaskDefinitionSpec> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`unable to read task definition ${path}: ${errorMessage(err)}`, { cause: err });
  }
  const definition = parseTaskDefinition(source, lookup, path);
  log.info(
    { path, family: definition.family, containers: definition.containerDefinitions.map((c) => c.name) },
    'task definition loaded',
  );
  return definition;
}
