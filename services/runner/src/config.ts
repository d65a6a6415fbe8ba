import { parseArgs } from 'node:util';
import { z } from 'zod';
import { logger } from '@ecsrun/shared';
import { ConfigurationError, errorMessage } from './errors.js';
import { parseOverrideSpec } from './overrides.js';
import { DEFAULT_POLL_INTERVAL_MS } from './log-tailer.js';

const log = logger.child({ module: 'config' });

/** RunTask accepts at most this many tasks per call. */
export const MAX_TASK_COUNT = 10;

export const USAGE = `Usage: ecsrun [options] [command...]

Run a task on ECS and stream its logs until every container has exited.
Trailing arguments override the command of the only container.

Options:
  -n, --name <name>            run name, used as the log stream prefix
  -f, --file <path>            task definition file (default: taskdefinition.json)
  -c, --cluster <name>         ECS cluster (env ECS_CLUSTER, default: default)
      --log-group <name>       CloudWatch log group (env ECS_LOG_GROUP, default: ecs-task-runner)
      --region <region>        AWS region (env AWS_REGION)
      --fargate                use the FARGATE launch type
      --subnet <id>            awsvpc subnet, repeatable
      --security-group <id>    awsvpc security group, repeatable
      --count <n>              number of tasks to start (1-${MAX_TASK_COUNT}, default: 1)
  -o, --override <spec>        "[service:] command args...", repeatable
  -e, --env <KEY[=VALUE]>      environment for overridden containers, repeatable
      --poll-interval <ms>     log poll interval (default: ${DEFAULT_POLL_INTERVAL_MS})
  -h, --help                   show this help

Diagnostics go to stderr; set LOG_LEVEL=debug for more detail.`;

const configSchema = z.object({
  runName: z.string().min(1).optional(),
  file: z.string().min(1),
  cluster: z.string().min(1),
  logGroup: z.string().min(1),
  region: z.string({ required_error: 'region is required (--region or AWS_REGION)' }).min(1, 'region is required (--region or AWS_REGION)'),
  fargate: z.boolean(),
  subnets: z.array(z.string().min(1)),
  securityGroups: z.array(z.string().min(1)),
  count: z.number().int().min(1).max(MAX_TASK_COUNT),
  overrides: z.array(
    z.object({
      service: z.string().min(1).optional(),
      command: z.array(z.string()).min(1),
    }),
  ),
  environment: z.array(z.string().min(1)),
  pollIntervalMs: z.number().int().positive(),
});

export type RunnerConfig = z.infer<typeof configSchema>;

export type CliCommand = { kind: 'help' } | { kind: 'run'; config: RunnerConfig };

type Env = Record<string, string | undefined>;

function parseInteger(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`--${flag} must be an integer, got ${JSON.stringify(value)}`);
  }
  return Number.parseInt(value, 10);
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        name: { type: 'string', short: 'n' },
        file: { type: 'string', short: 'f' },
        cluster: { type: 'string', short: 'c' },
        'log-group': { type: 'string' },
        region: { type: 'string' },
        fargate: { type: 'boolean' },
        subnet: { type: 'string', multiple: true },
        'security-group': { type: 'string', multiple: true },
        count: { type: 'string' },
        override: { type: 'string', short: 'o', multiple: true },
        env: { type: 'string', short: 'e', multiple: true },
        'poll-interval': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new ConfigurationError(errorMessage(err), { cause: err });
  }
}

export function parseCli(argv: string[], env: Env = process.env): CliCommand {
  const { values, positionals } = parseFlags(argv);
  if (values.help) return { kind: 'help' };

  const overrides = (values.override ?? []).map(parseOverrideSpec);
  if (positionals.length > 0) {
    overrides.push({ command: positionals });
  }

  const result = configSchema.safeParse({
    runName: values.name,
    file: values.file ?? 'taskdefinition.json',
    cluster: values.cluster ?? env.ECS_CLUSTER ?? 'default',
    logGroup: values['log-group'] ?? env.ECS_LOG_GROUP ?? 'ecs-task-runner',
    region: values.region ?? env.AWS_REGION,
    fargate: values.fargate ?? false,
    subnets: values.subnet ?? [],
    securityGroups: values['security-group'] ?? [],
    count: parseInteger('count', values.count, 1),
    overrides,
    environment: values.env ?? [],
    pollIntervalMs: parseInteger('poll-interval', values['poll-interval'], DEFAULT_POLL_INTERVAL_MS),
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`invalid configuration: ${issues}`);
  }

  const config = result.data;
  log.debug(
    { cluster: config.cluster, logGroup: config.logGroup, region: config.region, count: config.count },
    'configuration loaded',
  );
  return { kind: 'run', config };
}
