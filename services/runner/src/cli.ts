import { logger } from '@ecsrun/shared';
import type { LogBackend, OrchestratorBackend } from './backends.js';
import { CloudWatchLogBackend } from './cloudwatch-backend.js';
import { parseCli, USAGE } from './config.js';
import { EcsBackend } from './ecs-backend.js';
import { ORCHESTRATION_FAILURE_EXIT_CODE, RunError } from './errors.js';
import { Runner } from './runner.js';
import { loadTaskDefinition } from './task-definition.js';
import type { EnvLookup } from './types.js';

const log = logger.child({ module: 'cli' });

export interface Backends {
  orchestrator: OrchestratorBackend;
  logs: LogBackend;
}

export interface CliDeps {
  env: Record<string, string | undefined>;
  signal?: AbortSignal;
  createBackends?: (region: string) => Backends;
  /** Container log lines. */
  output?: (line: string) => void;
  /** Help text. */
  print?: (text: string) => void;
}

function awsBackends(region: string): Backends {
  return {
    orchestrator: new EcsBackend({ region }),
    logs: new CloudWatchLogBackend({ region }),
  };
}

/** Runs the CLI and resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const lookupEnv: EnvLookup = (name) => deps.env[name];

  try {
    const command = parseCli(argv, deps.env);
    if (command.kind === 'help') {
      (deps.print ?? console.log)(USAGE);
      return 0;
    }

    const { config } = command;
    const definition = await loadTaskDefinition(config.file, lookupEnv);
    const { orchestrator, logs } = (deps.createBackends ?? awsBackends)(config.region);

    const runner = new Runner({
      orchestrator,
      logs,
      definition,
      cluster: config.cluster,
      logGroup: config.logGroup,
      region: config.region,
      runName: config.runName,
      count: config.count,
      fargate: config.fargate,
      network: { subnets: config.subnets, securityGroups: config.securityGroups },
      overrides: config.overrides,
      environment: config.environment,
      lookupEnv,
      pollIntervalMs: config.pollIntervalMs,
      output: deps.output,
    });

    const result = await runner.run(deps.signal);
    log.info({ runName: runner.runName, exitCode: result.exitCode, phases: runner.phaseTimings }, 'run finished');
    return result.exitCode;
  } catch (err) {
    if (err instanceof RunError) {
      log.fatal({ kind: err.kind, error: err.message }, 'run aborted');
    } else {
      log.fatal({ err }, 'unexpected failure');
    }
    return ORCHESTRATION_FAILURE_EXIT_CODE;
  }
}
