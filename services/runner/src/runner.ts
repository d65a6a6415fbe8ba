import { randomUUID } from 'node:crypto';
import { logger, withSpan, isAbortError } from '@ecsrun/shared';
import type { LogBackend, NetworkSettings, OrchestratorBackend } from './backends.js';
import {
  CancelledError,
  FinalizationError,
  RunError,
  SubmissionError,
  TerminationError,
  errorMessage,
} from './errors.js';
import { isFinishMarker, requireExitCode, writeContainerFinishedMessage } from './finish-marker.js';
import { logStreamName } from './log-stream.js';
import { LogTailer, type ShouldContinue, type TailOutcome } from './log-tailer.js';
import { resolveEnvironment, resolveOverrides } from './overrides.js';
import { RunStateMachine } from './state-machine.js';
import type {
  ContainerInstance,
  ContainerResult,
  EnvLookup,
  OverrideSpec,
  PhaseTiming,
  RunResult,
  RunState,
  TaskDefinitionSpec,
  TaskInstance,
} from './types.js';

const log = logger.child({ module: 'runner' });

export interface RunnerOptions {
  orchestrator: OrchestratorBackend;
  logs: LogBackend;
  definition: TaskDefinitionSpec;
  cluster: string;
  logGroup: string;
  region: string;
  /** Stream prefix for this run; generated when absent. */
  runName?: string;
  count?: number;
  fargate?: boolean;
  network?: NetworkSettings;
  overrides?: OverrideSpec[];
  /** `KEY=VALUE` or bare `KEY` entries, resolved through `lookupEnv`. */
  environment?: string[];
  lookupEnv?: EnvLookup;
  pollIntervalMs?: number;
  drainMs?: number;
  /** Receives every container log line. */
  output?: (line: string) => void;
}

export function generateRunName(): string {
  return `run-task-${randomUUID().slice(0, 8)}`;
}

/** First non-zero exit code in enumeration order, else 0. */
export function aggregateExitCode(codes: number[]): number {
  return codes.find((code) => code !== 0) ?? 0;
}

type ErrorWrapper = (message: string, cause: unknown) => RunError;

/**
 * Drives one run end to end: submit, tail every container, wait for the
 * tasks to stop, write finish markers, join the tailers, report the result.
 */
export class Runner {
  readonly runName: string;
  readonly state = new RunStateMachine();
  /** Finished phases in order, filled as the state machine advances. */
  readonly phaseTimings: PhaseTiming[] = [];
  private readonly opts: RunnerOptions;
  private readonly output: (line: string) => void;
  private phaseStartedAt = Date.now();

  constructor(opts: RunnerOptions) {
    this.opts = opts;
    this.runName = opts.runName || generateRunName();
    this.output = opts.output ?? ((line) => process.stdout.write(`${line}\n`));
    this.state.on('transition', (to: RunState, from: RunState) => this.recordPhase(from, to));
  }

  async run(signal?: AbortSignal): Promise<RunResult> {
    // Aborted by the caller, or by us on a fatal error so tailers stop.
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) controller.abort(signal.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    this.phaseStartedAt = Date.now();
    const attrs = { 'run.name': this.runName, 'run.cluster': this.opts.cluster };
    try {
      return await withSpan('run', attrs, () => this.execute(controller.signal, signal));
    } catch (err) {
      controller.abort();
      if (!this.state.isTerminal) this.state.transition('failed');
      log.error({ runName: this.runName, error: errorMessage(err) }, 'run failed');
      throw err;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async execute(runSignal: AbortSignal, callerSignal?: AbortSignal): Promise<RunResult> {
    const { orchestrator, logs, cluster, logGroup } = this.opts;

    // -- submitting ---------------------------------------------------------
    const tasks = await this.phase('run.submit', callerSignal, (m, c) => new SubmissionError(m, { cause: c }), () =>
      this.submit(runSignal),
    );
    this.state.transition('running');

    // -- running: one tailer per container, joined later ----------------------
    const tailers = new Map<string, LogTailer>();
    const joins: Promise<TailOutcome>[] = [];
    for (const task of tasks) {
      for (const container of task.containers) {
        const tailer = new LogTailer({
          logs,
          logGroup,
          logStream: logStreamName(this.runName, container, task),
          shouldContinue: this.printer(container),
          pollIntervalMs: this.opts.pollIntervalMs,
          drainMs: this.opts.drainMs,
        });
        tailers.set(container.containerArn, tailer);
        log.debug({ logStream: tailer.logStream }, 'tailing container logs');
        joins.push(
          tailer.watch(runSignal).catch((err: unknown): TailOutcome => {
            log.error({ logStream: tailer.logStream, error: errorMessage(err) }, 'log tailer returned error');
            return 'failed';
          }),
        );
      }
    }

    // -- awaiting-termination -------------------------------------------------
    this.state.transition('awaiting-termination');
    const taskArns = tasks.map((t) => t.taskArn);
    for (const taskArn of taskArns) {
      log.info({ taskArn }, 'waiting until task has stopped');
    }
    await this.phase('run.await-termination', callerSignal, (m, c) => new TerminationError(m, { cause: c }), () =>
      orchestrator.waitUntilTasksStopped(cluster, taskArns, runSignal),
    );
    log.info('all tasks have stopped');

    // -- finalizing -----------------------------------------------------------
    this.state.transition('finalizing');
    const finalTasks = await this.phase('run.finalize', callerSignal, (m, c) => new FinalizationError(m, { cause: c }), () =>
      this.finalize(taskArns, tailers, runSignal),
    );

    log.info('waiting for logs to finish');
    const outcomes = await Promise.all(joins);
    log.debug({ outcomes }, 'all tailers stopped');

    // -- done -----------------------------------------------------------------
    const containers: ContainerResult[] = [];
    for (const task of finalTasks) {
      for (const container of task.containers) {
        containers.push({ taskArn: task.taskArn, name: container.name, exitCode: requireExitCode(container) });
      }
    }
    const exitCode = aggregateExitCode(containers.map((c) => c.exitCode));
    const failed = containers.find((c) => c.exitCode !== 0);
    if (failed) {
      log.warn({ container: failed.name, exitCode: failed.exitCode }, 'container exited with non-zero code');
    }
    this.state.transition('done');
    return { exitCode, containers };
  }

  private async submit(signal: AbortSignal): Promise<TaskInstance[]> {
    const { orchestrator, logs, definition, cluster, logGroup, region } = this.opts;

    // Configuration problems surface before anything is created remotely.
    const environment = resolveEnvironment(this.opts.environment ?? [], this.opts.lookupEnv ?? lookupProcessEnv);
    const containerNames = definition.containerDefinitions.map((c) => c.name);
    const overrides = resolveOverrides(this.opts.overrides ?? [], containerNames, environment);

    await logs.ensureLogGroup(logGroup, signal);

    log.info({ logGroup, streamPrefix: this.runName }, 'setting tasks to use log group');
    const withLogs: TaskDefinitionSpec = {
      ...definition,
      containerDefinitions: definition.containerDefinitions.map((def) => ({
        ...def,
        logConfiguration: {
          logDriver: 'awslogs',
          options: {
            'awslogs-group': logGroup,
            'awslogs-region': region,
            'awslogs-stream-prefix': this.runName,
          },
        },
      })),
    };

    log.info({ family: definition.family }, 'registering task definition');
    const taskDefinition = await orchestrator.registerTaskDefinition(withLogs, signal);

    log.info({ taskDefinition, cluster }, 'running task');
    const tasks = await orchestrator.runTask(
      {
        cluster,
        taskDefinition,
        count: this.opts.count ?? 1,
        fargate: this.opts.fargate ?? false,
        network: this.opts.network ?? { subnets: [], securityGroups: [] },
        overrides,
      },
      signal,
    );
    if (tasks.length === 0) {
      throw new SubmissionError(`Unable to run task: no tasks were started for ${taskDefinition}`);
    }
    return tasks;
  }

  private async finalize(
    taskArns: string[],
    tailers: Map<string, LogTailer>,
    signal: AbortSignal,
  ): Promise<TaskInstance[]> {
    const { orchestrator, logs, cluster, logGroup } = this.opts;
    const finalTasks = await orchestrator.describeTasks(cluster, taskArns, signal);

    for (const task of finalTasks) {
      for (const container of task.containers) {
        const logStream = logStreamName(this.runName, container, task);
        await writeContainerFinishedMessage(logs, { logGroup, logStream }, container, signal);
        tailers.get(container.containerArn)?.complete();
      }
    }
    return finalTasks;
  }

  private recordPhase(from: RunState, to: RunState): void {
    const now = Date.now();
    const durationMs = now - this.phaseStartedAt;
    this.phaseStartedAt = now;
    this.phaseTimings.push({ phase: from, durationMs });
    log.info({ runName: this.runName, from, to, durationMs }, 'phase finished');
  }

  /** Prints every entry up to, not including, this container's finish marker. */
  private printer(container: ContainerInstance): ShouldContinue {
    return (entry) => {
      if (isFinishMarker(container.containerArn, entry)) return false;
      this.output(entry.message);
      return true;
    };
  }

  private async phase<T>(
    name: string,
    callerSignal: AbortSignal | undefined,
    wrap: ErrorWrapper,
    fn: () => Promise<T>,
  ): Promise<T> {
    return withSpan(name, { 'run.name': this.runName }, async () => {
      try {
        return await fn();
      } catch (err) {
        if (err instanceof RunError) throw err;
        if (callerSignal?.aborted || isAbortError(err)) {
          throw new CancelledError('run cancelled', { cause: err });
        }
        throw wrap(errorMessage(err), err);
      }
    });
  }
}

function lookupProcessEnv(name: string): string | undefined {
  return process.env[name];
}
