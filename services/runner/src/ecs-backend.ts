import {
  ECSClient,
  DescribeTasksCommand,
  RegisterTaskDefinitionCommand,
  RunTaskCommand,
  type Container,
  type Failure,
  type RunTaskCommandInput,
  type Task,
} from '@aws-sdk/client-ecs';
import { logger, sleep } from '@ecsrun/shared';
import type { OrchestratorBackend, RunTaskRequest } from './backends.js';
import { STOPPED } from './finish-marker.js';
import type { ContainerInstance, TaskDefinitionSpec, TaskInstance } from './types.js';

const log = logger.child({ module: 'ecs-backend' });

/** Same cadence as the SDK's own tasks-stopped waiter. */
export const DEFAULT_STOPPED_POLL_INTERVAL_MS = 6000;

export interface EcsBackendOptions {
  region: string;
  stoppedPollIntervalMs?: number;
}

function formatFailures(failures: Failure[]): string {
  return failures.map((f) => `${f.arn ?? 'unknown'} (${f.reason ?? 'no reason'}${f.detail ? `: ${f.detail}` : ''})`).join(', ');
}

function toContainerInstance(container: Container): ContainerInstance {
  if (!container.name || !container.containerArn) {
    throw new Error('ECS returned a container without a name or ARN');
  }
  return {
    name: container.name,
    containerArn: container.containerArn,
    lastStatus: container.lastStatus,
    exitCode: container.exitCode,
    reason: container.reason,
  };
}

function toTaskInstance(task: Task): TaskInstance {
  if (!task.taskArn) {
    throw new Error('ECS returned a task without an ARN');
  }
  return {
    taskArn: task.taskArn,
    lastStatus: task.lastStatus,
    containers: (task.containers ?? []).map(toContainerInstance),
  };
}

export class EcsBackend implements OrchestratorBackend {
  private readonly client: ECSClient;
  private readonly stoppedPollIntervalMs: number;

  constructor(opts: EcsBackendOptions) {
    this.client = new ECSClient({ region: opts.region });
    this.stoppedPollIntervalMs = opts.stoppedPollIntervalMs ?? DEFAULT_STOPPED_POLL_INTERVAL_MS;
  }

  async registerTaskDefinition(definition: TaskDefinitionSpec, signal?: AbortSignal): Promise<string> {
    // Sent whole: the SDK serializes only fields RegisterTaskDefinition knows.
    const resp = await this.client.send(new RegisterTaskDefinitionCommand(definition), { abortSignal: signal });

    const registered = resp.taskDefinition;
    if (!registered?.family || registered.revision === undefined) {
      throw new Error(`RegisterTaskDefinition returned no revision for ${definition.family}`);
    }
    const ref = `${registered.family}:${registered.revision}`;
    log.debug({ taskDefinition: ref }, 'task definition registered');
    return ref;
  }

  async runTask(request: RunTaskRequest, signal?: AbortSignal): Promise<TaskInstance[]> {
    const input: RunTaskCommandInput = {
      taskDefinition: request.taskDefinition,
      cluster: request.cluster,
      count: request.count,
      overrides: {
        containerOverrides: request.overrides.map((o) => ({
          name: o.name,
          command: o.command,
          environment: o.environment,
        })),
      },
    };
    if (request.fargate) {
      input.launchType = 'FARGATE';
    }
    const { subnets, securityGroups } = request.network;
    if (subnets.length > 0 || securityGroups.length > 0) {
      input.networkConfiguration = {
        awsvpcConfiguration: {
          subnets,
          securityGroups,
          assignPublicIp: 'ENABLED',
        },
      };
    }

    const resp = await this.client.send(new RunTaskCommand(input), { abortSignal: signal });
    const failures = resp.failures ?? [];
    if (failures.length > 0) {
      throw new Error(`Unable to run task: ${formatFailures(failures)}`);
    }
    return (resp.tasks ?? []).map(toTaskInstance);
  }

  async describeTasks(cluster: string, taskArns: string[], signal?: AbortSignal): Promise<TaskInstance[]> {
    const resp = await this.client.send(new DescribeTasksCommand({ cluster, tasks: taskArns }), {
      abortSignal: signal,
    });
    const failures = resp.failures ?? [];
    if (failures.length > 0) {
      throw new Error(`Unable to describe tasks: ${formatFailures(failures)}`);
    }
    return (resp.tasks ?? []).map(toTaskInstance);
  }

  async waitUntilTasksStopped(cluster: string, taskArns: string[], signal?: AbortSignal): Promise<void> {
    for (;;) {
      const tasks = await this.describeTasks(cluster, taskArns, signal);
      const pending = tasks.filter((t) => t.lastStatus !== STOPPED).map((t) => t.taskArn);
      if (pending.length === 0) return;
      log.debug({ pending }, 'tasks not stopped yet');
      await sleep(this.stoppedPollIntervalMs, signal);
    }
  }
}
