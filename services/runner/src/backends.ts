import type {
  ContainerOverride,
  LogPage,
  TaskDefinitionSpec,
  TaskInstance,
} from './types.js';

export interface NetworkSettings {
  subnets: string[];
  securityGroups: string[];
}

export interface RunTaskRequest {
  cluster: string;
  /** `family:revision` */
  taskDefinition: string;
  count: number;
  fargate: boolean;
  network: NetworkSettings;
  overrides: ContainerOverride[];
}

/** The cluster orchestrator (ECS in production). */
export interface OrchestratorBackend {
  /** Registers the definition and returns its `family:revision` reference. */
  registerTaskDefinition(definition: TaskDefinitionSpec, signal?: AbortSignal): Promise<string>;
  runTask(request: RunTaskRequest, signal?: AbortSignal): Promise<TaskInstance[]>;
  /** Blocks until every listed task is stopped. No timeout beyond `signal`. */
  waitUntilTasksStopped(cluster: string, taskArns: string[], signal?: AbortSignal): Promise<void>;
  describeTasks(cluster: string, taskArns: string[], signal?: AbortSignal): Promise<TaskInstance[]>;
}

/** The log store (CloudWatch Logs in production). */
export interface LogBackend {
  ensureLogGroup(logGroup: string, signal?: AbortSignal): Promise<void>;
  /** Entries after `nextToken` (from the head of the stream when absent). */
  fetchEvents(
    logGroup: string,
    logStream: string,
    nextToken: string | undefined,
    signal?: AbortSignal,
  ): Promise<LogPage>;
  /** Appends one entry, creating the stream first if needed. */
  putEvent(logGroup: string, logStream: string, message: string, signal?: AbortSignal): Promise<void>;
}
