import type { LogBackend, OrchestratorBackend, RunTaskRequest } from '../backends.js';
import type { LogEntry, LogPage, TaskDefinitionSpec, TaskInstance } from '../types.js';

// ---------------------------------------------------------------------------
// In-memory log store. Cursors are stringified offsets into a stream.
// ---------------------------------------------------------------------------

export class FakeLogBackend implements LogBackend {
  readonly groups = new Set<string>();
  readonly streams = new Map<string, LogEntry[]>();
  readonly fetchCounts = new Map<string, number>();
  /** Streams whose fetches reject. */
  readonly failingStreams = new Set<string>();

  append(logStream: string, ...messages: string[]): void {
    const entries = this.streams.get(logStream) ?? [];
    for (const message of messages) entries.push({ message });
    this.streams.set(logStream, entries);
  }

  messages(logStream: string): string[] {
    return (this.streams.get(logStream) ?? []).map((e) => e.message);
  }

  async ensureLogGroup(logGroup: string, _signal?: AbortSignal): Promise<void> {
    this.groups.add(logGroup);
  }

  async fetchEvents(_logGroup: string, logStream: string, nextToken: string | undefined): Promise<LogPage> {
    this.fetchCounts.set(logStream, (this.fetchCounts.get(logStream) ?? 0) + 1);
    if (this.failingStreams.has(logStream)) {
      throw new Error(`throttled reading ${logStream}`);
    }
    const entries = this.streams.get(logStream) ?? [];
    const offset = nextToken === undefined ? 0 : Number(nextToken);
    return { events: entries.slice(offset), nextToken: String(entries.length) };
  }

  async putEvent(_logGroup: string, logStream: string, message: string): Promise<void> {
    this.append(logStream, message);
  }
}

// ---------------------------------------------------------------------------
// Scripted orchestrator
// ---------------------------------------------------------------------------

export interface FakeOrchestratorOptions {
  /** Final state reported by describeTasks once the tasks have stopped. */
  finalTasks: TaskInstance[];
  /** Runs inside waitUntilTasksStopped, before it resolves. */
  whileRunning?: (signal?: AbortSignal) => Promise<void>;
}

export class FakeOrchestrator implements OrchestratorBackend {
  readonly registered: TaskDefinitionSpec[] = [];
  readonly runRequests: RunTaskRequest[] = [];
  readonly calls: string[] = [];
  private readonly opts: FakeOrchestratorOptions;

  constructor(opts: FakeOrchestratorOptions) {
    this.opts = opts;
  }

  async registerTaskDefinition(definition: TaskDefinitionSpec): Promise<string> {
    this.calls.push('register');
    this.registered.push(definition);
    return `${definition.family}:7`;
  }

  async runTask(request: RunTaskRequest): Promise<TaskInstance[]> {
    this.calls.push('run');
    this.runRequests.push(request);
    return this.opts.finalTasks.map((task) => ({
      taskArn: task.taskArn,
      lastStatus: 'PROVISIONING',
      containers: task.containers.map((c) => ({
        name: c.name,
        containerArn: c.containerArn,
        lastStatus: 'PENDING',
      })),
    }));
  }

  async waitUntilTasksStopped(_cluster: string, _taskArns: string[], signal?: AbortSignal): Promise<void> {
    this.calls.push('wait');
    await this.opts.whileRunning?.(signal);
  }

  async describeTasks(): Promise<TaskInstance[]> {
    this.calls.push('describe');
    return this.opts.finalTasks;
  }
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

const CLUSTER_ARN = 'arn:aws:ecs:us-east-1:123456789012';

export function taskArn(id: string): string {
  return `${CLUSTER_ARN}:task/test-cluster/${id}`;
}

export function containerArn(id: string): string {
  return `${CLUSTER_ARN}:container/test-cluster/${id}`;
}

export function stoppedTask(
  id: string,
  containers: Array<{ name: string; id: string; exitCode?: number; reason?: string }>,
): TaskInstance {
  return {
    taskArn: taskArn(id),
    lastStatus: 'STOPPED',
    containers: containers.map((c) => ({
      name: c.name,
      containerArn: containerArn(c.id),
      lastStatus: 'STOPPED',
      exitCode: c.exitCode,
      reason: c.reason,
    })),
  };
}

export function definition(...names: string[]): TaskDefinitionSpec {
  return {
    family: 'nightly-report',
    containerDefinitions: names.map((name) => ({ name, image: `example/${name}:latest` })),
  };
}

/** Rejects like an aborted SDK call once `signal` aborts. */
export function untilAborted(signal?: AbortSignal): Promise<void> {
  return new Promise((_resolve, reject) => {
    const fail = () => {
      const err = new Error('Request aborted');
      err.name = 'AbortError';
      reject(err);
    };
    if (signal?.aborted) return fail();
    signal?.addEventListener('abort', fail, { once: true });
  });
}
