/**
 * Domain types for a single ECS run. The ECS and CloudWatch adapters
 * translate to and from the AWS SDK shapes.
 */

// ---------------------------------------------------------------------------
// Task definition (parsed from the definition file)
// ---------------------------------------------------------------------------

export type NetworkMode = 'bridge' | 'host' | 'awsvpc' | 'none';
export type Compatibility = 'EC2' | 'FARGATE' | 'EXTERNAL';

export interface KeyValuePair {
  name: string;
  value: string;
}

export interface PortMapping {
  containerPort: number;
  hostPort?: number;
  protocol?: 'tcp' | 'udp';
  [field: string]: unknown;
}

export interface LogConfiguration {
  logDriver: 'awslogs';
  options: Record<string, string>;
}

export interface ContainerDefinitionSpec {
  name: string;
  image: string;
  command?: string[];
  entryPoint?: string[];
  environment?: KeyValuePair[];
  essential?: boolean;
  cpu?: number;
  memory?: number;
  memoryReservation?: number;
  workingDirectory?: string;
  portMappings?: PortMapping[];
  logConfiguration?: LogConfiguration;
  /** Any other ECS container definition field, forwarded untouched. */
  [field: string]: unknown;
}

export interface TaskDefinitionSpec {
  family: string;
  taskRoleArn?: string;
  executionRoleArn?: string;
  networkMode?: NetworkMode;
  cpu?: string;
  memory?: string;
  requiresCompatibilities?: Compatibility[];
  containerDefinitions: ContainerDefinitionSpec[];
  /** Any other RegisterTaskDefinition field, forwarded untouched. */
  [field: string]: unknown;
}

// ---------------------------------------------------------------------------
// Overrides
// ---------------------------------------------------------------------------

/** One `--override` as typed by the user, before target resolution. */
export interface OverrideSpec {
  service?: string;
  command: string[];
}

/** A fully resolved per-container override, ready for submission. */
export interface ContainerOverride {
  name: string;
  command: string[];
  environment: KeyValuePair[];
}

export type EnvLookup = (name: string) => string | undefined;

// ---------------------------------------------------------------------------
// Observed runtime state
// ---------------------------------------------------------------------------

export interface ContainerInstance {
  name: string;
  containerArn: string;
  lastStatus?: string;
  exitCode?: number;
  reason?: string;
}

export interface TaskInstance {
  taskArn: string;
  lastStatus?: string;
  containers: ContainerInstance[];
}

// ---------------------------------------------------------------------------
// Logs
// ---------------------------------------------------------------------------

export interface LogEntry {
  message: string;
  timestamp?: number;
}

export interface LogPage {
  events: LogEntry[];
  /** Cursor to pass to the next fetch; unchanged when nothing new arrived. */
  nextToken?: string;
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export interface ContainerResult {
  taskArn: string;
  name: string;
  exitCode: number;
}

export interface RunResult {
  exitCode: number;
  containers: ContainerResult[];
}

/** Wall-clock time spent in one finished run phase. */
export interface PhaseTiming {
  phase: RunState;
  durationMs: number;
}

export type RunState =
  | 'submitting'
  | 'running'
  | 'awaiting-termination'
  | 'finalizing'
  | 'done'
  | 'failed';
