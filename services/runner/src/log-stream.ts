import type { ContainerInstance, TaskInstance } from './types.js';

/** Trailing `/` segment of an ARN, e.g. the task id of a task ARN. */
export function arnBase(arn: string): string {
  const idx = arn.lastIndexOf('/');
  return idx === -1 ? arn : arn.slice(idx + 1);
}

/**
 * Stream the awslogs driver writes a container to:
 * `<prefix>/<container name>/<task id>`.
 */
export function logStreamName(
  streamPrefix: string,
  container: Pick<ContainerInstance, 'name'>,
  task: Pick<TaskInstance, 'taskArn'>,
): string {
  return `${streamPrefix}/${container.name}/${arnBase(task.taskArn)}`;
}
