import { logger } from '@ecsrun/shared';
import type { LogBackend } from './backends.js';
import { FinalizationError } from './errors.js';
import { arnBase } from './log-stream.js';
import type { ContainerInstance, LogEntry } from './types.js';

const log = logger.child({ module: 'finish-marker' });

export const STOPPED = 'STOPPED';

// The tailer and the writer share this text; change both together.
export function finishMarkerPrefix(containerArn: string): string {
  return `Container ${arnBase(containerArn)} exited with`;
}

export function finishMarkerMessage(containerArn: string, exitCode: number): string {
  return `${finishMarkerPrefix(containerArn)} ${exitCode}`;
}

/** True when `entry` is the finish marker for the given container. */
export function isFinishMarker(containerArn: string, entry: LogEntry): boolean {
  return entry.message.startsWith(finishMarkerPrefix(containerArn));
}

/**
 * Exit code of a stopped container. A container stopped without one (killed
 * before it started, OOM during pull, ...) fails with its stop reason verbatim.
 */
export function requireExitCode(container: ContainerInstance): number {
  if (container.lastStatus !== STOPPED) {
    throw new FinalizationError(
      `expected container ${container.name} to be ${STOPPED}, got ${container.lastStatus ?? 'unknown'}`,
    );
  }
  if (container.exitCode === undefined) {
    throw new FinalizationError(container.reason ?? `container ${container.name} stopped without an exit code`);
  }
  return container.exitCode;
}

export interface FinishMarkerTarget {
  logGroup: string;
  logStream: string;
}

/** Appends `Container <id> exited with <code>` to the container's own stream. */
export async function writeContainerFinishedMessage(
  logs: LogBackend,
  target: FinishMarkerTarget,
  container: ContainerInstance,
  signal?: AbortSignal,
): Promise<void> {
  const exitCode = requireExitCode(container);
  const message = finishMarkerMessage(container.containerArn, exitCode);
  await logs.putEvent(target.logGroup, target.logStream, message, signal);
  log.debug({ logStream: target.logStream, container: container.name, exitCode }, 'finish marker written');
}
