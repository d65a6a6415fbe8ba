import {
  CloudWatchLogsClient,
  CreateLogGroupCommand,
  CreateLogStreamCommand,
  GetLogEventsCommand,
  PutLogEventsCommand,
} from '@aws-sdk/client-cloudwatch-logs';
import { logger } from '@ecsrun/shared';
import type { LogBackend } from './backends.js';
import type { LogEntry, LogPage } from './types.js';

const log = logger.child({ module: 'cloudwatch-backend' });

function hasErrorName(err: unknown, name: string): boolean {
  return err instanceof Error && err.name === name;
}

export interface CloudWatchLogBackendOptions {
  region: string;
}

export class CloudWatchLogBackend implements LogBackend {
  private readonly client: CloudWatchLogsClient;

  constructor(opts: CloudWatchLogBackendOptions) {
    this.client = new CloudWatchLogsClient({ region: opts.region });
  }

  async ensureLogGroup(logGroup: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.client.send(new CreateLogGroupCommand({ logGroupName: logGroup }), { abortSignal: signal });
      log.info({ logGroup }, 'created log group');
    } catch (err) {
      if (!hasErrorName(err, 'ResourceAlreadyExistsException')) throw err;
      log.debug({ logGroup }, 'log group already exists');
    }
  }

  async fetchEvents(
    logGroup: string,
    logStream: string,
    nextToken: string | undefined,
    signal?: AbortSignal,
  ): Promise<LogPage> {
    try {
      const resp = await this.client.send(
        new GetLogEventsCommand({
          logGroupName: logGroup,
          logStreamName: logStream,
          startFromHead: true,
          nextToken,
        }),
        { abortSignal: signal },
      );
      const events: LogEntry[] = [];
      for (const ev of resp.events ?? []) {
        if (ev.message === undefined) continue;
        events.push({ message: ev.message, timestamp: ev.timestamp });
      }
      return { events, nextToken: resp.nextForwardToken ?? nextToken };
    } catch (err) {
      // The awslogs driver creates the stream on the container's first write.
      if (hasErrorName(err, 'ResourceNotFoundException')) {
        return { events: [], nextToken };
      }
      throw err;
    }
  }

  async putEvent(logGroup: string, logStream: string, message: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.client.send(new CreateLogStreamCommand({ logGroupName: logGroup, logStreamName: logStream }), {
        abortSignal: signal,
      });
    } catch (err) {
      if (!hasErrorName(err, 'ResourceAlreadyExistsException')) throw err;
    }

    await this.client.send(
      new PutLogEventsCommand({
        logGroupName: logGroup,
        logStreamName: logStream,
        logEvents: [{ message, timestamp: Date.now() }],
      }),
      { abortSignal: signal },
    );
  }
}
