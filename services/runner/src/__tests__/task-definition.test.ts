import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('@ecsrun/shared', () => ({
  logger: {
    child: () => ({
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    }),
  },
}));

import { interpolate, loadTaskDefinition, parseTaskDefinition } from '../task-definition.js';
import { ConfigurationError } from '../errors.js';

const env: Record<string, string> = { IMAGE_TAG: 'v1.4.2', REGION: 'eu-west-1' };
const lookup = (name: string) => env[name];

describe('interpolate', () => {
  it('expands $NAME and ${NAME}', () => {
    expect(interpolate('app:$IMAGE_TAG', lookup)).toBe('app:v1.4.2');
    expect(interpolate('${REGION}-bucket', lookup)).toBe('eu-west-1-bucket');
  });

  it('turns $$ into a literal dollar', () => {
    expect(interpolate('cost: $$5', lookup)).toBe('cost: $5');
  });

  it('expands unset variables to the empty string', () => {
    expect(interpolate('[${MISSING}]', lookup)).toBe('[]');
  });

  it('leaves a lone dollar alone', () => {
    expect(interpolate('price $ 5', lookup)).toBe('price $ 5');
  });
});

describe('parseTaskDefinition', () => {
  it('parses and interpolates string values', () => {
    const source = JSON.stringify({
      family: 'nightly-report',
      containerDefinitions: [
        {
          name: 'app',
          image: 'example/app:${IMAGE_TAG}',
          memory: 256,
          environment: [{ name: 'AWS_REGION', value: '$REGION' }],
        },
      ],
    });

    expect(parseTaskDefinition(source, lookup)).toEqual({
      family: 'nightly-report',
      containerDefinitions: [
        {
          name: 'app',
          image: 'example/app:v1.4.2',
          memory: 256,
          environment: [{ name: 'AWS_REGION', value: 'eu-west-1' }],
        },
      ],
    });
  });

  it('keeps ECS fields it does not validate, interpolated like the rest', () => {
    const source = JSON.stringify({
      family: 'nightly-report',
      volumes: [{ name: 'scratch', host: { sourcePath: '/mnt/$REGION' } }],
      containerDefinitions: [
        {
          name: 'app',
          image: 'busybox',
          secrets: [{ name: 'DB_PASSWORD', valueFrom: 'arn:aws:ssm:${REGION}:123456789012:parameter/db' }],
          mountPoints: [{ sourceVolume: 'scratch', containerPath: '/scratch' }],
          portMappings: [{ containerPort: 8080, name: 'http', appProtocol: 'http' }],
        },
      ],
    });

    const def = parseTaskDefinition(source, lookup);

    expect(def.volumes).toEqual([{ name: 'scratch', host: { sourcePath: '/mnt/eu-west-1' } }]);
    expect(def.containerDefinitions[0]).toEqual({
      name: 'app',
      image: 'busybox',
      secrets: [{ name: 'DB_PASSWORD', valueFrom: 'arn:aws:ssm:eu-west-1:123456789012:parameter/db' }],
      mountPoints: [{ sourceVolume: 'scratch', containerPath: '/scratch' }],
      portMappings: [{ containerPort: 8080, name: 'http', appProtocol: 'http' }],
    });
  });

  it('rejects invalid JSON', () => {
    expect(() => parseTaskDefinition('{ family: ', lookup)).toThrow(/^task definition: invalid JSON/);
  });

  it('names the offending path', () => {
    const source = JSON.stringify({ family: 'x', containerDefinitions: [{ name: 'app' }] });
    expect(() => parseTaskDefinition(source, lookup)).toThrow('containerDefinitions.0.image');
  });

  it('requires at least one container', () => {
    const source = JSON.stringify({ family: 'x', containerDefinitions: [] });
    expect(() => parseTaskDefinition(source, lookup)).toThrow('at least one container definition is required');
  });

  it('rejects an unknown network mode', () => {
    const source = JSON.stringify({
      family: 'x',
      networkMode: 'overlay',
      containerDefinitions: [{ name: 'app', image: 'busybox' }],
    });
    expect(() => parseTaskDefinition(source, lookup)).toThrow(ConfigurationError);
  });
});

describe('loadTaskDefinition', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ecsrun-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the file from disk', async () => {
    const path = join(dir, 'taskdefinition.json');
    await writeFile(
      path,
      JSON.stringify({ family: 'nightly-report', containerDefinitions: [{ name: 'app', image: 'busybox' }] }),
    );

    const def = await loadTaskDefinition(path, lookup);
    expect(def.family).toBe('nightly-report');
    expect(def.containerDefinitions.map((c) => c.name)).toEqual(['app']);
  });

  it('reports a missing file as a configuration error', async () => {
    await expect(loadTaskDefinition(join(dir, 'nope.json'), lookup)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('prefixes validation errors with the file path', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, JSON.stringify({ containerDefinitions: [{ name: 'app', image: 'busybox' }] }));

    await expect(loadTaskDefinition(path, lookup)).rejects.toThrow(`${path}: family: Required`);
  });
});
