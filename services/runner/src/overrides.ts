import { parse, type ParseEntry } from 'shell-quote';
import { logger } from '@ecsrun/shared';
import { ConfigurationError, errorMessage } from './errors.js';
import type { ContainerOverride, EnvLookup, KeyValuePair, OverrideSpec } from './types.js';

const log = logger.child({ module: 'overrides' });

function malformed(raw: string, detail = 'expected "[service:] command..."'): ConfigurationError {
  return new ConfigurationError(`malformed override ${JSON.stringify(raw)}: ${detail}`);
}

/** First quote left open under POSIX rules. shell-quote drops these silently. */
function unclosedQuote(raw: string): string | undefined {
  let quote: string | undefined;
  for (let i = 0; i < raw.length; i++) {
    const c = raw[i];
    if (quote === "'") {
      if (c === "'") quote = undefined;
    } else if (c === '\\') {
      i++;
    } else if (quote === '"') {
      if (c === '"') quote = undefined;
    } else if (c === '"' || c === "'") {
      quote = c;
    }
  }
  return quote;
}

// Variables are left for the container's shell, braced so adjacent text keeps its meaning.
function keepVariable(name: string): string {
  return name === '' ? '$' : `\${${name}}`;
}

/** Split like a POSIX shell: quotes group words, backslashes escape. */
function tokenize(raw: string): string[] {
  const quote = unclosedQuote(raw);
  if (quote) throw malformed(raw, `unterminated ${quote} quote`);

  let entries: ParseEntry[];
  try {
    entries = parse(raw, keepVariable);
  } catch (err) {
    throw malformed(raw, errorMessage(err));
  }

  return entries.map((entry) => {
    if (typeof entry === 'string') return entry;
    // No shell runs the command, so a glob is passed through as typed.
    if ('pattern' in entry) return entry.pattern;
    if ('op' in entry) throw malformed(raw, `quote the shell operator ${JSON.stringify(entry.op)}`);
    throw malformed(raw, 'quote the "#"');
  });
}

/**
 * Parse `[service:] command args...`.
 *
 * The target is whatever precedes the first `:` of the first word, so both
 * `worker: ./migrate up` and `worker:./migrate up` target `worker`. Words
 * follow shell quoting: `worker: sh -c "echo hello"` runs `sh -c 'echo hello'`.
 */
export function parseOverrideSpec(raw: string): OverrideSpec {
  const tokens = tokenize(raw);
  if (tokens.length === 0) throw malformed(raw);

  const [first, ...rest] = tokens;
  const colon = first.indexOf(':');
  if (colon === -1) {
    return { command: tokens };
  }

  const service = first.slice(0, colon);
  const remainder = first.slice(colon + 1);
  const command = remainder ? [remainder, ...rest] : rest;
  if (!service || command.length === 0) throw malformed(raw);
  return { service, command };
}

/**
 * Resolve `KEY=VALUE` and bare `KEY` entries. Only the first `=` splits; bare
 * keys are looked up and must exist. Order is preserved, duplicates are kept.
 */
export function resolveEnvironment(entries: string[], lookup: EnvLookup): KeyValuePair[] {
  return entries.map((entry) => {
    const eq = entry.indexOf('=');
    if (eq !== -1) {
      return { name: entry.slice(0, eq), value: entry.slice(eq + 1) };
    }
    const value = lookup(entry);
    if (value === undefined) {
      throw new ConfigurationError(`missing environment variable ${JSON.stringify(entry)}`);
    }
    return { name: entry, value };
  });
}

/** Container an override applies to; untargeted overrides need a single-container definition. */
export function resolveOverrideTarget(spec: OverrideSpec, containerNames: string[]): string {
  if (spec.service) return spec.service;

  if (containerNames.length !== 1) {
    throw new ConfigurationError(
      `No service provided for override and can't determine default service with ${containerNames.length} container definitions`,
    );
  }
  const [only] = containerNames;
  log.info({ service: only }, 'assuming override applies to the only container');
  return only;
}

/**
 * Build the container overrides to submit. Specs without a command are
 * skipped; every remaining override carries the same resolved environment.
 */
export function resolveOverrides(
  specs: OverrideSpec[],
  containerNames: string[],
  environment: KeyValuePair[],
): ContainerOverride[] {
  const overrides: ContainerOverride[] = [];
  for (const spec of specs) {
    if (spec.command.length === 0) continue;
    overrides.push({
      name: resolveOverrideTarget(spec, containerNames),
      command: [...spec.command],
      environment: environment.map((kv) => ({ ...kv })),
    });
  }

  if (environment.length > 0 && overrides.length === 0) {
    log.warn({ names: environment.map((kv) => kv.name) }, 'environment given without a command override, ignoring it');
  }
  return overrides;
}
