/**
 * Run configuration: defaults, overridden by environment variables,
 * overridden by command-line flags.
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import { parseAddress } from '@table-swarm/player-sdk';

export const SCENARIOS = ['play', 'register', 'flood'] as const;
export type Scenario = (typeof SCENARIOS)[number];

export const POLICIES = ['all-in', 'fold'] as const;
export type PolicyName = (typeof POLICIES)[number];

const intSetting = (min: number) => z.coerce.number().int().min(min);

const AddressSchema = z.string().superRefine((value, ctx) => {
  try {
    parseAddress(value);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
  }
});

function isHttpUrl(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    return false;
  }
}

const HttpUrlSchema = z.string().refine(isHttpUrl, { message: 'must be an http(s) URL' });

export const RunConfigSchema = z.object({
  scenario: z.enum(SCENARIOS),
  address: AddressSchema,
  url: HttpUrlSchema,
  sessions: intSetting(1),
  concurrency: intSetting(1),
  firstId: intSetting(0),
  usernamePrefix: z.string().min(1).max(64),
  passwordPrefix: z.string().min(1).max(64),
  policy: z.enum(POLICIES),
  connectTimeoutMs: intSetting(1),
  ioTimeoutMs: intSetting(1),
  activityTimeoutMs: intSetting(1),
  workers: intSetting(1),
  durationMs: intSetting(1),
  requestTimeoutMs: intSetting(1),
  retryDelayMs: intSetting(0),
  progressEvery: intSetting(0),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

export const DEFAULTS: RunConfig = {
  scenario: 'play',
  address: '127.0.0.1:8083',
  url: 'http://127.0.0.1:8082/health',
  sessions: 100,
  concurrency: 100,
  firstId: 0,
  usernamePrefix: 'swarm-',
  passwordPrefix: 'password',
  policy: 'all-in',
  connectTimeoutMs: 10_000,
  ioTimeoutMs: 10_000,
  activityTimeoutMs: 60_000,
  workers: 50,
  durationMs: 30_000,
  requestTimeoutMs: 10_000,
  retryDelayMs: 50,
  progressEvery: 100,
};

type SettingKey = Exclude<keyof RunConfig, 'scenario'>;

interface SettingSource {
  env: string;
  flag: string;
  help: string;
}

export const SETTINGS: Record<SettingKey, SettingSource> = {
  address: { env: 'TARGET_ADDRESS', flag: 'address', help: 'Game server host:port' },
  url: { env: 'FLOOD_URL', flag: 'url', help: 'URL requested by flood workers' },
  sessions: { env: 'SESSIONS', flag: 'sessions', help: 'Player sessions to launch' },
  concurrency: { env: 'MAX_CONCURRENCY', flag: 'concurrency', help: 'Sessions active at once' },
  firstId: { env: 'FIRST_SESSION_ID', flag: 'first-id', help: 'Id of the first session' },
  usernamePrefix: { env: 'USERNAME_PREFIX', flag: 'username-prefix', help: 'Username is prefix + id' },
  passwordPrefix: { env: 'PASSWORD_PREFIX', flag: 'password-prefix', help: 'Password is prefix + id' },
  policy: { env: 'POLICY', flag: 'policy', help: 'Betting policy: all-in | fold' },
  connectTimeoutMs: { env: 'CONNECT_TIMEOUT_MS', flag: 'connect-timeout', help: 'TCP connect timeout (ms)' },
  ioTimeoutMs: { env: 'IO_TIMEOUT_MS', flag: 'io-timeout', help: 'Single read/write timeout (ms)' },
  activityTimeoutMs: { env: 'ACTIVITY_TIMEOUT_MS', flag: 'activity-timeout', help: 'Game phase limit (ms)' },
  workers: { env: 'FLOOD_WORKERS', flag: 'workers', help: 'Flood workers' },
  durationMs: { env: 'FLOOD_DURATION_MS', flag: 'duration', help: 'Flood duration (ms)' },
  requestTimeoutMs: { env: 'REQUEST_TIMEOUT_MS', flag: 'request-timeout', help: 'Flood request timeout (ms)' },
  retryDelayMs: { env: 'RETRY_DELAY_MS', flag: 'retry-delay', help: 'Pause after a failed request (ms)' },
  progressEvery: { env: 'PROGRESS_EVERY', flag: 'progress-every', help: 'Log every N launches (0 disables)' },
};

function isSettingKey(key: unknown): key is SettingKey {
  return typeof key === 'string' && key !== 'scenario' && Object.prototype.hasOwnProperty.call(SETTINGS, key);
}

const SETTING_KEYS: SettingKey[] = Object.keys(SETTINGS).filter(isSettingKey);

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export type LoadConfigResult = { help: true } | { help: false; config: RunConfig };

export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): LoadConfigResult {
  const options: Record<string, { type: 'string' } | { type: 'boolean'; short: string }> = {
    help: { type: 'boolean', short: 'h' },
  };
  for (const key of SETTING_KEYS) {
    options[SETTINGS[key].flag] = { type: 'string' };
  }

  let values: Record<string, unknown>;
  let positionals: string[];
  try {
    const parsed = parseArgs({
      args: argv.filter((a) => a !== '--'),
      options,
      allowPositionals: true,
      strict: true,
    });
    values = parsed.values;
    positionals = parsed.positionals;
  } catch (err) {
    throw new ConfigError([err instanceof Error ? err.message : String(err)]);
  }

  if (values['help'] === true) {
    return { help: true };
  }
  if (positionals.length > 1) {
    throw new ConfigError([`Expected at most one scenario, got: ${positionals.join(' ')}`]);
  }

  const raw: Record<string, unknown> = { scenario: positionals[0] ?? DEFAULTS.scenario };
  for (const key of SETTING_KEYS) {
    const fromFlag = values[SETTINGS[key].flag];
    const fromEnv = env[SETTINGS[key].env];
    raw[key] =
      typeof fromFlag === 'string'
        ? fromFlag
        : fromEnv !== undefined && fromEnv.trim() !== ''
          ? fromEnv.trim()
          : DEFAULTS[key];
  }

  const result = RunConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const key = issue.path[0];
        const source = isSettingKey(key) ? SETTINGS[key] : undefined;
        const label = source ? `--${source.flag} (${source.env})` : String(key ?? 'config');
        return `${label}: ${issue.message}`;
      }),
    );
  }
  return { help: false, config: result.data };
}

export function usage(): string {
  const width = Math.max(...SETTING_KEYS.map((k) => SETTINGS[k].flag.length)) + 2;
  const lines = SETTING_KEYS.map((key) => {
    const s = SETTINGS[key];
    return `  --${s.flag.padEnd(width)}${s.help} (env: ${s.env}) [default: ${String(DEFAULTS[key])}]`;
  });
  return [
    'table-swarm: load harness for a line-delimited JSON game server',
    '',
    'Usage:',
    '  table-swarm [play|register|flood] [options]',
    '',
    'Scenarios:',
    '  play       register, join and play every session (default)',
    '  register   register every session, then disconnect',
    '  flood      run HTTP GET workers against --url for --duration',
    '',
    'Options (flags override env vars):',
    ...lines,
    `  --${'help'.padEnd(width)}Show this message`,
  ].join('\n');
}
