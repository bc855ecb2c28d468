import { existsSync, statSync } from 'fs';
import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DaemonError, errorMessage, isNodeError } from './errors';
import { DEFAULT_HEALTH_THRESHOLDS } from './health';
import { DEFAULT_METRICS_PREFIX, DEFAULT_TIMING_WINDOW } from './metrics';
import { DEFAULT_DEBOUNCE_MS, DEFAULT_IGNORE_PATTERNS } from './watcher/types';

export const DEFAULT_CONFIG_FILE = 'vaultwatch.config.yaml';
export const DEFAULT_SERVICE_URL = 'http://127.0.0.1:8766';

// setTimeout fires after 1ms for any longer delay
const MAX_TIMER_MS = 2_147_483_647;
const TIMER_LIMIT = 'must fit in a timer (at most 2147483647ms)';

const seconds = (fallback: number) => z.number().min(0).default(fallback);
const timerMs = (fallback: number) => z.number().int().min(0).max(MAX_TIMER_MS, TIMER_LIMIT).default(fallback);
const timeoutSeconds = (fallback: number) =>
  z
    .number()
    .positive()
    .max(MAX_TIMER_MS / 1000, TIMER_LIMIT)
    .default(fallback);
const ratio = (fallback: number) => z.number().min(0).max(1).default(fallback);
const serviceUrl = z.string().url().default(DEFAULT_SERVICE_URL);

const WatcherSchema = z
  .object({
    debounceMs: timerMs(DEFAULT_DEBOUNCE_MS),
    ignorePatterns: z.array(z.string().min(1)).default([...DEFAULT_IGNORE_PATTERNS]),
  })
  .default({});

const MonitoringSchema = z
  .object({
    enabled: z.boolean().default(true),
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(8765),
    /** Bearer token required on /metrics when set */
    authToken: z.string().min(1).optional(),
  })
  .default({});

const HealthSchema = z
  .object({
    maxConsecutiveFailures: z.number().int().min(1).default(DEFAULT_HEALTH_THRESHOLDS.maxConsecutiveFailures),
    failureRateThreshold: ratio(DEFAULT_HEALTH_THRESHOLDS.failureRateThreshold),
    degradedRateThreshold: ratio(DEFAULT_HEALTH_THRESHOLDS.degradedRateThreshold),
    windowSize: z.number().int().min(1).default(DEFAULT_HEALTH_THRESHOLDS.windowSize),
    minSamples: z.number().int().min(1).default(DEFAULT_HEALTH_THRESHOLDS.minSamples),
  })
  .default({});

const MetricsSchema = z
  .object({
    timingWindow: z.number().int().min(1).default(DEFAULT_TIMING_WINDOW),
    prefix: z
      .string()
      .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'prefix must be a valid Prometheus name')
      .default(DEFAULT_METRICS_PREFIX),
  })
  .default({});

const TranscriptSchema = z
  .object({
    enabled: z.boolean().default(true),
    serviceUrl,
    cooldownSeconds: seconds(300),
    timeoutSeconds: timeoutSeconds(60),
    maxQuotes: z.number().int().min(1).default(7),
    minQuality: ratio(0.7),
    /** Relative to the vault; null disables archiving */
    transcriptsDir: z.string().min(1).nullable().default('Media/Transcripts'),
    cacheTtlDays: z.number().min(0).default(7),
    globalCooldownSeconds: seconds(60),
  })
  .default({});

const ScreenshotSchema = z
  .object({
    enabled: z.boolean().default(true),
    serviceUrl,
    capturesDir: z.string().min(1).default('Inbox'),
    cooldownSeconds: seconds(300),
    timeoutSeconds: timeoutSeconds(600),
  })
  .default({});

const LinkSuggestionSchema = z
  .object({
    enabled: z.boolean().default(true),
    serviceUrl,
    cooldownSeconds: seconds(300),
    timeoutSeconds: timeoutSeconds(60),
    similarityThreshold: ratio(0.75),
    maxSuggestions: z.number().int().min(1).default(5),
    maxCandidates: z.number().int().min(1).default(500),
    autoInsert: z.boolean().default(false),
  })
  .default({});

const OrganizerSchema = z
  .object({
    enabled: z.boolean().default(true),
    intervalMinutes: z
      .number()
      .positive()
      .max(MAX_TIMER_MS / 60_000, TIMER_LIMIT)
      .default(60),
    sourceDir: z.string().min(1).default('Inbox'),
    statuses: z.array(z.string().min(1)).default(['promoted']),
    /** Note `type` to destination directory, relative to the vault */
    targets: z.record(z.string().min(1)).default({
      permanent: 'Permanent Notes',
      literature: 'Literature Notes',
      fleeting: 'Fleeting Notes',
    }),
    dryRun: z.boolean().default(true),
  })
  .default({});

export const DaemonConfigSchema = z.object({
  vaultPath: z.string({ required_error: 'vaultPath is required' }).min(1, 'vaultPath is required'),
  /** Relative paths resolve against the vault */
  stateDir: z.string().min(1).default('.automation'),
  /** Relative to stateDir, default daemon.pid; null disables the lock */
  pidFile: z.string().min(1).nullable().optional(),
  /** Relative to stateDir, default EMERGENCY_DISABLED */
  emergencyMarker: z.string().min(1).optional(),
  shutdownGraceMs: timerMs(5000),
  watcher: WatcherSchema,
  monitoring: MonitoringSchema,
  health: HealthSchema,
  metrics: MetricsSchema,
  transcript: TranscriptSchema,
  screenshot: ScreenshotSchema,
  linkSuggestion: LinkSuggestionSchema,
  organizer: OrganizerSchema,
});

type ParsedConfig = z.output<typeof DaemonConfigSchema>;

/** Fully resolved configuration: every path absolute, every default applied. */
export type DaemonConfig = Omit<ParsedConfig, 'pidFile' | 'emergencyMarker'> & {
  pidFile: string | null;
  emergencyMarker: string;
};

export type TranscriptConfig = DaemonConfig['transcript'];
export type ScreenshotConfig = DaemonConfig['screenshot'];
export type LinkSuggestionConfig = DaemonConfig['linkSuggestion'];
export type OrganizerConfig = DaemonConfig['organizer'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    result[key] = isRecord(value) && isRecord(existing) ? deepMerge(existing, value) : value;
  }
  return result;
}

function applyEnv(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const monitoring: Record<string, unknown> = {};
  if (env.PORT) {
    const port = Number(env.PORT);
    // Leave an unparsable value as-is so validation names it
    monitoring.port = Number.isFinite(port) ? port : env.PORT;
  }
  if (env.HOST) monitoring.host = env.HOST;
  if (env.AUTH_TOKEN) monitoring.authToken = env.AUTH_TOKEN;

  const overrides: Record<string, unknown> = {};
  if (env.VAULT_PATH) overrides.vaultPath = env.VAULT_PATH;
  if (env.VAULTWATCH_STATE_DIR) overrides.stateDir = env.VAULTWATCH_STATE_DIR;
  if (Object.keys(monitoring).length > 0) overrides.monitoring = monitoring;
  return deepMerge(raw, overrides);
}

/**
 * Validate raw settings against the schema and resolve paths.
 * Throws DaemonError listing every problem.
 */
export function parseConfig(raw: unknown, cwd: string = process.cwd()): DaemonConfig {
  const result = DaemonConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new DaemonError(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }

  const { pidFile, emergencyMarker, ...rest } = result.data;
  const vaultPath = resolve(cwd, rest.vaultPath);
  const stateDir = resolve(vaultPath, rest.stateDir);
  return {
    ...rest,
    vaultPath,
    stateDir,
    pidFile: pidFile === null ? null : resolve(stateDir, pidFile ?? 'daemon.pid'),
    emergencyMarker: resolve(stateDir, emergencyMarker ?? 'EMERGENCY_DISABLED'),
  };
}

export interface LoadConfigOptions {
  /** Explicit YAML file; must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Applied last, after the environment */
  overrides?: Record<string, unknown>;
}

async function readYamlConfig(filePath: string, required: boolean): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (!required && isNodeError(err) && err.code === 'ENOENT') return {};
    throw new DaemonError(`Cannot read config ${filePath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (err) {
    throw new DaemonError(`Failed to parse config ${filePath}: ${errorMessage(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new DaemonError(`Config ${filePath} must be a YAML mapping`);
  console.log(`[config] Loaded ${filePath}`);
  return parsed;
}

/**
 * Load configuration, merged in order:
 * defaults <- YAML file <- environment <- overrides
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DaemonConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const explicit = options.configPath ?? env.VAULTWATCH_CONFIG;
  const filePath = resolve(cwd, explicit ?? DEFAULT_CONFIG_FILE);
  let raw = await readYamlConfig(filePath, explicit !== undefined);

  raw = applyEnv(raw, env);
  if (options.overrides) raw = deepMerge(raw, options.overrides);
  return parseConfig(raw, cwd);
}

/**
 * Checks the schema cannot express. Returns human-readable problems;
 * an empty list means the configuration is usable.
 */
export function validateConfig(config: DaemonConfig): string[] {
  const problems: string[] = [];

  if (!existsSync(config.vaultPath)) {
    problems.push(`vaultPath does not exist: ${config.vaultPath}`);
  } else if (!statSync(config.vaultPath).isDirectory()) {
    problems.push(`vaultPath is not a directory: ${config.vaultPath}`);
  }

  const { health } = config;
  if (health.degradedRateThreshold > health.failureRateThreshold) {
    problems.push('health.degradedRateThreshold must not exceed health.failureRateThreshold');
  }
  if (health.minSamples > health.windowSize) {
    problems.push('health.minSamples must not exceed health.windowSize');
  }

  const vaultRelative: Array<[string, string | null]> = [
    ['transcript.transcriptsDir', config.transcript.transcriptsDir],
    ['screenshot.capturesDir', config.screenshot.capturesDir],
    ['organizer.sourceDir', config.organizer.sourceDir],
    ...Object.entries(config.organizer.targets).map(([type, dir]): [string, string] => [`organizer.targets.${type}`, dir]),
  ];
  for (const [key, dir] of vaultRelative) {
    if (dir !== null && (isAbsolute(dir) || dir.split(/[\\/]/).includes('..'))) {
      problems.push(`${key} must be a path inside the vault: ${dir}`);
    }
  }

  if (config.organizer.statuses.includes('processing')) {
    problems.push('organizer.statuses must not include processing');
  }

  return problems;
}
