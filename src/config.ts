import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { Tier } from './canvas/types.js';
import type { TargetSource } from './patterns/PatternSet.js';

const envSchema = z.object({
  CANVAS_BASE_URL: z.string().url(),
  CANVAS_ACCESS_TOKEN: z.string().min(1, 'access token is required'),
  CANVAS_REFRESH_TOKEN: z.string().min(1, 'refresh token is required'),
  KEEPER_CONFIG: z.string().default('keeper.config.json'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

const targetSchema = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
  pattern: z.string().min(1),
});

const fileSchema = z.object({
  targets: z.object({
    defensivePrimary: targetSchema,
    defensiveSecondary: targetSchema.optional(),
    build1: targetSchema.optional(),
    build2: targetSchema.optional(),
    build3: targetSchema.optional(),
  }),
  schedule: z.object({
    batchSize: z.number().int().min(1).max(10).default(10),
    windowMinutes: z.number().min(31).default(31),
    pacingMs: z.number().int().min(1000).default(1000),
  }).default({}),
  retry: z.object({
    maxAttempts: z.number().int().min(1).default(10),
    backoffMs: z.number().int().min(0).default(120_000),
  }).default({}),
  http: z.object({
    requestTimeoutMs: z.number().int().min(1000).default(15_000),
  }).default({}),
  artifacts: z.object({
    enabled: z.boolean().default(true),
    dir: z.string().default('map'),
  }).default({}),
  status: z.object({
    enabled: z.boolean().default(false),
    port: z.number().int().min(0).max(65535).default(3000),
  }).default({}),
});

type FileConfig = z.infer<typeof fileSchema>;

const TARGET_KEYS: ReadonlyArray<[keyof FileConfig['targets'], Tier]> = [
  ['defensivePrimary', 'defensive-primary'],
  ['defensiveSecondary', 'defensive-secondary'],
  ['build1', 'build-1'],
  ['build2', 'build-2'],
  ['build3', 'build-3'],
];

function issues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((i) => `${prefix}${i.path.join('.') || '(root)'}: ${i.message}`);
}

/**
 * Combine an environment and the parsed keeper.config.json. Pattern paths resolve
 * against `baseDir` (the config file's directory).
 */
export function parseConfig(env: Record<string, string | undefined>, fileConfig: unknown, baseDir: string) {
  const envResult = envSchema.safeParse(env);
  const fileResult = fileSchema.safeParse(fileConfig);
  const problems = [
    ...(envResult.success ? [] : issues('', envResult.error)),
    ...(fileResult.success ? [] : issues('keeper.config.json: ', fileResult.error)),
  ];
  if (!envResult.success || !fileResult.success) throw new ConfigError(problems);

  const e = envResult.data;
  const f = fileResult.data;

  const targets: TargetSource[] = [];
  for (const [key, tier] of TARGET_KEYS) {
    const t = f.targets[key];
    if (t) targets.push({ tier, x: t.x, y: t.y, pattern: resolve(baseDir, t.pattern) });
  }

  return {
    canvas: {
      baseUrl: e.CANVAS_BASE_URL.replace(/\/$/, ''),
      requestTimeoutMs: f.http.requestTimeoutMs,
    },
    auth: {
      accessToken: e.CANVAS_ACCESS_TOKEN,
      refreshToken: e.CANVAS_REFRESH_TOKEN,
    },
    logLevel: e.LOG_LEVEL,
    targets,
    schedule: {
      batchSize: f.schedule.batchSize,
      windowMs: f.schedule.windowMinutes * 60_000,
      pacingMs: f.schedule.pacingMs,
    },
    retry: {
      maxAttempts: f.retry.maxAttempts,
      backoffMs: f.retry.backoffMs,
    },
    artifacts: {
      enabled: f.artifacts.enabled,
      dir: resolve(baseDir, f.artifacts.dir),
    },
    status: {
      enabled: f.status.enabled,
      port: f.status.port,
    },
  } as const;
}

export type Config = ReturnType<typeof parseConfig>;

/** Load .env and keeper.config.json (or KEEPER_CONFIG) from the working directory. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Config {
  loadDotenv({ path: resolve(cwd, '.env') });

  const configPath = resolve(cwd, env.KEEPER_CONFIG ?? 'keeper.config.json');
  let fileConfig: unknown;
  try {
    fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError([`${configPath}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseConfig(env, fileConfig, dirname(configPath));
}

/** Config with tokens masked, for logging. */
export function describeConfig(cfg: Config) {
  const mask = (token: string) => (token.length > 4 ? '●●●●' + token.slice(-4) : '●●●●');
  return {
    canvas: cfg.canvas,
    logLevel: cfg.logLevel,
    auth: { accessToken: mask(cfg.auth.accessToken), refreshToken: mask(cfg.auth.refreshToken) },
    targets: cfg.targets.map((t) => ({ tier: t.tier, x: t.x, y: t.y, pattern: t.pattern })),
    schedule: cfg.schedule,
    retry: cfg.retry,
    artifacts: cfg.artifacts,
    status: cfg.status,
  };
}
