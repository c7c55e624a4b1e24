import { existsSync } from 'node:fs';
import { z } from 'zod';
import { LOG_LEVELS } from '../monitoring/logger.js';

// --- Errors ---

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// --- Field helpers ---

/** Blank environment values count as unset. */
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const requiredText = () =>
  z.preprocess(blankToUndefined, z.string({ required_error: 'is required' }).trim().min(1));

const httpUrl = (base: z.ZodString = z.string()) =>
  base
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'must use http or https' })
    .transform((value) => value.replace(/\/+$/, ''));

const requiredUrl = () =>
  z.preprocess(blankToUndefined, httpUrl(z.string({ required_error: 'is required' })));

const optionalNonNegativeInt = () =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int('must be an integer').min(0, 'must be >= 0').optional()
  );

/** `true` in any letter case enables the flag; everything else leaves it off. */
const flag = (fallback: boolean) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() === 'true' : undefined),
    z.boolean().default(fallback)
  );

// --- Schemas ---

const backendShape = {
  SUPABASE_URL: requiredUrl(),
  SUPABASE_API_KEY: requiredText(),
  TABELA: optionalText('cadastros'),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
};

const backendEnvSchema = z.object(backendShape);

const dispatcherEnvSchema = z.object({
  ...backendShape,
  GITHUB_OUTPUT: z.preprocess(blankToUndefined, z.string().optional()),
});

const uploaderEnvSchema = z.object({
  ...backendShape,
  PLANILHA: optionalText('Emitir.xlsx'),
});

const automatorEnvSchema = z
  .object({
    ...backendShape,
    LOGIN_USERNAME: requiredText(),
    LOGIN_PASSWORD: requiredText(),
    TELEGRAM_TOKEN: requiredText(),
    TELEGRAM_CHAT_ID: requiredText(),
    WORKER_ID: optionalText('local'),
    JOB_OFFSET: optionalNonNegativeInt(),
    JOB_LIMIT: optionalNonNegativeInt(),
    DISABLE_TELEGRAM_NOTIFICATION: flag(false),
    PANEL_BASE_URL: z.preprocess(blankToUndefined, httpUrl().default('https://sistemamd.com.br')),
    BROWSER_HEADLESS: flag(true),
    CHROMIUM_EXECUTABLE_PATH: z.preprocess(blankToUndefined, z.string().optional()),
    LOG_DIR: optionalText('.'),
  })
  .refine((env) => (env.JOB_OFFSET === undefined) === (env.JOB_LIMIT === undefined), {
    message: 'must be set together with JOB_LIMIT',
    path: ['JOB_OFFSET'],
  });

// --- Config types ---

export interface BackendConfig {
  url: string;
  apiKey: string;
  table: string;
}

export type LogLevelSetting = z.infer<typeof backendEnvSchema>['LOG_LEVEL'];

export interface DispatcherConfig {
  backend: BackendConfig;
  logLevel: LogLevelSetting;
  outputFile?: string;
}

export interface UploaderConfig {
  backend: BackendConfig;
  logLevel: LogLevelSetting;
  spreadsheetPath: string;
}

export interface JobSliceWindow {
  offset: number;
  limit: number;
}

export interface AutomatorConfig {
  backend: BackendConfig;
  logLevel: LogLevelSetting;
  workerId: string;
  slice?: JobSliceWindow;
  panel: {
    baseUrl: string;
    username: string;
    password: string;
  };
  telegram: {
    token: string;
    chatId: string;
    disabled: boolean;
  };
  browser: {
    headless: boolean;
    executablePath?: string;
  };
  logDir: string;
}

// --- Loading ---

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'env'} ${issue.message}`)
    );
  }
  return result.data;
}

function toBackend(env: z.infer<typeof backendEnvSchema>): BackendConfig {
  return { url: env.SUPABASE_URL, apiKey: env.SUPABASE_API_KEY, table: env.TABELA };
}

export function loadDispatcherConfig(env: NodeJS.ProcessEnv = process.env): DispatcherConfig {
  const parsed = parseEnv(dispatcherEnvSchema, env);
  return {
    backend: toBackend(parsed),
    logLevel: parsed.LOG_LEVEL,
    ...(parsed.GITHUB_OUTPUT !== undefined ? { outputFile: parsed.GITHUB_OUTPUT } : {}),
  };
}

export function loadUploaderConfig(env: NodeJS.ProcessEnv = process.env): UploaderConfig {
  const parsed = parseEnv(uploaderEnvSchema, env);
  return {
    backend: toBackend(parsed),
    logLevel: parsed.LOG_LEVEL,
    spreadsheetPath: parsed.PLANILHA,
  };
}

export function loadAutomatorConfig(env: NodeJS.ProcessEnv = process.env): AutomatorConfig {
  const parsed = parseEnv(automatorEnvSchema, env);
  const slice =
    parsed.JOB_OFFSET !== undefined && parsed.JOB_LIMIT !== undefined
      ? { offset: parsed.JOB_OFFSET, limit: parsed.JOB_LIMIT }
      : undefined;

  return {
    backend: toBackend(parsed),
    logLevel: parsed.LOG_LEVEL,
    workerId: parsed.WORKER_ID,
    ...(slice ? { slice } : {}),
    panel: {
      baseUrl: parsed.PANEL_BASE_URL,
      username: parsed.LOGIN_USERNAME,
      password: parsed.LOGIN_PASSWORD,
    },
    telegram: {
      token: parsed.TELEGRAM_TOKEN,
      chatId: parsed.TELEGRAM_CHAT_ID,
      disabled: parsed.DISABLE_TELEGRAM_NOTIFICATION,
    },
    browser: {
      headless: parsed.BROWSER_HEADLESS,
      ...(parsed.CHROMIUM_EXECUTABLE_PATH !== undefined ? { executablePath: parsed.CHROMIUM_EXECUTABLE_PATH } : {}),
    },
    logDir: parsed.LOG_DIR,
  };
}

/**
 * Loads `.env` from the working directory when present. Variables already in
 * the environment are left alone.
 */
export function loadDotEnv(path = '.env'): void {
  if (existsSync(path)) {
    process.loadEnvFile(path);
  }
}
