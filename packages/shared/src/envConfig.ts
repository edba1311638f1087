import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

function formatIssue(path: (string | number)[], message: string): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

/**
 * Parses the environment through `schema`, reporting every invalid variable at once.
 */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'gateway';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => formatIssue(issue.path, issue.message));
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
  }

  return result.data;
}

function describe(name: string | number | undefined): string {
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

type CommonVarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
};

export type BooleanVarOptions = CommonVarOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    const description = describe(ctx.path[ctx.path.length - 1]);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${description}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = CommonVarOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    const description = describe(ctx.path[ctx.path.length - 1]);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const trimmed = value.trim();
    const parsed = /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be an integer`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be >= ${options.min}`
      });
      return z.NEVER;
    }

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be <= ${options.max}`
      });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = CommonVarOptions<string> & {
  lowercase?: boolean;
};

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    const description = describe(ctx.path[ctx.path.length - 1]);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;

    return normalized;
  });
}

const URL_PROTOCOLS = ['http:', 'https:'];

export type UrlVarOptions = CommonVarOptions<string>;

/**
 * Absolute URL with any trailing slashes removed from the path.
 */
export function urlVar(options?: UrlVarOptions) {
  return stringVar(options).transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }
    const description = describe(ctx.path[ctx.path.length - 1]);

    let url: URL;
    try {
      url = new URL(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be an absolute URL` });
      return z.NEVER;
    }

    if (!URL_PROTOCOLS.includes(url.protocol)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must use one of: ${URL_PROTOCOLS.join(', ')}`
      });
      return z.NEVER;
    }

    return value.replace(/\/+$/, '');
  });
}
