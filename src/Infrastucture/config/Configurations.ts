import { z } from 'zod';

/**
 * Configuration class for managing application settings.
 * It validates environment variables using Zod and provides access to configuration values.
 * The entry point loads `.env` before constructing it.
 */

const numericString = (name: string, min: number) =>
  z
    .string()
    .regex(/^\d+$/, `${name} must be a whole number`)
    .refine((value) => parseInt(value, 10) >= min, `${name} must be at least ${min}`);

const booleanString = (name: string) =>
  z.enum(['true', 'false'], { errorMap: () => ({ message: `${name} must be "true" or "false"` }) });

const ConfigSchema = z.object({
  SURVEY_URL: z.string().url('SURVEY_URL must be a valid URL').optional(),
  CHROME_EXECUTABLE_PATH: z.string().optional(),
  HEADLESS_MODE: booleanString('HEADLESS_MODE').optional().default('true'),
  PAGE_TIMEOUT: numericString('PAGE_TIMEOUT', 1).optional().default('30000'),
  HUMAN_DELAY_MS: numericString('HUMAN_DELAY_MS', 0).optional().default('55'),
  MAX_STEPS: numericString('MAX_STEPS', 1).optional().default('120'),
  MAX_ROW_ATTEMPTS: numericString('MAX_ROW_ATTEMPTS', 1).optional().default('2'),
  COMPLETION_TEXT: z.string().min(1).optional().default('Thank you'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional().default('info'),
  LOG_FILE: z.string().optional().default('survey-autofill.log'),
});

export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

// Empty values in .env behave as unset.
function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export class Configuration {
  private config: z.infer<typeof ConfigSchema>;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const result = ConfigSchema.safeParse({
      SURVEY_URL: blankToUndefined(env.SURVEY_URL),
      CHROME_EXECUTABLE_PATH: blankToUndefined(env.CHROME_EXECUTABLE_PATH),
      HEADLESS_MODE: blankToUndefined(env.HEADLESS_MODE),
      PAGE_TIMEOUT: blankToUndefined(env.PAGE_TIMEOUT),
      HUMAN_DELAY_MS: blankToUndefined(env.HUMAN_DELAY_MS),
      MAX_STEPS: blankToUndefined(env.MAX_STEPS),
      MAX_ROW_ATTEMPTS: blankToUndefined(env.MAX_ROW_ATTEMPTS),
      COMPLETION_TEXT: blankToUndefined(env.COMPLETION_TEXT),
      LOG_LEVEL: blankToUndefined(env.LOG_LEVEL),
      // An explicitly empty LOG_FILE turns the file transport off.
      LOG_FILE: env.LOG_FILE,
    });

    if (!result.success) {
      throw new ConfigurationError(
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    this.config = result.data;
  }

  get surveyUrl(): string | undefined {
    return this.config.SURVEY_URL;
  }

  get chromeExecutablePath(): string | undefined {
    return this.config.CHROME_EXECUTABLE_PATH;
  }

  get headlessMode(): boolean {
    return this.config.HEADLESS_MODE === 'true';
  }

  get pageTimeout(): number {
    return parseInt(this.config.PAGE_TIMEOUT, 10);
  }

  get humanDelayMs(): number {
    return parseInt(this.config.HUMAN_DELAY_MS, 10);
  }

  get maxSteps(): number {
    return parseInt(this.config.MAX_STEPS, 10);
  }

  get maxRowAttempts(): number {
    return parseInt(this.config.MAX_ROW_ATTEMPTS, 10);
  }

  get completionText(): string {
    return this.config.COMPLETION_TEXT;
  }

  get logLevel(): string {
    return this.config.LOG_LEVEL;
  }

  get logFile(): string | undefined {
    return this.config.LOG_FILE || undefined;
  }
}
