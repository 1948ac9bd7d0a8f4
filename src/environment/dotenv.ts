import dotenv from 'dotenv';

export type Environment = Record<string, string | undefined>;

export interface LoadEnvironmentOptions {
  /** Variables of the running process; they take precedence over `.env`. */
  processEnv?: Environment;
  /** Raw `.env` file content. */
  dotenv?: string;
}

export function parseDotenv(content: string): Record<string, string> {
  return dotenv.parse(content);
}

/**
 * Merges `.env` content with process variables. Values already present in
 * the process environment are never overridden.
 */
export function loadEnvironment(options: LoadEnvironmentOptions = {}): Record<string, string> {
  const merged: Record<string, string> = options.dotenv ? parseDotenv(options.dotenv) : {};

  for (const [key, value] of Object.entries(options.processEnv ?? {})) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}
