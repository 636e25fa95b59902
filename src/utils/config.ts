import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface InjectorConfig {
  projectRoot: string;
  strict: boolean;
}

export interface Config {
  logging: LoggingConfig;
  injector: InjectorConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`Environment variable ${key} must be a boolean (true/false)`);
  }
}

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: process.env.LOG_FILE || undefined,
  },
  injector: {
    projectRoot: getEnvVar('CONFIG_INJECTOR_PROJECT_ROOT', process.cwd()),
    strict: getEnvVarAsBoolean('CONFIG_INJECTOR_STRICT', true),
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};
