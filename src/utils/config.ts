import fs from 'fs';
import os from 'os';
import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';
import type { HarnessConfig } from '../types/index.js';
import { isLogLevel } from './logger.js';

export const DEFAULT_WAIT_TIMEOUT_SEC = 600;

export interface LoadConfigOptions {
  /** dotenv file whose values fill in variables the environment does not set. */
  envFile?: string;
  env?: NodeJS.ProcessEnv;
}

function parseBoolean(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got '${value}'`);
  }
}

export function loadHarnessConfig(options: LoadConfigOptions = {}): HarnessConfig {
  const env: NodeJS.ProcessEnv = { ...(options.env ?? process.env) };

  if (options.envFile) {
    if (!fs.existsSync(options.envFile)) {
      throw new ConfigurationError(`Environment file not found: ${options.envFile}`);
    }
    const fromFile = dotenv.parse(fs.readFileSync(options.envFile));
    for (const [key, value] of Object.entries(fromFile)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
  }

  const logLevel = (env.HARNESS_LOG_LEVEL ?? 'INFO').toUpperCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`HARNESS_LOG_LEVEL must be one of ERROR, WARN, INFO, DEBUG; got '${logLevel}'`);
  }

  const config: HarnessConfig = {
    logLevel,
    logFile: env.HARNESS_LOG_FILE || undefined,
    logToConsole: env.HARNESS_LOG_CONSOLE ? parseBoolean('HARNESS_LOG_CONSOLE', env.HARNESS_LOG_CONSOLE) : true,
    waitTimeoutSec: env.HARNESS_WAIT_TIMEOUT_SEC ? Number(env.HARNESS_WAIT_TIMEOUT_SEC) : DEFAULT_WAIT_TIMEOUT_SEC,
    scratchRoot: env.HARNESS_SCRATCH_ROOT || os.tmpdir(),
  };

  validateHarnessConfig(config);
  return config;
}

export function validateHarnessConfig(config: HarnessConfig): void {
  if (!isLogLevel(config.logLevel)) {
    throw new ConfigurationError(`Unknown log level: ${config.logLevel}`);
  }

  if (!Number.isFinite(config.waitTimeoutSec) || config.waitTimeoutSec <= 0) {
    throw new ConfigurationError('Wait timeout must be a positive number of seconds');
  }

  if (!config.scratchRoot) {
    throw new ConfigurationError('Scratch root must not be empty');
  }
}
