import { promises as fs } from 'node:fs';
import path from 'node:path';

import { parse as parseToml } from '@iarna/toml';
import type { ZodError } from 'zod';

import { ConfigError, errorMessage } from '../domain/errors';
import { configSchema } from './config-schema';
import type { AppConfig } from './config-schema';

export const DEFAULT_CONFIG_PATH = '/etc/periodic-audit.conf';

export const resolveConfigPath = (explicitPath: string | null): string =>
  explicitPath ?? process.env.PERIODIC_AUDIT_CONFIG ?? DEFAULT_CONFIG_PATH;

const formatIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => `  ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');

/**
 * Validate an already-decoded configuration document. Relative paths are
 * resolved against `baseDirectory`.
 */
export const parseConfig = (document: unknown, baseDirectory: string): AppConfig => {
  const result = configSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error)}`);
  }

  const config = result.data;
  const resolve = (target: string) => path.resolve(baseDirectory, target);
  const stateFile = resolve(config.stateFile);

  return {
    ...config,
    targets: config.targets.map((target) => ({ ...target, path: resolve(target.path) })),
    stateFile,
    lockFile: resolve(config.lockFile),
    auditor: {
      ...config.auditor,
      path: resolve(config.auditor.path),
      db: config.auditor.db ? resolve(config.auditor.db) : undefined,
    },
    mail: {
      ...config.mail,
      passwordFile: config.mail.passwordFile ? resolve(config.mail.passwordFile) : undefined,
    },
    reportFile: config.reportFile ? { ...config.reportFile, path: resolve(config.reportFile.path) } : undefined,
    reportCommand: config.reportCommand,
  };
};

export const loadConfig = async (configPath: string): Promise<AppConfig> => {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file '${configPath}': ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = parseToml(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse configuration file '${configPath}': ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const config = parseConfig(document, path.dirname(path.resolve(configPath)));

  if (config.mail.passwordFile) {
    try {
      const password = await fs.readFile(config.mail.passwordFile, 'utf8');
      return { ...config, mail: { ...config.mail, password: password.trim() } };
    } catch (error) {
      throw new ConfigError(
        `Cannot read mail.password_file '${config.mail.passwordFile}': ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  return config;
};
