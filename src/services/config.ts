import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { appConfigSchema, type AppConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { logDebug } from '../utils/logger/index.js';

const COMPONENT = 'ConfigService';

export async function readConfig(path: string): Promise<AppConfig> {
  let configFile: string;
  try {
    configFile = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Settings file ${path} does not exist`);
    }
    throw new ConfigError(`Unable to read settings file ${path}: ${String(error)}`);
  }

  let data: unknown;
  try {
    data = parse(configFile);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${path}: ${String(error)}`);
  }

  const result = appConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(
      `Invalid settings in ${path}`,
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
      )
    );
  }

  logDebug(COMPONENT, `Settings loaded from ${path}`);
  return result.data;
}
