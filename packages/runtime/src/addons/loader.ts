// Add-on Config Loader - read and validate config/addons.json
//
// The file is read once at startup. Anything wrong with it is a
// ConfigurationError: there is no degraded mode.

import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import {
  ConfigurationError,
  errorMessage,
  validateAddonConfig,
  type AddonConfig,
  type Logger,
} from '@fastapp/protocol';
import { silentLogger } from '../logging.js';

/**
 * Parse and validate add-on configuration text.
 *
 * @param source - Where the text came from, for error messages
 * @throws ConfigurationError if the text is not JSON or fails validation
 */
export function parseAddonConfig(
  text: string,
  source: string,
  logger: Logger = silentLogger
): AddonConfig {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Add-on config is not valid JSON: ${source}`, {
      path: source,
      error: errorMessage(error),
    });
  }

  const result = validateAddonConfig(value);

  for (const warning of result.warnings) {
    logger.warn('Add-on config warning', {
      path: warning.path,
      code: warning.code,
      message: warning.message,
    });
  }

  if (!result.valid || !result.config) {
    throw new ConfigurationError(
      `Invalid add-on config ${source}: ${result.errors.map((e) => e.message).join('; ')}`,
      { path: source, errors: result.errors }
    );
  }

  return result.config;
}

/**
 * Load add-on configuration from a JSON file.
 *
 * @throws ConfigurationError if the file is missing, unreadable or invalid
 */
export async function loadAddonConfig(
  path: string | URL,
  logger: Logger = silentLogger
): Promise<AddonConfig> {
  const filePath = path instanceof URL ? fileURLToPath(path) : path;

  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) {
      throw new ConfigurationError(`Add-on config not found: ${filePath}`, { path: filePath });
    }
    throw new ConfigurationError(`Could not read add-on config: ${filePath}`, {
      path: filePath,
      error: errorMessage(error),
    });
  }

  const config = parseAddonConfig(text, filePath, logger);
  logger.debug('Loaded add-on config', {
    path: filePath,
    addons: Object.keys(config.enabled).length,
  });
  return config;
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
