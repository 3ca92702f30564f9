/**
 * YAML Configuration Loader
 * ==========================
 * Reads run files written in YAML. Parsing only; schema validation belongs
 * to whoever owns the shape of the document.
 */

import { readFileSync, existsSync } from 'fs';
import { CORE_SCHEMA, load } from 'js-yaml';
import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';

/**
 * Load a YAML document and return it as an unvalidated value.
 * Timestamps stay strings (core schema).
 */
export function loadYamlFile(filePath: string): unknown {
  if (!existsSync(filePath)) {
    throw new ConfigurationError(`Config file not found: ${filePath}`, 'path', { path: filePath });
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file: ${filePath}`, 'path', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    const document = load(content, { schema: CORE_SCHEMA });
    logger.debug('Loaded YAML config', { path: filePath });
    return document;
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}`, 'path', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
