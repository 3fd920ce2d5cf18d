import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@lexiscreen/shared/src/utils/errors.js';
import { validateScreeningConfig } from './validators.js';
import type { ScreeningConfig } from './screening-config.schema.js';

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export async function loadScreeningConfig(filePath: string): Promise<ScreeningConfig> {
  const raw = await readJsonFile(filePath);
  return validateScreeningConfig(raw);
}
