import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { getConfigPath } from '../config/config-loader.js';
import { SAMPLE_CONFIG } from '../config/config-schema.js';
import { errorMessage } from '../utils/errors.js';
import { hasFlag, readOption } from './cli.js';

/**
 * Handle the `init` command.
 * Writes the sample configuration; an existing file is kept unless `--force` is given.
 */
export async function handleInitCli(argv: string[]): Promise<boolean> {
  if (argv[0] !== 'init') return false;

  const configPath = getConfigPath(readOption(argv, '--config'));
  if (existsSync(configPath) && !hasFlag(argv, '--force')) {
    console.error(`[Config] ${configPath} already exists. Use --force to overwrite it.`);
    process.exitCode = 1;
    return true;
  }

  try {
    await mkdir(path.dirname(configPath), { recursive: true });
    await writeFile(configPath, `${JSON.stringify(SAMPLE_CONFIG, null, 2)}\n`, 'utf8');
    console.log(`Wrote sample configuration to ${configPath}`);
    process.exitCode = 0;
  } catch (error) {
    console.error(`[Config] Failed to write ${configPath}: ${errorMessage(error)}`);
    process.exitCode = 1;
  }

  return true;
}
