import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { getDailyLogPath } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { hasFlag } from './cli.js';

/**
 * Handle the `logs` command.
 * Prints or tails today's daily log file.
 */
export async function handleLogsCli(argv: string[]): Promise<boolean> {
  if (argv[0] !== 'logs') return false;

  const follow = hasFlag(argv, '--follow', '-f');
  const logPath = getDailyLogPath();

  if (!fs.existsSync(logPath)) {
    console.error(`[Logs] No logs found for today at ${logPath}.`);
    process.exitCode = 1;
    return true;
  }

  if (follow) {
    console.log(`[Logs] Following logs from ${logPath}...\n`);
    tailFile(logPath);
    // The fs watcher keeps the process alive until interrupted.
  } else {
    const contents = await fsPromises.readFile(logPath, 'utf8');
    process.stdout.write(contents);
    process.exitCode = 0;
  }

  return true;
}

/**
 * Tail a file similar to `tail -f`, starting with its last 4KB.
 */
function tailFile(filePath: string): void {
  let position = fs.statSync(filePath).size;
  const startPos = Math.max(0, position - 4096);

  if (startPos < position) {
    fs.createReadStream(filePath, { start: startPos, encoding: 'utf8' }).pipe(process.stdout);
  }

  try {
    fs.watch(filePath, (eventType) => {
      if (eventType !== 'change') return;
      const stats = fs.statSync(filePath);
      if (stats.size > position) {
        const stream = fs.createReadStream(filePath, {
          start: position,
          end: stats.size - 1,
          encoding: 'utf8',
        });
        stream.on('data', (chunk) => {
          process.stdout.write(chunk);
        });
        position = stats.size;
      } else if (stats.size < position) {
        // Truncated or rolled over.
        position = stats.size;
      }
    });
  } catch (err) {
    console.error(`[Logs] Failed to watch file: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}
