import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import path from 'node:path';
import { logFileName } from '../utils/logger.js';

/**
 * Print (or follow) today's update log from `logDir`.
 * Sets exit code 1 when there is no log for today.
 */
export async function handleLogsCli(logDir: string, options: { follow: boolean; now?: () => Date }): Promise<void> {
    const today = (options.now ?? (() => new Date()))();
    const logPath = path.join(logDir, logFileName(today));

    if (!fs.existsSync(logPath)) {
        console.error(`[Logs] No log for today at ${logPath}.`);
        process.exitCode = 1;
        return;
    }

    if (options.follow) {
        console.log(`[Logs] Following ${logPath}...\n`);
        tailFile(logPath);
        // The watcher keeps the process alive.
        return;
    }

    const contents = await fsPromises.readFile(logPath, 'utf8');
    process.stdout.write(contents);
    process.exitCode = 0;
}

/** Print the last 4KB, then stream appended bytes as the file grows. */
function tailFile(filePath: string): void {
    let position = fs.statSync(filePath).size;
    const startPos = Math.max(0, position - 4096);

    if (startPos < position) {
        fs.createReadStream(filePath, { start: startPos, encoding: 'utf8' }).pipe(process.stdout, { end: false });
    }

    try {
        fs.watch(filePath, (eventType) => {
            if (eventType !== 'change') return;
            const stats = fs.statSync(filePath);
            if (stats.size > position) {
                fs.createReadStream(filePath, { start: position, end: stats.size - 1, encoding: 'utf8' }).on(
                    'data',
                    (chunk) => {
                        process.stdout.write(chunk);
                    },
                );
                position = stats.size;
            } else if (stats.size < position) {
                // truncated or rotated
                position = stats.size;
            }
        });
    } catch (err) {
        console.error(`[Logs] Failed to watch file: ${err instanceof Error ? err.message : String(err)}`);
    }
}
