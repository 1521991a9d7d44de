import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

/**
 * Loads `KEY=value` lines from a `.env` file into `process.env`.
 * Variables already set in the environment win over the file.
 */
export function loadEnv(fileName = '.env'): void {
    const envPath = join(process.cwd(), fileName);
    if (!existsSync(envPath)) return;

    let content: string;
    try {
        content = readFileSync(envPath, 'utf-8');
    } catch (error) {
        console.warn(`Failed to read ${envPath}:`, error);
        return;
    }

    for (const line of content.split(/\r?\n/)) {
        const trimmedLine = line.trim();
        if (!trimmedLine || trimmedLine.startsWith('#')) continue;

        const match = trimmedLine.match(/^([^=]+)=(.*)$/);
        if (!match) continue;

        const key = (match[1] ?? '').trim();
        let value = (match[2] ?? '').trim();

        // Remove surrounding quotes if present
        if ((value.startsWith('"') && value.endsWith('"')) ||
            (value.startsWith("'") && value.endsWith("'"))) {
            value = value.slice(1, -1);
        }

        if (process.env[key] === undefined) {
            process.env[key] = value;
        }
    }
}
