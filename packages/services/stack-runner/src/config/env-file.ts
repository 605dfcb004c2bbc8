import { resolve } from 'path';
import { config as loadDotenv } from 'dotenv';

/**
 * Loads `.env` from the working directory. Variables already set win.
 */
export function loadEnvironmentFile(path: string = resolve(process.cwd(), '.env')): void {
  loadDotenv({ path, override: false });
}
