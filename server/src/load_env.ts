import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

/**
 * Loads `.env.local` then `.env` from the working directory, falling back to
 * its parent. Earlier files win; variables already set in the process are
 * never overwritten. Returns the files that were read.
 */
export function loadEnv(cwd = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const name of ['.env.local', '.env']) {
    const envPath = [path.resolve(cwd, name), path.resolve(cwd, '..', name)].find((candidate) =>
      fs.existsSync(candidate)
    );
    if (!envPath) continue;
    dotenv.config({ path: envPath });
    loaded.push(envPath);
  }
  return loaded;
}
