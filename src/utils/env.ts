/**
 * .env loading shared by the MCP server and the batch CLI
 *
 * @module utils/env
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Load the first .env found: OCR_CONVERGENCE_ENV_FILE, then the working
 * directory, then the package root. Returns the file loaded, if any.
 */
export function loadEnvFile(): string | null {
  const candidates = [
    process.env.OCR_CONVERGENCE_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(__dirname, '..', '..', '.env'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}
