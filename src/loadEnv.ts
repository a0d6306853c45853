/**
 * Loads an optional `.env` file from the working directory (LOG_LEVEL, LOG_FILE_DIR).
 *
 * Usage: import this module at the very top of the entry script, before the logger is imported.
 */

import fs from 'fs';
import path from 'path';

import dotenv from 'dotenv';

const envPath = path.join(process.cwd(), '.env');

if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
}
