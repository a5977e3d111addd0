/**
 * Load .env.local (and .env) before any other imports that read the environment
 * (the db pool and the Ollama model names are resolved at import time).
 * Import this first in entry points: import '../load-env' or import './load-env'
 */
import { config } from 'dotenv';
import path from 'path';

config({ path: path.resolve(process.cwd(), '.env.local') });
config();
