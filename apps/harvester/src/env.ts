/**
 * Environment loader - must be imported first by every entry point.
 *
 * Loads apps/harvester/.env.local, then .env, outside production. Production
 * hosts inject env vars directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
  config({ path: fileURLToPath(new URL('../.env', import.meta.url)) })
}
