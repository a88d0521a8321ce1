/**
 * Environment loader - import before anything that reads process.env
 *
 * Loads apps/harvester/.env.local in development. Production injects
 * variables directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
