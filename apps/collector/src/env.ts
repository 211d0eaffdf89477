/**
 * Environment loader - import before modules that read process.env
 *
 * Loads apps/collector/.env.local in development only.
 * Production runs get their variables from the host.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
