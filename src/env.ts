/**
 * Load .env before anything reads process.env. Must be the first import in index.ts and cli.ts.
 * DUB_ENV_FILE points at an extra env file (e.g. a shared one next to the media); it never overrides.
 */
import 'dotenv/config'
import dotenv from 'dotenv'
import fs from 'fs'

const extraEnv = process.env.DUB_ENV_FILE
if (extraEnv && fs.existsSync(extraEnv)) {
  dotenv.config({ path: extraEnv, override: false })
}
