// src/config.ts

/**
 * Centralized configuration module for environment variables and constants.
 */

// Load environment variables from .env.inference-server file
import * as dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'

// Resolve package root for both source (src/) and built (dist/...) layouts
const packageRoot = path.resolve(__dirname, '..')

// Try to load .env.inference-server from package root, with cwd fallback
const candidateEnvPaths = [
  path.join(packageRoot, '.env.inference-server'),
  path.join(process.cwd(), '.env.inference-server')
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

const MODEL_FILE = path.join('models', 'flight_delay_model.json')

// The bundled artifact sits beside src/ when running from sources; a build under
// dist/ has no copy, so fall back to the workspace layout relative to cwd.
function defaultModelPath(): string {
  const candidates = [
    path.join(packageRoot, MODEL_FILE),
    path.join(process.cwd(), 'packages', 'inference-server', MODEL_FILE),
    path.join(process.cwd(), MODEL_FILE)
  ]
  return candidates.find(p => fs.existsSync(p)) ?? candidates[0]
}

function parsePort(raw: string | undefined, fallback: number): number {
  const n = raw ? Number(raw) : NaN
  return Number.isInteger(n) && n > 0 && n < 65536 ? n : fallback
}

export interface AppConfig {
  NODE_ENV: string
  PORT: number
  HOST: string
  LOG_LEVEL: string
  MODEL_PATH: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    NODE_ENV: env.NODE_ENV || 'development',
    PORT: parsePort(env.PORT, 8000),
    HOST: env.HOST || '0.0.0.0',
    LOG_LEVEL: env.LOG_LEVEL || 'info',
    MODEL_PATH: env.MODEL_PATH ? path.resolve(env.MODEL_PATH) : defaultModelPath()
  }
}

export const ENV: AppConfig = loadConfig()

export const CONSTANTS = {
  SERVICE_NAME: 'Flight Delay ML API',
  DESCRIPTION: 'Example API serving a pre-trained flight delay classifier',
  VERSION: '1.0',
  FEATURES: ['predict', 'predict-batch', 'metrics', 'simulate-error'],
  JSON_BODY_LIMIT: '10mb'
} as const
