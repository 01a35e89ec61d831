import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import type { LogLevel } from './logger.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export interface Config {
  port: number
  host: string
  corsOrigin: string
  maxTextLength: number
  logLevel: LogLevel
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  MAX_TEXT_LENGTH: z.coerce.number().int().positive().default(100_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
})

// Look for .env in the backend directory
export function loadEnvFile(): void {
  dotenv.config({ path: path.join(__dirname, '../.env') })
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid environment configuration: ${problems}`)
  }

  const { PORT, HOST, CORS_ORIGIN, MAX_TEXT_LENGTH, LOG_LEVEL } = parsed.data
  return {
    port: PORT,
    host: HOST,
    corsOrigin: CORS_ORIGIN,
    maxTextLength: MAX_TEXT_LENGTH,
    logLevel: LOG_LEVEL,
  }
}
