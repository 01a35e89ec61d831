import express, { type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import { ZodError } from 'zod'
import {
  decrypt,
  describeCiphers,
  encryptWithPadding,
  findRepeatedSequences,
  frequencyAnalysis,
  isCipherError,
} from '@cipher-lab/core'
import { analyzeCiphertext } from './analysis.js'
import type { Config } from './config.js'
import type { Logger } from './logger.js'
import {
  analyzeRequestSchema,
  decryptRequestSchema,
  encryptRequestSchema,
  frequencyRequestSchema,
  repeatsRequestSchema,
} from './schemas.js'

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BadRequestError'
  }
}

function hasStatus(error: unknown): error is { status: number; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    'message' in error &&
    typeof error.message === 'string'
  )
}

export function createApp(config: Config, logger: Logger) {
  const app = express()

  // Middleware
  app.use(cors({ origin: config.corsOrigin }))
  app.use(express.json({ limit: '2mb' }))

  const assertTextLength = (text: string) => {
    if (text.length > config.maxTextLength) {
      throw new BadRequestError(`Text is longer than ${config.maxTextLength} characters`)
    }
  }

  const handleError = (res: Response, error: unknown, route: string) => {
    if (isCipherError(error)) {
      return res.status(400).json({ error: error.kind, message: error.message })
    }
    if (error instanceof ZodError) {
      return res.status(400).json({ error: 'ValidationError', issues: error.issues })
    }
    if (error instanceof BadRequestError) {
      return res.status(400).json({ error: 'BadRequest', message: error.message })
    }
    if (hasStatus(error) && error.status >= 400 && error.status < 500) {
      return res.status(error.status).json({ error: 'BadRequest', message: error.message })
    }

    logger.error(error, `${route} failed`)
    return res.status(500).json({ error: 'Internal server error' })
  }

  // Health check route
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() })
  })

  app.get('/api/ciphers', (_req, res) => {
    res.json({ ciphers: describeCiphers() })
  })

  app.post('/api/encrypt', (req, res) => {
    try {
      const { text, key } = encryptRequestSchema.parse(req.body)
      assertTextLength(text)

      const result = encryptWithPadding(text, key)
      logger.debug({ cipher: key.cipher, length: text.length }, 'Encrypted text')
      res.json(result)
    } catch (error) {
      handleError(res, error, 'POST /api/encrypt')
    }
  })

  app.post('/api/decrypt', (req, res) => {
    try {
      const { text, key, padding } = decryptRequestSchema.parse(req.body)
      assertTextLength(text)

      const plaintext = decrypt(text, key, padding)
      logger.debug({ cipher: key.cipher, length: text.length }, 'Decrypted text')
      res.json({ text: plaintext })
    } catch (error) {
      handleError(res, error, 'POST /api/decrypt')
    }
  })

  app.post('/api/frequency', (req, res) => {
    try {
      const { text, n, asWord } = frequencyRequestSchema.parse(req.body)
      assertTextLength(text)

      res.json({ frequencies: [...frequencyAnalysis(text, n, asWord)] })
    } catch (error) {
      handleError(res, error, 'POST /api/frequency')
    }
  })

  app.post('/api/repeats', (req, res) => {
    try {
      const { text, minLength, maxLength } = repeatsRequestSchema.parse(req.body)
      assertTextLength(text)

      res.json({ sequences: [...findRepeatedSequences(text, minLength, maxLength)] })
    } catch (error) {
      handleError(res, error, 'POST /api/repeats')
    }
  })

  // Cipher analysis: detection, statistics and ranked candidate decryptions
  app.post('/api/analyze', (req, res) => {
    try {
      const { text } = analyzeRequestSchema.parse(req.body)
      assertTextLength(text)

      const report = analyzeCiphertext(text, (update) => {
        logger.debug(update, 'Analysis progress')
      })
      logger.info({ likelyType: report.detection.likelyType, candidates: report.candidates.length }, report.message)
      res.json(report)
    } catch (error) {
      handleError(res, error, 'POST /api/analyze')
    }
  })

  // Malformed JSON bodies and anything thrown outside the routes
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleError(res, error, 'request')
  })

  return app
}
