import { z } from 'zod'
import { ROUTE_PATTERNS, type CipherKey, type RoutePattern } from '@cipher-lab/core'

const keyword = z.string().min(1)

const routePattern = z.string().refine(
  (name): name is RoutePattern => ROUTE_PATTERNS.some((pattern) => pattern === name),
  { message: `pattern must be one of: ${ROUTE_PATTERNS.join(', ')}` },
)

export const cipherKeySchema: z.ZodType<CipherKey, z.ZodTypeDef, unknown> = z.discriminatedUnion('cipher', [
  z.object({ cipher: z.literal('caesar'), shift: z.number().int() }),
  z.object({ cipher: z.literal('affine'), a: z.number().int(), b: z.number().int() }),
  z.object({ cipher: z.literal('atbash') }),
  z.object({ cipher: z.literal('august'), shift: z.number().int() }),
  z.object({ cipher: z.literal('vigenere'), keyword }),
  z.object({ cipher: z.literal('beaufort'), keyword }),
  z.object({ cipher: z.literal('autokey'), keyword }),
  // Cofactor expansion grows factorially, so keys stay small
  z.object({ cipher: z.literal('hill'), matrix: z.array(z.array(z.number().int())).min(1).max(6) }),
  z.object({ cipher: z.literal('railFence'), rails: z.number().int() }),
  z.object({
    cipher: z.literal('route'),
    rows: z.number().int().min(1).max(1000),
    cols: z.number().int().min(1).max(1000),
    pattern: routePattern,
  }),
  z.object({ cipher: z.literal('myszkowski'), keyword }),
])

export const encryptRequestSchema = z.object({
  text: z.string(),
  key: cipherKeySchema,
})

export const decryptRequestSchema = z.object({
  text: z.string(),
  key: cipherKeySchema,
  padding: z.number().int().min(0).default(0),
})

export const frequencyRequestSchema = z.object({
  text: z.string(),
  n: z.number().int().default(1),
  asWord: z.boolean().default(false),
})

// Longest repeated sequence a request may ask for
const MAX_SEQUENCE_LENGTH = 100

export const repeatsRequestSchema = z.object({
  text: z.string(),
  minLength: z.number().int().default(3),
  maxLength: z.number().int().max(MAX_SEQUENCE_LENGTH).default(10),
})

export const analyzeRequestSchema = z.object({
  text: z.string().min(1, 'Ciphertext is required'),
})
