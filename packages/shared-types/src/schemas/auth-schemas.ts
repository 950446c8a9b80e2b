/**
 * Zod schemas for authentication boundaries
 *
 * Validates stored session tokens, OAuth state records, and callback query params.
 */

import {z} from 'zod'

// ===== Session Token =====

export const SessionTokenSchema = z.object({
  accessToken: z.string().min(1),
  expiresAt: z.number().int().positive(),
  refreshToken: z.string().min(1),
  scope: z.string().optional(),
})

// ===== OAuth State Record =====

export const OAuthStateRecordSchema = z.object({
  codeVerifier: z.string().min(43).max(128),
  createdAt: z.number(),
  state: z.string().min(16),
})

// ===== Callback Query =====

export const OAuthCallbackQuerySchema = z.object({
  code: z.string().optional(),
  error: z.string().optional(),
  state: z.string().optional(),
})

// ===== Session Status =====

export const SessionStatusSchema = z.object({
  authenticated: z.boolean(),
  expires_at: z.string().datetime().nullable(),
})

export const LoginSuccessSchema = z.object({
  expires_at: z.string().datetime(),
  message: z.string(),
  session_id: z.string(),
})

// ===== Type Exports =====

export type SessionToken = z.infer<typeof SessionTokenSchema>
export type OAuthStateRecord = z.infer<typeof OAuthStateRecordSchema>
export type OAuthCallbackQuery = z.infer<typeof OAuthCallbackQuerySchema>
export type SessionStatus = z.infer<typeof SessionStatusSchema>
export type LoginSuccess = z.infer<typeof LoginSuccessSchema>
