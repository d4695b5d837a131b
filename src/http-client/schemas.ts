// src/http-client/schemas.ts

import { z } from 'zod';

/**
 * Successful reply of the IAM token service
 */
export const TokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
});

/**
 * Error reply of the IAM token service
 */
export const TokenErrorSchema = z.object({
    errorMessage: z.string(),
});

export const SessionInfoSchema = z
    .object({
        ok: z.boolean().optional(),
        userCtx: z
            .object({
                name: z.string().nullable(),
                roles: z.array(z.string()),
            })
            .optional(),
        info: z.record(z.unknown()).optional(),
    })
    .passthrough();
