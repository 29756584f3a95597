// src/core/auth/types.ts

import { z } from 'zod';

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export const AccessTokenResponseSchema = z
  .object({
    accessToken: z.string().min(1),
    expiresIn: z.number().optional(),
    tokenType: z.string().optional(),
  })
  .passthrough();
