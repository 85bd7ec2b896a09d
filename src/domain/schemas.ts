import { z } from 'zod';

const AMOUNT = /^\d+(\.\d+)?$/;

export const AccessRequestSchema = z.object({
    userAddress: z.string().min(1),
    resourcePath: z.string().min(1),
    nonce: z.string().min(1).optional(),
    amount: z.string().regex(AMOUNT, 'amount must be a decimal string').optional(),
});

export const VerifyQuerySchema = z.object({
    address: z.string().min(1),
});

export type AccessRequest = z.infer<typeof AccessRequestSchema>;
