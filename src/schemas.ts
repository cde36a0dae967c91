import { z } from 'zod';

export const taskStateSchema = z.enum([
  'submitted',
  'working',
  'input-required',
  'completed',
  'canceled',
  'failed',
  'rejected',
  'auth-required',
  'unknown',
]);

export const agentCardSchema = z.record(z.unknown());

export const toolServerSchema = z.object({
  name: z.string().min(1).describe('Name of the tool server'),
  url: z.string().min(1).describe('URL of the tool server'),
  protocol: z.string().min(1).describe('Transport used by the tool server e.g. streamable_http, sse'),
  description: z.string().describe('Description of the tool server'),
});

export const expireAtSchema = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER));

export const agentNameSchema = z.string().trim().min(1).max(256);
