import { z } from 'zod';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const ConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info')
});
export type Config = z.infer<typeof ConfigSchema>;

// Base-10 digits only; coercion would let '' and '1e3' through
const countField = (field: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${field} must be a non-negative integer`)
    .transform((value) => Number.parseInt(value, 10))
    .refine(Number.isSafeInteger, `${field} is too large`);

export const RunInputSchema = z.object({
  workers: countField('workers'),
  linesPerWorker: countField('lines')
});
export type RunInput = z.infer<typeof RunInputSchema>;

export const WorkerEnvSchema = z.object({
  WORKER_ID: z.string().min(1),
  LINE_COUNT: countField('LINE_COUNT'),
  LINE_LENGTH: countField('LINE_LENGTH'),
  LOG_LEVEL: LogLevelSchema.default('info')
});
export type WorkerEnv = z.infer<typeof WorkerEnvSchema>;

// IPC messages sent from a worker process to the parent
export const WorkerMessageSchema = z.object({
  type: z.literal('result'),
  workerId: z.string(),
  pid: z.number().int(),
  linesEmitted: z.number().int().min(0)
});
export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;
