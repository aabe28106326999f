import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalNumber = z
  .string()
  .optional()
  .transform(val => (val === undefined || val.trim() === '' ? undefined : Number(val)))
  .pipe(z.number().positive().optional());

const envSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Inference overrides (see src/config/inference.ts for the defaults)
  PAR_WFS_HZ: optionalNumber,
  PAR_FIELD_STRENGTH: optionalNumber,
  PAR_TE_FALLBACK: optionalNumber,
  PAR_EES_FALLBACK: optionalNumber,
  PAR_PHASE_FALLBACK: z.enum(['i', 'i-', 'j', 'j-']).optional(),
});

const env = envSchema.parse(process.env);

export const config = {
  tool: {
    name: 'par-bids-sidecar',
    version: '1.0.0',
  },
  logging: {
    level: env.LOG_LEVEL,
  },
  inference: {
    waterFatShiftHz: env.PAR_WFS_HZ,
    magneticFieldStrength: env.PAR_FIELD_STRENGTH,
    echoTimeFallback: env.PAR_TE_FALLBACK,
    effectiveEchoSpacingFallback: env.PAR_EES_FALLBACK,
    phaseEncodingFallback: env.PAR_PHASE_FALLBACK,
  },
  env: env.NODE_ENV,
  isDevelopment: env.NODE_ENV === 'development',
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
};
