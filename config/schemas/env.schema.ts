import { z } from 'zod';
import { DEFAULT_SD_REFRESH_INTERVAL, DurationSchema } from './fileSd.schema.js';

// Helper to properly parse boolean environment variables
const envBoolean = z.union([z.string(), z.boolean()]).transform((val, ctx) => {
  if (typeof val === 'boolean') return val;
  const normalized = val.toLowerCase().trim();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0' || normalized === '') return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid boolean value: ${val}` });
  return z.NEVER;
});

// Comma-separated list; blanks are dropped.
const envList = z
  .string()
  .optional()
  .transform((val) =>
    val === undefined
      ? []
      : val
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0),
  );

// Unset and blank are the same thing.
const envOptionalString = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === '' ? undefined : val.trim()));

// Using UPPERCASE for environment variables for easier parsing from dotenv
export const EndpointEnvSchema = z.object({
  /** Inline YAML endpoint configuration; wins over ENDPOINT_CONFIG_FILE */
  ENDPOINT_CONFIG: z.string().optional(),
  /** Path of a YAML endpoint configuration file */
  ENDPOINT_CONFIG_FILE: envOptionalString,
  ENDPOINTS: envList,
  STRICT_ENDPOINTS: envList,
  ENDPOINT_SD_FILES: envList,
  ENDPOINT_SD_INTERVAL: DurationSchema.default(DEFAULT_SD_REFRESH_INTERVAL),
  /** The GRPC_CLIENT_TLS_* settings below only apply when this is true */
  GRPC_CLIENT_TLS_SECURE: envBoolean.default(false),
  GRPC_CLIENT_TLS_CERT: envOptionalString,
  GRPC_CLIENT_TLS_KEY: envOptionalString,
  GRPC_CLIENT_TLS_CA: envOptionalString,
  GRPC_CLIENT_SERVER_NAME: envOptionalString,
});

export type EndpointEnv = z.infer<typeof EndpointEnvSchema>;
