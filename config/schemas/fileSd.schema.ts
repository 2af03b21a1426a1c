import { z } from 'zod';
import type { FileSDConfig } from '../../types/EndpointGroup.type.js';

export const DEFAULT_SD_REFRESH_INTERVAL = '5m';

// A file pattern may hold a single '*', and only inside its last path segment.
const FILE_SD_PATH_PATTERN = /^[^*]*(\*[^/]*)?\.(json|yml|yaml|JSON|YML|YAML)$/;

const DURATION_PATTERN =
  /^(([0-9]+)y)?(([0-9]+)w)?(([0-9]+)d)?(([0-9]+)h)?(([0-9]+)m)?(([0-9]+)s)?(([0-9]+)ms)?$/;

const MISSING_FILES_MESSAGE =
  'file service discovery config must contain at least one path name';

/**
 * Duration in the `1h30m` / `30s` / `250ms` notation. `0` is accepted, the empty string is not.
 */
export const DurationSchema = z
  .string()
  .refine((value) => value === '0' || (value !== '' && DURATION_PATTERN.test(value)), (value) => ({
    message: `not a valid duration string: "${value}"`,
  }));

export const FileSDPathSchema = z
  .string()
  .refine((value) => FILE_SD_PATH_PATTERN.test(value), (value) => ({
    message: `path name "${value}" is not valid for file discovery`,
  }));

/**
 * One entry of `endpoints_sd_files`.
 */
export const FileSDConfigSchema = z
  .object({
    files: z.array(FileSDPathSchema, { required_error: MISSING_FILES_MESSAGE }).min(1, MISSING_FILES_MESSAGE),
    refresh_interval: DurationSchema.nullish(),
  })
  .strict()
  .transform(
    (raw): FileSDConfig => ({
      files: raw.files,
      refreshInterval: raw.refresh_interval ?? DEFAULT_SD_REFRESH_INTERVAL,
    }),
  );

export type FileSDConfigInput = z.input<typeof FileSDConfigSchema>;
