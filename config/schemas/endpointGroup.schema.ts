/**
 * Schema of the endpoint configuration document.
 *
 * The document is a YAML sequence of endpoint groups:
 *
 * ```yaml
 * - name: store-eu
 *   tls_config:
 *     cert_file: /certs/client.crt
 *     key_file: /certs/client.key
 *     ca_file: /certs/ca.crt
 *     server_name: store.eu.internal
 *   endpoints:
 *     - store-eu-0:10901
 *   endpoints_sd_files:
 *     - files: ['/etc/sd/stores-eu-*.json']
 *       refresh_interval: 1m
 * - name: store-us
 *   mode: strict
 *   endpoints:
 *     - store-us-0:10901
 * ```
 *
 * Every object is strict: a key the schema does not know fails the whole document.
 * An explicit `null` is read the same as an absent key.
 */
import { z } from 'zod';
import type { RawEndpointGroup, TLSConfiguration } from '../../types/EndpointGroup.type.js';
import { FileSDConfigSchema } from './fileSd.schema.js';

export const TLSConfigurationSchema = z
  .object({
    cert_file: z.string().nullish(),
    key_file: z.string().nullish(),
    ca_file: z.string().nullish(),
    server_name: z.string().nullish(),
  })
  .strict()
  .transform((raw): TLSConfiguration => {
    const tls: TLSConfiguration = {};
    if (raw.cert_file != null) tls.certFile = raw.cert_file;
    if (raw.key_file != null) tls.keyFile = raw.key_file;
    if (raw.ca_file != null) tls.caFile = raw.ca_file;
    if (raw.server_name != null) tls.serverName = raw.server_name;
    return tls;
  });

/**
 * A single group. `mode` stays a plain string here; the loader maps it onto EndpointMode.
 */
export const EndpointGroupSchema = z
  .object({
    name: z.string().nullish(),
    tls_config: TLSConfigurationSchema.nullish(),
    endpoints: z.array(z.string()).nullish(),
    endpoints_sd_files: z.array(FileSDConfigSchema).nullish(),
    mode: z.string().nullish(),
  })
  .strict()
  .transform(
    (raw): RawEndpointGroup => ({
      name: raw.name ?? '',
      tlsConfig: raw.tls_config ?? {},
      endpoints: raw.endpoints ?? [],
      endpointsDiscovery: raw.endpoints_sd_files ?? [],
      mode: raw.mode ?? '',
    }),
  );

// An empty document (comments only, or a bare `null`) holds no groups.
export const EndpointGroupsDocumentSchema = z
  .array(EndpointGroupSchema)
  .nullable()
  .transform((groups) => groups ?? []);

export type EndpointGroupInput = z.input<typeof EndpointGroupSchema>;
