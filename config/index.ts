import { readFileSync } from 'fs';
import baseLogger, { logErrorContext } from '../utils/Logger.js';
import { EndpointEnvSchema } from './schemas/env.schema.js';
import { FileSDConfigSchema } from './schemas/fileSd.schema.js';
import { inspectEndpointGroups, isTLSEnabled, loadEndpointConfig } from './endpoint/index.js';
import {
  EndpointMode,
  type EndpointGroup,
  type EndpointSources,
  type TLSConfiguration,
} from '../types/EndpointGroup.type.js';

/**
 * Gathers the endpoint sources from the environment.
 * Reads ENDPOINT_CONFIG_FILE from disk when no inline ENDPOINT_CONFIG is given.
 */
export function readEndpointSources(env: NodeJS.ProcessEnv = process.env): EndpointSources {
  const parsed = EndpointEnvSchema.parse(env);

  let document = parsed.ENDPOINT_CONFIG;
  if (document === undefined && parsed.ENDPOINT_CONFIG_FILE !== undefined) {
    document = readFileSync(parsed.ENDPOINT_CONFIG_FILE, 'utf-8');
  }

  const fileSDConfig =
    parsed.ENDPOINT_SD_FILES.length > 0
      ? FileSDConfigSchema.parse({
          files: parsed.ENDPOINT_SD_FILES,
          refresh_interval: parsed.ENDPOINT_SD_INTERVAL,
        })
      : undefined;

  const tlsConfig: TLSConfiguration = {};
  if (parsed.GRPC_CLIENT_TLS_SECURE) {
    if (parsed.GRPC_CLIENT_TLS_CERT) tlsConfig.certFile = parsed.GRPC_CLIENT_TLS_CERT;
    if (parsed.GRPC_CLIENT_TLS_KEY) tlsConfig.keyFile = parsed.GRPC_CLIENT_TLS_KEY;
    if (parsed.GRPC_CLIENT_TLS_CA) tlsConfig.caFile = parsed.GRPC_CLIENT_TLS_CA;
    if (parsed.GRPC_CLIENT_SERVER_NAME) tlsConfig.serverName = parsed.GRPC_CLIENT_SERVER_NAME;
  }

  return {
    document,
    endpointAddrs: parsed.ENDPOINTS,
    strictEndpointAddrs: parsed.STRICT_ENDPOINTS,
    fileSDConfig,
    tlsConfig,
  };
}

/**
 * Loads and validates the endpoint groups configured through the environment.
 * Errors are logged and rethrown; advisory warnings are only logged.
 */
export function loadEndpointGroupsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  logger: typeof baseLogger = baseLogger,
): EndpointGroup[] {
  let groups: EndpointGroup[];
  try {
    groups = loadEndpointConfig(readEndpointSources(env));
  } catch (error) {
    logErrorContext('Failed to load endpoint configuration:', error);
    throw error;
  }

  groups.forEach((group, index) => {
    logger.info(
      {
        name: group.name,
        mode: group.mode === EndpointMode.STRICT ? 'strict' : 'default',
        endpoints: group.endpoints.length,
        sdFiles: group.endpointsDiscovery.length,
        tls: isTLSEnabled(group.tlsConfig),
      },
      `Endpoint group #${index} configured`,
    );
  });

  for (const warning of inspectEndpointGroups(groups).warnings) {
    logger.warn(warning);
  }

  return groups;
}
