export {
  decodeEndpointGroups,
  inspectEndpointGroups,
  isTLSEnabled,
  loadEndpointConfig,
  parseEndpointMode,
  type EndpointGroupInspection,
} from './config/endpoint/index.js';
export { loadEndpointGroupsFromEnv, readEndpointSources } from './config/index.js';
export { EndpointEnvSchema, type EndpointEnv } from './config/schemas/env.schema.js';
export {
  EndpointGroupSchema,
  EndpointGroupsDocumentSchema,
  TLSConfigurationSchema,
  type EndpointGroupInput,
} from './config/schemas/endpointGroup.schema.js';
export {
  DEFAULT_SD_REFRESH_INTERVAL,
  FileSDConfigSchema,
  type FileSDConfigInput,
} from './config/schemas/fileSd.schema.js';
export * from './types/EndpointGroup.type.js';
export * from './types/Error.types.js';
export { default as logger, logErrorContext } from './utils/Logger.js';
