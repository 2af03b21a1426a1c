/**
 * Endpoint group configuration
 *
 * Merges the endpoint configuration document with the static, strict and
 * discovered endpoint sources into one validated list of endpoint groups.
 */

export {
  decodeEndpointGroups,
  loadEndpointConfig,
  parseEndpointMode,
} from './EndpointConfigLoader.js';
export {
  inspectEndpointGroups,
  isTLSEnabled,
  type EndpointGroupInspection,
} from './EndpointGroupInspector.js';
