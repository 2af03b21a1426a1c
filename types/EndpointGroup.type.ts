/**
 * Mode of an endpoint group.
 * Strict groups are fully static: they never take endpoints from service discovery.
 */
export enum EndpointMode {
  DEFAULT = '',
  STRICT = 'strict',
}

/**
 * TLS material for a set of Store API endpoints.
 * A configuration with no field set means TLS is not used for the group.
 */
export type TLSConfiguration = {
  /** TLS certificate file identifying this client to the server */
  certFile?: string;

  /** Key file for the client's certificate */
  keyFile?: string;

  /** CA certificates file used to verify the gRPC servers */
  caFile?: string;

  /** Server name used to verify the hostname on the returned certificates */
  serverName?: string;
};

/**
 * File based service discovery source.
 * The endpoint loader never looks inside it; it is handed on to the discovery layer as-is.
 */
export type FileSDConfig = {
  files: string[];
  refreshInterval: string;
};

/**
 * A named collection of Store API endpoints sharing TLS settings and a mode.
 */
export type EndpointGroup = {
  name: string;
  tlsConfig: TLSConfiguration;
  endpoints: string[];
  endpointsDiscovery: FileSDConfig[];
  mode: EndpointMode;
};

/**
 * An endpoint group as decoded from the configuration document, before its mode is checked.
 */
export type RawEndpointGroup = Omit<EndpointGroup, 'mode'> & {
  mode: string;
};

/**
 * Everything the endpoint loader merges into the final list of groups.
 */
export type EndpointSources = {
  /** YAML document describing a sequence of endpoint groups */
  document?: string | Uint8Array;

  /** Addresses merged as one extra default-mode group */
  endpointAddrs?: readonly string[];

  /** Addresses merged as one extra strict-mode group */
  strictEndpointAddrs?: readonly string[];

  /** Discovery source attached to the default-mode group built from endpointAddrs */
  fileSDConfig?: FileSDConfig;

  /** TLS settings for the groups built from endpointAddrs and strictEndpointAddrs */
  tlsConfig?: TLSConfiguration;
};
