import type { EndpointGroup, TLSConfiguration } from '../../types/EndpointGroup.type.js';

export interface EndpointGroupInspection {
  warnings: string[];
}

function hasValue(value: string | undefined): boolean {
  return value !== undefined && value !== '';
}

export function isTLSEnabled(tls: TLSConfiguration): boolean {
  return (
    hasValue(tls.certFile) || hasValue(tls.keyFile) || hasValue(tls.caFile) || hasValue(tls.serverName)
  );
}

function describeGroup(group: EndpointGroup, index: number): string {
  return group.name !== '' ? `"${group.name}"` : `#${index}`;
}

/**
 * Non-fatal consistency checks over an already validated list of groups.
 * Group names are not required to be unique and are not checked here.
 */
export function inspectEndpointGroups(groups: readonly EndpointGroup[]): EndpointGroupInspection {
  const warnings: string[] = [];

  groups.forEach((group, index) => {
    const label = describeGroup(group, index);

    if (group.endpoints.length === 0 && group.endpointsDiscovery.length === 0) {
      warnings.push(`Endpoint group ${label} has neither endpoints nor sd-files configured`);
    }

    const { certFile, keyFile } = group.tlsConfig;
    if (hasValue(certFile) && !hasValue(keyFile)) {
      warnings.push(`Endpoint group ${label} sets cert_file without key_file`);
    } else if (hasValue(keyFile) && !hasValue(certFile)) {
      warnings.push(`Endpoint group ${label} sets key_file without cert_file`);
    }
  });

  return { warnings };
}
