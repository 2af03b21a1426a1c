import { parseDocument, visit, type Document } from 'yaml';
import type { ZodIssue } from 'zod';
import logger from '../../utils/Logger.js';
import { EndpointGroupsDocumentSchema } from '../schemas/endpointGroup.schema.js';
import {
  EndpointMode,
  type EndpointGroup,
  type EndpointSources,
  type RawEndpointGroup,
  type TLSConfiguration,
} from '../../types/EndpointGroup.type.js';
import {
  DecodeError,
  DuplicateEndpointError,
  InvalidModeError,
  ModeConflictError,
} from '../../types/Error.types.js';

function formatIssuePath(path: (string | number)[]): string {
  if (path.length === 0) return '<root>';
  return path
    .map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
    .join('');
}

function formatIssue(issue: ZodIssue): string {
  return `${formatIssuePath(issue.path)}: ${issue.message}`;
}

function firstLine(message: string): string {
  return message.split('\n', 1)[0].trim();
}

// Aliases a config file may expand to before the document is rejected.
const MAX_ALIAS_COUNT = 10000;

/**
 * Every field of the document is text, so numbers and booleans are read back as
 * they were written: `name: 2024` is "2024", `port: 0x1F` stays "0x1F".
 * Nulls and collections are left alone.
 */
function scalarsAsWritten(doc: Document, source: string): void {
  visit(doc, {
    Scalar(_key, node) {
      const { value, range } = node;
      if ((typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') && range) {
        node.value = source.slice(range[0], range[1]);
      }
    },
  });
}

function toPlainValue(doc: Document): unknown {
  try {
    return doc.toJS({ maxAliasCount: MAX_ALIAS_COUNT });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DecodeError([firstLine(message)], { cause: error });
  }
}

/**
 * Decodes a YAML document into endpoint groups.
 * Syntax errors, duplicate keys, several documents in one stream, unknown keys
 * and mistyped values all fail with a DecodeError.
 */
export function decodeEndpointGroups(document: string | Uint8Array): RawEndpointGroup[] {
  const source = typeof document === 'string' ? document : Buffer.from(document).toString('utf-8');

  const doc = parseDocument(source);
  if (doc.errors.length > 0) {
    throw new DecodeError(
      doc.errors.map((e) => firstLine(e.message)),
      { cause: doc.errors[0] },
    );
  }

  scalarsAsWritten(doc, source);
  const result = EndpointGroupsDocumentSchema.safeParse(toPlainValue(doc));
  if (!result.success) {
    throw new DecodeError(result.error.issues.map(formatIssue), { cause: result.error });
  }
  return result.data;
}

export function parseEndpointMode(raw: string): EndpointMode {
  switch (raw) {
    case EndpointMode.DEFAULT:
      return EndpointMode.DEFAULT;
    case EndpointMode.STRICT:
      return EndpointMode.STRICT;
    default:
      throw new InvalidModeError(raw);
  }
}

function copyTLSConfiguration(tls: TLSConfiguration | undefined): TLSConfiguration {
  return { ...tls };
}

/**
 * Merges the configuration document, the static and strict address lists and the
 * discovery source into one validated list of endpoint groups.
 *
 * Groups come out in this order: document groups as written, then the default-mode
 * group built from `endpointAddrs` / `fileSDConfig`, then the strict group built
 * from `strictEndpointAddrs`. The inputs are never modified.
 *
 * @throws DecodeError when the document cannot be decoded
 * @throws InvalidModeError when a document group has an unknown mode
 * @throws ModeConflictError when a strict document group lists sd-files
 * @throws DuplicateEndpointError when an address occurs more than once across all groups
 */
export function loadEndpointConfig(sources: EndpointSources): EndpointGroup[] {
  const { document, endpointAddrs = [], strictEndpointAddrs = [], fileSDConfig, tlsConfig } = sources;
  const groups: EndpointGroup[] = [];

  if (document !== undefined && document.length > 0) {
    const decoded = decodeEndpointGroups(document);

    // All modes are checked before any strict/discovery conflict is looked at.
    const modes = decoded.map((group) => parseEndpointMode(group.mode));

    decoded.forEach((group, i) => {
      if (modes[i] === EndpointMode.STRICT && group.endpointsDiscovery.length !== 0) {
        throw new ModeConflictError(group.name);
      }
    });

    decoded.forEach((group, i) => groups.push({ ...group, mode: modes[i] }));
  }

  if (endpointAddrs.length > 0 || fileSDConfig !== undefined) {
    groups.push({
      name: '',
      tlsConfig: copyTLSConfiguration(tlsConfig),
      endpoints: [...endpointAddrs],
      endpointsDiscovery: fileSDConfig !== undefined ? [fileSDConfig] : [],
      mode: EndpointMode.DEFAULT,
    });
  }

  if (strictEndpointAddrs.length > 0) {
    groups.push({
      name: '',
      tlsConfig: copyTLSConfiguration(tlsConfig),
      endpoints: [...strictEndpointAddrs],
      endpointsDiscovery: [],
      mode: EndpointMode.STRICT,
    });
  }

  const seen = new Set<string>();
  for (const group of groups) {
    for (const address of group.endpoints) {
      if (seen.has(address)) {
        throw new DuplicateEndpointError(address);
      }
      seen.add(address);
    }
  }

  logger.debug(
    `Loaded ${groups.length} endpoint group(s) with ${seen.size} static endpoint(s)`,
  );
  return groups;
}
