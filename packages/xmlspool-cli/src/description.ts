/**
 * Document descriptions
 *
 * The CLI renders documents described in JSON. A description is checked
 * completely before anything is written, so invalid input never produces
 * partial output.
 */

export interface DeclarationDescription {
  version?: string;
  encoding?: string;
  standalone?: boolean;
}

export interface DoctypeDescription {
  name: string;
  systemId?: string;
  publicId?: string;
  internalSubset?: string;
}

export interface ElementDescription {
  element: string;
  /** Prefix declared under `namespaces` */
  ns?: string;
  /** Attribute values by name; `prefix:name` for attributes in a namespace */
  attributes?: Record<string, string>;
  /** Build the element detached, add it, then release it */
  buffered?: boolean;
  /** Keep the element buffered until all following siblings are written */
  deferred?: boolean;
  children?: NodeDescription[];
}

export interface FragmentDescription {
  fragment: NodeDescription[];
  deferred?: boolean;
}

export interface TextDescription {
  text: string;
}

export interface CDataDescription {
  cdata: string;
}

export interface CommentDescription {
  comment: string;
}

export interface EntityDescription {
  entity: string;
}

export interface ProcessingInstructionDescription {
  pi: string;
  data?: string;
}

export type NodeDescription =
  | ElementDescription
  | FragmentDescription
  | TextDescription
  | CDataDescription
  | CommentDescription
  | EntityDescription
  | ProcessingInstructionDescription;

export interface DocumentDescription {
  declaration?: DeclarationDescription;
  doctype?: DoctypeDescription;
  /** Namespace URIs by preferred prefix; '' for the default namespace */
  namespaces?: Record<string, string>;
  root: NodeDescription;
}

export class DescriptionError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'DescriptionError';
  }
}

type JsonObject = Record<string, unknown>;

const NODE_KEYS = ['element', 'fragment', 'text', 'cdata', 'comment', 'entity', 'pi'] as const;

/**
 * Parse and check a JSON document description
 */
export function parseDescription(json: string): DocumentDescription {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DescriptionError(`Invalid JSON: ${message}`, '');
  }
  return validateDescription(value);
}

/**
 * Check that a parsed value is a well-formed document description
 */
export function validateDescription(value: unknown): DocumentDescription {
  const doc = expectObject(value, '');
  const namespaces = optionalStringMap(doc.namespaces, 'namespaces');
  if (namespaces) {
    for (const prefix of Object.keys(namespaces)) {
      if (prefix === 'xml' || prefix === 'xmlns' || prefix.includes(':')) {
        throw new DescriptionError(`Invalid namespace prefix '${prefix}'`, 'namespaces');
      }
      if (namespaces[prefix] === '') {
        throw new DescriptionError(`Empty namespace URI for prefix '${prefix}'`, 'namespaces');
      }
    }
  }

  const description: DocumentDescription = {
    root: validateNode(doc.root, 'root', new Set(Object.keys(namespaces ?? {}))),
  };
  if (namespaces) {
    description.namespaces = namespaces;
  }
  if (doc.declaration !== undefined) {
    description.declaration = validateDeclaration(doc.declaration, 'declaration');
  }
  if (doc.doctype !== undefined) {
    description.doctype = validateDoctype(doc.doctype, 'doctype');
  }
  return description;
}

function validateDeclaration(value: unknown, path: string): DeclarationDescription {
  const obj = expectObject(value, path);
  const declaration: DeclarationDescription = {};
  const version = optionalString(obj.version, `${path}.version`);
  if (version !== undefined) {
    declaration.version = version;
  }
  const encoding = optionalString(obj.encoding, `${path}.encoding`);
  if (encoding !== undefined) {
    declaration.encoding = encoding;
  }
  if (obj.standalone !== undefined) {
    if (typeof obj.standalone !== 'boolean') {
      throw new DescriptionError('Expected a boolean', `${path}.standalone`);
    }
    declaration.standalone = obj.standalone;
  }
  return declaration;
}

function validateDoctype(value: unknown, path: string): DoctypeDescription {
  const obj = expectObject(value, path);
  const doctype: DoctypeDescription = { name: expectString(obj.name, `${path}.name`) };
  const systemId = optionalString(obj.systemId, `${path}.systemId`);
  const publicId = optionalString(obj.publicId, `${path}.publicId`);
  const internalSubset = optionalString(obj.internalSubset, `${path}.internalSubset`);
  if (publicId !== undefined && systemId === undefined) {
    throw new DescriptionError('A public id needs a system id', path);
  }
  if (systemId !== undefined) {
    doctype.systemId = systemId;
  }
  if (publicId !== undefined) {
    doctype.publicId = publicId;
  }
  if (internalSubset !== undefined) {
    doctype.internalSubset = internalSubset;
  }
  return doctype;
}

function validateNode(value: unknown, path: string, prefixes: Set<string>): NodeDescription {
  const obj = expectObject(value, path);
  const kinds = NODE_KEYS.filter((key) => key in obj);
  if (kinds.length !== 1) {
    throw new DescriptionError(
      kinds.length === 0
        ? `Expected one of: ${NODE_KEYS.join(', ')}`
        : `Ambiguous node: ${kinds.join(', ')}`,
      path
    );
  }

  switch (kinds[0]) {
    case 'element':
      return validateElement(obj, path, prefixes);
    case 'fragment': {
      const fragment: FragmentDescription = {
        fragment: validateChildren(obj.fragment, `${path}.fragment`, prefixes),
      };
      const deferred = optionalBoolean(obj.deferred, `${path}.deferred`);
      if (deferred !== undefined) {
        fragment.deferred = deferred;
      }
      return fragment;
    }
    case 'text':
      return { text: expectString(obj.text, `${path}.text`) };
    case 'cdata':
      return { cdata: expectString(obj.cdata, `${path}.cdata`) };
    case 'comment':
      return { comment: expectString(obj.comment, `${path}.comment`) };
    case 'entity':
      return { entity: expectName(obj.entity, `${path}.entity`) };
    case 'pi': {
      const pi: ProcessingInstructionDescription = { pi: expectName(obj.pi, `${path}.pi`) };
      const data = optionalString(obj.data, `${path}.data`);
      if (data !== undefined) {
        pi.data = data;
      }
      return pi;
    }
  }
}

function validateElement(obj: JsonObject, path: string, prefixes: Set<string>): ElementDescription {
  const element: ElementDescription = { element: expectName(obj.element, `${path}.element`) };

  const ns = optionalString(obj.ns, `${path}.ns`);
  if (ns !== undefined) {
    if (!prefixes.has(ns)) {
      throw new DescriptionError(`Undeclared namespace prefix '${ns}'`, `${path}.ns`);
    }
    element.ns = ns;
  }

  const attributes = optionalStringMap(obj.attributes, `${path}.attributes`);
  if (attributes) {
    for (const name of Object.keys(attributes)) {
      const colon = name.indexOf(':');
      const prefix = colon < 0 ? null : name.slice(0, colon);
      if (prefix !== null && prefix !== 'xml' && !prefixes.has(prefix)) {
        throw new DescriptionError(
          `Undeclared namespace prefix '${prefix}'`,
          `${path}.attributes.${name}`
        );
      }
      if (prefix === '' || name.slice(colon + 1) === '') {
        throw new DescriptionError('Invalid attribute name', `${path}.attributes.${name}`);
      }
    }
    element.attributes = attributes;
  }

  const buffered = optionalBoolean(obj.buffered, `${path}.buffered`);
  if (buffered !== undefined) {
    element.buffered = buffered;
  }
  const deferred = optionalBoolean(obj.deferred, `${path}.deferred`);
  if (deferred !== undefined) {
    element.deferred = deferred;
  }
  if (obj.children !== undefined) {
    element.children = validateChildren(obj.children, `${path}.children`, prefixes);
  }
  return element;
}

function validateChildren(value: unknown, path: string, prefixes: Set<string>): NodeDescription[] {
  if (!Array.isArray(value)) {
    throw new DescriptionError('Expected an array', path);
  }
  return value.map((child, i) => validateNode(child, `${path}[${i}]`, prefixes));
}

// ============ Primitive checks ============

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new DescriptionError('Expected an object', path);
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new DescriptionError('Expected a string', path);
  }
  return value;
}

function expectName(value: unknown, path: string): string {
  const name = expectString(value, path);
  if (name === '' || name.includes(':') || /\s/.test(name)) {
    throw new DescriptionError(`Invalid name '${name}'`, path);
  }
  return name;
}

function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined ? undefined : expectString(value, path);
}

function optionalBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new DescriptionError('Expected a boolean', path);
  }
  return value;
}

function optionalStringMap(value: unknown, path: string): Record<string, string> | undefined {
  if (value === undefined) {
    return undefined;
  }
  const obj = expectObject(value, path);
  const map: Record<string, string> = {};
  for (const [key, entry] of Object.entries(obj)) {
    map[key] = expectString(entry, `${path}.${key}`);
  }
  return map;
}
