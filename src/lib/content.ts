import type {
  ContentValue,
  EntryDocument,
  EntryProperty,
  PostStatus,
  Visibility,
} from '../types/entry.js';
import type { MicroformatsEntry, UpdateOperation } from '../types/micropub.js';
import { htmlToText } from './html.js';

const VISIBILITIES: readonly Visibility[] = ['public', 'unlisted', 'private'];
const POST_STATUSES: readonly PostStatus[] = ['published', 'draft'];

type StringKind = 'name' | 'summary' | 'category' | 'in-reply-to';
const STRING_KINDS: readonly StringKind[] = ['name', 'summary', 'category', 'in-reply-to'];

function isStringKind(name: string): name is StringKind {
  return STRING_KINDS.some((kind) => kind === name);
}

function isStringArray(values: unknown[]): values is string[] {
  return values.every((value) => typeof value === 'string');
}

function isContentValue(value: unknown): value is ContentValue {
  if (typeof value === 'string') return true;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;

  const keys = Object.keys(value);
  if (!keys.every((key) => key === 'value' || key === 'html')) return false;
  if (!('value' in value) || typeof value.value !== 'string') return false;
  return !('html' in value) || typeof value.html === 'string';
}

function isOneOf<T extends string>(options: readonly T[], value: unknown): value is T {
  return options.some((option) => option === value);
}

function toProperty(name: string, values: unknown[]): EntryProperty {
  if (isStringKind(name) && isStringArray(values)) {
    return { kind: name, values };
  }
  if (name === 'content' && values.every(isContentValue)) {
    return { kind: 'content', values };
  }
  const [single] = values;
  if (values.length === 1) {
    if (name === 'visibility' && isOneOf(VISIBILITIES, single)) {
      return { kind: 'visibility', value: single };
    }
    if (name === 'post-status' && isOneOf(POST_STATUSES, single)) {
      return { kind: 'post-status', value: single };
    }
  }
  return { kind: 'opaque', name, values };
}

function propertyName(property: EntryProperty): string {
  return property.kind === 'opaque' ? property.name : property.kind;
}

function propertyValues(property: EntryProperty): unknown[] {
  switch (property.kind) {
    case 'visibility':
    case 'post-status':
      return [property.value];
    default:
      return property.values;
  }
}

/**
 * Read a microformats2 document into the typed form. Properties whose
 * values do not match a recognised shape are kept as `opaque`, so
 * `toMicroformats(toDocument(x))` reproduces `x`.
 */
export function toDocument(entry: MicroformatsEntry): EntryDocument {
  const document: EntryDocument = {
    type: [...entry.type],
    properties: Object.entries(entry.properties).map(([name, values]) =>
      toProperty(name, values)
    ),
  };
  if (entry.children !== undefined) {
    document.children = entry.children;
  }
  return document;
}

export function toMicroformats(document: EntryDocument): MicroformatsEntry {
  const properties: MicroformatsEntry['properties'] = {};
  for (const property of document.properties) {
    properties[propertyName(property)] = propertyValues(property);
  }

  const entry: MicroformatsEntry = { type: [...document.type], properties };
  if (document.children !== undefined) {
    entry.children = document.children;
  }
  return entry;
}

export function getProperty<K extends EntryProperty['kind']>(
  document: EntryDocument,
  kind: K
): Extract<EntryProperty, { kind: K }> | undefined {
  return document.properties.find(
    (property): property is Extract<EntryProperty, { kind: K }> => property.kind === kind
  );
}

export function getVisibility(entry: MicroformatsEntry): Visibility {
  return getProperty(toDocument(entry), 'visibility')?.value ?? 'public';
}

export function getPostStatus(entry: MicroformatsEntry): PostStatus {
  return getProperty(toDocument(entry), 'post-status')?.value ?? 'published';
}

export function firstString(entry: MicroformatsEntry, name: string): string | null {
  const value = entry.properties[name]?.[0];
  return typeof value === 'string' ? value : null;
}

export function contentText(value: ContentValue): string {
  if (typeof value === 'string') return value;
  if (value.html !== undefined && value.value === '') return htmlToText(value.html);
  return value.value;
}

export interface EntryText {
  name: string;
  summary: string;
  content: string;
  category: string;
}

/**
 * The text columns fed to the full-text index.
 */
export function entryText(entry: MicroformatsEntry): EntryText {
  const document = toDocument(entry);
  return {
    name: getProperty(document, 'name')?.values.join(' ') ?? '',
    summary: getProperty(document, 'summary')?.values.join(' ') ?? '',
    content: getProperty(document, 'content')?.values.map(contentText).join(' ') ?? '',
    category: getProperty(document, 'category')?.values.join(' ') ?? '',
  };
}

function sameValue(a: unknown, b: unknown): boolean {
  return a === b || JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Apply Micropub update operations. Properties no operation names are
 * carried over untouched; a property left without values is removed.
 */
export function applyUpdates(
  entry: MicroformatsEntry,
  operations: UpdateOperation[]
): MicroformatsEntry {
  const properties: MicroformatsEntry['properties'] = { ...entry.properties };

  for (const operation of operations) {
    switch (operation.action) {
      case 'replace':
        properties[operation.property] = [...operation.value];
        break;

      case 'add':
        properties[operation.property] = [
          ...(properties[operation.property] ?? []),
          ...operation.value,
        ];
        break;

      case 'delete': {
        const removed = operation.value;
        if (removed === undefined) {
          delete properties[operation.property];
          break;
        }
        const kept = (properties[operation.property] ?? []).filter(
          (value) => !removed.some((candidate) => sameValue(candidate, value))
        );
        if (kept.length > 0) {
          properties[operation.property] = kept;
        } else {
          delete properties[operation.property];
        }
        break;
      }
    }

    if (properties[operation.property]?.length === 0) {
      delete properties[operation.property];
    }
  }

  const updated: MicroformatsEntry = { type: [...entry.type], properties };
  if (entry.children !== undefined) {
    updated.children = entry.children;
  }
  return updated;
}
