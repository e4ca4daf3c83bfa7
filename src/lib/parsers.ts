import type { MicroformatsEntry } from '../types/micropub.js';
import busboy from 'busboy';
import { Readable } from 'node:stream';
import { InvalidRequestError } from './errors.js';

export type FormFields = Record<string, string | string[]>;

export type ParsedBody =
  | { format: 'json'; data: unknown }
  | { format: 'form'; data: FormFields };

/** Request-level fields that are not entry properties */
const RESERVED_FIELDS = new Set(['h', 'action', 'access_token']);

function appendField(fields: FormFields, key: string, value: string): void {
  // Array notation: category[]=foo&category[]=bar
  if (key.endsWith('[]')) {
    const actualKey = key.slice(0, -2);
    const existing = fields[actualKey];
    fields[actualKey] =
      existing === undefined ? [value] : [...(Array.isArray(existing) ? existing : [existing]), value];
    return;
  }

  // Repeated keys become arrays too
  const existing = fields[key];
  if (existing === undefined) {
    fields[key] = value;
  } else {
    fields[key] = [...(Array.isArray(existing) ? existing : [existing]), value];
  }
}

/**
 * Parse form-encoded data with bracket notation support
 * Example: category[]=foo&category[]=bar becomes { category: ['foo', 'bar'] }
 */
export function parseFormEncoded(body: string): FormFields {
  const result: FormFields = {};
  for (const [key, value] of new URLSearchParams(body).entries()) {
    appendField(result, key, value);
  }
  return result;
}

/**
 * First value of a form field
 */
export function formValue(fields: FormFields, key: string): string | undefined {
  const value = fields[key];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * First value of a form field that the request cannot do without
 * @throws InvalidRequestError when missing or empty
 */
export function requireFormValue(fields: FormFields, key: string): string {
  const value = formValue(fields, key);
  if (!value) {
    throw new InvalidRequestError(`Missing ${key}`);
  }
  return value;
}

/**
 * Every value of a form field
 */
export function formValues(fields: FormFields, key: string): string[] {
  const value = fields[key];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Convert form-encoded data to Microformats2 entry
 */
export function formToMicroformats(data: FormFields): MicroformatsEntry {
  const type = formValue(data, 'h') || 'entry';
  const properties: Record<string, unknown[]> = {};

  for (const [key, value] of Object.entries(data)) {
    if (RESERVED_FIELDS.has(key)) {
      continue;
    }
    properties[key] = Array.isArray(value) ? value : [value];
  }

  return {
    type: [`h-${type}`],
    properties,
  };
}

/**
 * Parse JSON request body
 */
export async function parseJSON(request: Request): Promise<unknown> {
  const text = await request.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidRequestError('Invalid JSON');
  }
}

/**
 * Parse multipart/form-data fields. File parts are drained and dropped.
 */
export async function parseMultipart(request: Request): Promise<FormFields> {
  const contentType = request.headers.get('content-type');
  if (!contentType) {
    throw new InvalidRequestError('Missing content-type header');
  }

  const body = Buffer.from(await request.arrayBuffer());

  return new Promise((resolve, reject) => {
    const fields: FormFields = {};
    const bb = busboy({ headers: { 'content-type': contentType } });

    bb.on('file', (_fieldname, file) => {
      file.resume();
    });

    bb.on('field', (fieldname, value) => {
      appendField(fields, fieldname, value);
    });

    bb.on('close', () => {
      resolve(fields);
    });

    bb.on('error', (error) => {
      reject(new InvalidRequestError(`Malformed multipart body: ${String(error)}`));
    });

    Readable.from(body).pipe(bb);
  });
}

/**
 * Detect request content type
 */
export function getContentType(request: Request): string | null {
  const contentType = request.headers.get('content-type');
  if (!contentType) {
    return null;
  }

  // Extract the base content type (ignore charset and other parameters)
  return (contentType.split(';')[0] ?? '').trim().toLowerCase();
}

/**
 * Parse request body based on content type
 */
export async function parseRequest(request: Request): Promise<ParsedBody> {
  const contentType = getContentType(request);

  if (!contentType) {
    throw new InvalidRequestError('Missing content-type header');
  }

  if (contentType === 'application/json') {
    return { format: 'json', data: await parseJSON(request) };
  }

  if (contentType === 'application/x-www-form-urlencoded') {
    return { format: 'form', data: parseFormEncoded(await request.text()) };
  }

  if (contentType === 'multipart/form-data') {
    return { format: 'form', data: await parseMultipart(request) };
  }

  throw new InvalidRequestError(`Unsupported content type: ${contentType}`);
}

/**
 * Form fields from a form-encoded or multipart body. JSON bodies are
 * accepted when they are a flat object of strings.
 */
export async function parseFormRequest(request: Request): Promise<FormFields> {
  const parsed = await parseRequest(request);
  if (parsed.format === 'form') {
    return parsed.data;
  }

  const fields: FormFields = {};
  if (typeof parsed.data === 'object' && parsed.data !== null && !Array.isArray(parsed.data)) {
    for (const [key, value] of Object.entries(parsed.data)) {
      if (typeof value === 'string') {
        fields[key] = value;
      } else if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
        fields[key] = value;
      }
    }
  }
  return fields;
}
