/**
 * Product attribute bag → typed canonical attributes.
 *
 * The bag is a JSON object stored on the product. Each key is resolved against the
 * shop's attribute definitions (case-insensitive) to pick a data type, a label and a
 * priority. Values are coerced into a tagged union instead of being kept as strings.
 */

import type { AttributeDataType, AttributeDefinitionRecord } from '@shopsense/types';

export type AttributeValue =
  | Readonly<{ kind: 'text'; value: string }>
  | Readonly<{ kind: 'number'; value: number }>
  | Readonly<{ kind: 'boolean'; value: boolean }>
  | Readonly<{ kind: 'date'; value: string }>;

export type CanonicalAttribute = Readonly<{
  value: AttributeValue;
  dataType: AttributeDataType;
  semanticLabel: string;
  priority: number;
}>;

export type ParsedAttributeBag = Readonly<{
  entries: ReadonlyMap<string, unknown>;
  /** Set when the blob was present but not a JSON object. */
  malformed: boolean;
}>;

const TRUE_STRINGS = new Set(['true', 'yes', '1']);
const FALSE_STRINGS = new Set(['false', 'no', '0']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseAttributeBag(raw: string | null | undefined): ParsedAttributeBag {
  if (!raw?.trim()) return { entries: new Map(), malformed: false };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { entries: new Map(), malformed: true };
  }
  if (!isPlainObject(parsed)) return { entries: new Map(), malformed: true };

  return { entries: new Map(Object.entries(parsed)), malformed: false };
}

function toText(raw: unknown): AttributeValue | null {
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    return trimmed ? { kind: 'text', value: trimmed } : null;
  }
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { kind: 'text', value: String(raw) } : null;
  }
  if (typeof raw === 'boolean') return { kind: 'text', value: raw ? 'Yes' : 'No' };
  if (Array.isArray(raw)) {
    const parts = raw
      .map((item) => toText(item))
      .filter((item): item is AttributeValue => item !== null)
      .map(formatAttributeValue);
    return parts.length > 0 ? { kind: 'text', value: parts.join(', ') } : null;
  }
  if (isPlainObject(raw)) {
    return Object.keys(raw).length > 0 ? { kind: 'text', value: JSON.stringify(raw) } : null;
  }
  return null;
}

function toNumber(raw: unknown): AttributeValue | null {
  if (typeof raw === 'number' && Number.isFinite(raw)) return { kind: 'number', value: raw };
  if (typeof raw === 'string' && raw.trim()) {
    const parsed = Number(raw.trim());
    if (Number.isFinite(parsed)) return { kind: 'number', value: parsed };
  }
  return null;
}

function toBoolean(raw: unknown): AttributeValue | null {
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw };
  if (typeof raw === 'string') {
    const normalized = raw.trim().toLowerCase();
    if (TRUE_STRINGS.has(normalized)) return { kind: 'boolean', value: true };
    if (FALSE_STRINGS.has(normalized)) return { kind: 'boolean', value: false };
  }
  return null;
}

function toDate(raw: unknown): AttributeValue | null {
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim();
  if (!trimmed || Number.isNaN(Date.parse(trimmed))) return null;
  return { kind: 'date', value: trimmed };
}

/**
 * Coerces a raw bag value. Values that do not fit the declared type fall back to text;
 * empty values (blank strings, empty arrays/objects, null) yield `null`.
 */
export function coerceAttributeValue(
  raw: unknown,
  dataType: AttributeDataType | undefined
): AttributeValue | null {
  switch (dataType) {
    case 'number':
      return toNumber(raw) ?? toText(raw);
    case 'boolean':
      return toBoolean(raw) ?? toText(raw);
    case 'date':
      return toDate(raw) ?? toText(raw);
    case 'text':
      return toText(raw);
    case undefined:
      if (typeof raw === 'number') return toNumber(raw);
      if (typeof raw === 'boolean') return toBoolean(raw);
      return toText(raw);
  }
}

export function formatAttributeValue(value: AttributeValue): string {
  switch (value.kind) {
    case 'text':
    case 'date':
      return value.value;
    case 'number':
      return String(value.value);
    case 'boolean':
      return value.value ? 'Yes' : 'No';
  }
}

export function normalizeAttributes(
  bag: ReadonlyMap<string, unknown>,
  definitions: readonly AttributeDefinitionRecord[]
): Map<string, CanonicalAttribute> {
  const byName = new Map(definitions.map((d) => [d.name.trim().toLowerCase(), d]));
  const result = new Map<string, CanonicalAttribute>();

  for (const [key, raw] of bag) {
    const definition = byName.get(key.trim().toLowerCase());
    if (definition && !definition.includeInEmbedding) continue;

    const value = coerceAttributeValue(raw, definition?.dataType);
    if (!value) continue;

    result.set(key, {
      value,
      dataType: value.kind,
      semanticLabel: definition
        ? definition.semanticLabel?.trim() || definition.displayName.trim() || key
        : key,
      priority: definition?.embeddingPriority ?? 0,
    });
  }

  return result;
}

/** Priority descending; equal priorities keep bag order. */
export function orderAttributes(
  attributes: ReadonlyMap<string, CanonicalAttribute>
): [string, CanonicalAttribute][] {
  return [...attributes.entries()].sort(([, a], [, b]) => b.priority - a.priority);
}
