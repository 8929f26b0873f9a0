/**
 * Metadata documents are opaque JSON objects.
 *
 * The core never looks inside them beyond checking their shape; it only
 * copies them so that stored snapshots stay immutable.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type MetadataDocument = { [key: string]: JsonValue };

function isJsonValue(value: unknown, seen: Set<object>): boolean {
  if (value === null) return true;
  if (typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (typeof value !== "object") return false;
  if (seen.has(value)) return false;
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.every((item) => isJsonValue(item, seen));
    }
    if (!isPlainObject(value)) return false;
    return Object.values(value).every((item) => isJsonValue(item, seen));
  } finally {
    seen.delete(value);
  }
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check that a value is a JSON object usable as package content.
 *
 * Rejects arrays, class instances, cycles and non-finite numbers.
 */
export function isMetadataDocument(value: unknown): value is MetadataDocument {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  return isJsonValue(value, new Set());
}

/**
 * Deep copy of a document.
 */
export function cloneDocument(document: MetadataDocument): MetadataDocument {
  return structuredClone(document);
}

/**
 * Shallow merge of top-level keys, as used by partial updates.
 */
export function mergeDocuments(base: MetadataDocument, patch: MetadataDocument): MetadataDocument {
  return { ...cloneDocument(base), ...cloneDocument(patch) };
}

/**
 * Serialize a document for storage media that keep text.
 */
export function encodeDocument(document: MetadataDocument): string {
  return JSON.stringify(document, null, 2);
}

/**
 * Parse text written by {@link encodeDocument}.
 *
 * @throws SyntaxError when the text is not JSON
 * @throws TypeError when the JSON is not an object
 */
export function decodeDocument(text: string): MetadataDocument {
  const parsed: unknown = JSON.parse(text);
  if (!isMetadataDocument(parsed)) {
    throw new TypeError("Stored metadata is not a JSON object");
  }
  return parsed;
}
