/**
 * Canonical JSON for hashing: object keys sorted by code unit, no
 * whitespace, `undefined` members dropped. Two implementations that agree on
 * these rules produce identical record hashes.
 */

export function canonicalJson(value: unknown): string {
  return serializeValue(value);
}

function serializeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return serializeNumber(value);
    case 'string':
      return JSON.stringify(value);
    case 'object':
      if (Array.isArray(value)) {
        return '[' + value.map((item) => serializeValue(item)).join(',') + ']';
      }
      return serializeObject(value);
    default:
      return 'null';
  }
}

function serializeNumber(num: number): string {
  if (!Number.isFinite(num)) {
    return 'null';
  }
  // ECMAScript NumberToString already yields the shortest round-trip form.
  return JSON.stringify(num);
}

function serializeObject(obj: object): string {
  const entries = Object.entries(obj)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return '{' + entries.map(([key, val]) => JSON.stringify(key) + ':' + serializeValue(val)).join(',') + '}';
}
