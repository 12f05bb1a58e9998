// Lightweight helpers to convert object keys between snake_case and camelCase recursively

const camelize = (str: string) => str.replace(/_([a-z0-9])/g, (_, g: string) => g.toUpperCase());
const snakify = (str: string) => str.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);

function convertKeys(input: unknown, convert: (key: string) => string): unknown {
  if (Array.isArray(input)) {
    return input.map((v) => convertKeys(v, convert));
  }
  if (input && typeof input === 'object' && !(input instanceof Uint8Array)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(input)) {
      out[convert(k)] = convertKeys(v, convert);
    }
    return out;
  }
  return input;
}

export function toCamelCaseKeys(input: unknown): unknown {
  return convertKeys(input, camelize);
}

export function toSnakeCaseKeys(input: unknown): unknown {
  return convertKeys(input, snakify);
}
