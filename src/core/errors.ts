export type HeapDictErrorCode =
  | "KEY_NOT_FOUND"
  | "EMPTY_COLLECTION"
  | "INVALID_ARGUMENT"
  | "INVALID_KEY"
  | "INVARIANT_VIOLATION";

export class HeapDictError extends Error {
  readonly code: HeapDictErrorCode;
  readonly title: string;
  readonly detail?: string;

  constructor(code: HeapDictErrorCode, detail?: string, options?: { cause?: unknown }) {
    const title = codeToTitle(code);
    super(detail ? `${title}: ${detail}` : title, options);
    this.name = "HeapDictError";
    this.code = code;
    this.title = title;
    this.detail = detail;
  }
}

export function isHeapDictError(err: unknown, code?: HeapDictErrorCode): err is HeapDictError {
  return err instanceof HeapDictError && (code === undefined || err.code === code);
}

export function keyNotFound(key: unknown): HeapDictError {
  return new HeapDictError("KEY_NOT_FOUND", describeValue(key));
}

export function emptyCollection(op: string): HeapDictError {
  return new HeapDictError("EMPTY_COLLECTION", `can't ${op}: heapdict is empty`);
}

function codeToTitle(code: HeapDictErrorCode): string {
  switch (code) {
    case "KEY_NOT_FOUND":
      return "Key not found";
    case "EMPTY_COLLECTION":
      return "Empty collection";
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "INVALID_KEY":
      return "Invalid key";
    case "INVARIANT_VIOLATION":
      return "Invariant violation";
  }
}

/** Short rendering of a value for error details and repr output. */
export function describeValue(v: unknown): string {
  switch (typeof v) {
    case "string":
      return `'${v.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
    case "bigint":
      return `${v}n`;
    case "number":
    case "boolean":
    case "undefined":
      return String(v);
    case "symbol":
      return v.toString();
    case "function":
      return `[function ${v.name || "anonymous"}]`;
  }
  if (v === null) return "null";
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? "Invalid Date" : v.toISOString();
  try {
    const json = JSON.stringify(v);
    return json ?? String(v);
  } catch {
    return String(v);
  }
}
