/**
 * Minimal fetch Response stand-ins for unit tests.
 *
 * Only the members the image code reads are provided.
 */
export interface FakeResponse {
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
  arrayBuffer: () => Promise<ArrayBuffer>;
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

/**
 * A response whose body is the JSON encoding of `body`.
 */
export function jsonResponse(body: unknown, status = 200): FakeResponse {
  const text = JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(JSON.parse(text)),
    arrayBuffer: () => Promise.resolve(toArrayBuffer(Buffer.from(text))),
  };
}

/**
 * A response carrying raw bytes.
 */
export function bytesResponse(bytes: Uint8Array, status = 200): FakeResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.reject(new SyntaxError('Unexpected token in JSON')),
    arrayBuffer: () => Promise.resolve(toArrayBuffer(bytes)),
  };
}

/**
 * An error status with an empty body.
 */
export function errorResponse(status: number): FakeResponse {
  return bytesResponse(new Uint8Array(0), status);
}

/**
 * History body for a finished job whose output node holds `images`.
 */
export function historyWithImages(
  promptId: string,
  images: unknown[],
  outputNodeId = '9',
): Record<string, unknown> {
  return {
    [promptId]: {
      outputs: { [outputNodeId]: { images } },
    },
  };
}
