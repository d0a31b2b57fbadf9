import { TransportError } from "../errors/snapshotErrors.js";

const MAX_ERROR_BODY = 2048;

/** Unwraps the `{ data: ... }` envelope every API response is wrapped in. */
export function readEnvelope(method: string, path: string, statusCode: number, text: string): unknown {
  if (statusCode < 200 || statusCode >= 300) {
    const snippet = text.slice(0, MAX_ERROR_BODY).trim();
    throw new TransportError(method, path, `HTTP ${statusCode}${snippet ? `: ${snippet}` : ""}`, { statusCode });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new TransportError(method, path, "invalid JSON response", { statusCode, cause: err });
  }

  if (typeof parsed === "object" && parsed !== null && "data" in parsed) {
    return parsed.data;
  }
  return null;
}
