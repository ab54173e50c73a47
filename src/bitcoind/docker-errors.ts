/**
 * Helpers for reading errors thrown by dockerode. The daemon's HTTP status
 * lands on `statusCode` and its JSON body on `json`.
 */

export function dockerStatusCode(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
}

/** The daemon's own diagnostic when present, else the error message. */
export function dockerErrorMessage(err: unknown): string {
  if (typeof err === "object" && err !== null && "json" in err) {
    const body = err.json;
    if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
      return body.message.trim();
    }
  }
  if (err instanceof Error) return err.message.trim();
  return String(err);
}

/** Create failed because the image is not in the local store. */
export function isImageNotFound(err: unknown): boolean {
  if (/no such image/i.test(dockerErrorMessage(err))) return true;
  return err instanceof Error && /no such image/i.test(err.message);
}

export function isNotFound(err: unknown): boolean {
  return dockerStatusCode(err) === 404;
}

/** Docker 304: container already started / already stopped. */
export function isNotModified(err: unknown): boolean {
  return dockerStatusCode(err) === 304;
}
