export function createAbortError(): DOMException {
  return new DOMException("Aborted", "AbortError")
}

export function isAbortError(error: unknown): error is DOMException {
  return error instanceof DOMException && error.name === "AbortError"
}
