function hasErrorCode(error: unknown, code: string): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

export function isEnoent(error: unknown): error is NodeJS.ErrnoException {
  return hasErrorCode(error, "ENOENT");
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
