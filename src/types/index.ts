export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Top-level content of a BIDS JSON sidecar */
export type SidecarDocument = { [key: string]: JsonValue };

// Raised when a PAR file cannot be read or decoded; fatal for that file only
export class HeaderReadError extends Error {
  constructor(public filePath: string, public cause?: unknown) {
    super(`Unable to read PAR header: ${filePath}${describeCause(cause)}`);
    this.name = 'HeaderReadError';
  }
}

// Raised when the sidecar cannot be read or is not a JSON object; nothing was written
export class SidecarReadError extends Error {
  constructor(public filePath: string, public cause?: unknown) {
    super(`Unable to load sidecar JSON: ${filePath}${describeCause(cause)}`);
    this.name = 'SidecarReadError';
  }
}

// Raised when the backup copy could not be created; nothing was written
export class SidecarBackupError extends Error {
  constructor(public filePath: string, public backupPath: string, public cause?: unknown) {
    super(`Unable to back up sidecar ${filePath} to ${backupPath}${describeCause(cause)}`);
    this.name = 'SidecarBackupError';
  }
}

// Raised when writing the merged sidecar failed; the backup is left in place
export class SidecarWriteError extends Error {
  constructor(public filePath: string, public backupPath: string | null, public cause?: unknown) {
    super(`Unable to write sidecar JSON: ${filePath}${describeCause(cause)}`);
    this.name = 'SidecarWriteError';
  }
}

function describeCause(cause: unknown): string {
  if (typeof cause === 'string') return ` (${cause})`;
  // fs errors may come from another realm, so no instanceof check
  if (typeof cause === 'object' && cause !== null && 'message' in cause && typeof cause.message === 'string') {
    return ` (${cause.message})`;
  }
  return '';
}
