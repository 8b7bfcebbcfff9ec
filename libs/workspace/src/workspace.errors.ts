/**
 * Errors raised by WorkspaceService.
 *
 * Callers that face clients should treat both as "not found" so a traversal
 * attempt is indistinguishable from a missing file.
 */
export abstract class WorkspaceError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class WorkspaceNotFoundError extends WorkspaceError {
  constructor(
    readonly jobId: string,
    readonly filename?: string,
  ) {
    super(
      filename === undefined
        ? `Job ${jobId} not found`
        : `File "${filename}" not found in job ${jobId}`,
    );
  }
}

export class InvalidFilenameError extends WorkspaceError {
  constructor(
    readonly jobId: string,
    readonly filename: string,
    readonly reason: string,
  ) {
    super(`Rejected filename "${filename}" for job ${jobId}: ${reason}`);
  }
}
