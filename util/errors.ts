export class FormatError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "FormatError";
  }
}

export class InvalidReferenceError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "InvalidReferenceError";
  }
}

export class InvalidPlaylistError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "InvalidPlaylistError";
  }
}

// Network/IO failure or a status known to be a hiccup of an edge cache. Retried.
export class TransientFetchError extends Error {
  status?: number;
  constructor(message: string, status?: number, cause?: unknown) {
    super(message, { cause });
    this.name = "TransientFetchError";
    this.status = status;
  }
}

// Any other non-success HTTP status. Not retried.
export class FetchError extends Error {
  status: number;
  constructor(message: string, status: number) {
    super(message);
    this.name = "FetchError";
    this.status = status;
  }
}

export class SegmentFailure extends Error {
  segmentIndex: number;
  constructor(segmentIndex: number, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SegmentFailure";
    this.segmentIndex = segmentIndex;
  }
}

export class MergeFailure extends Error {
  exitCode?: number | null;
  constructor(message: string, exitCode?: number | null, cause?: unknown) {
    super(message, { cause });
    this.name = "MergeFailure";
    this.exitCode = exitCode;
  }
}

export class OperationCancelled extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "OperationCancelled";
  }
}

export function isCancellation(err: unknown): err is OperationCancelled {
  return err instanceof OperationCancelled;
}

export function paramError(
  position: string,
  paramName: string,
  functionName: string,
  validTypes: string | string[]
) {
  const quoted = [validTypes].flat().map((t) => '"' + t + '"');
  const typeList =
    quoted.slice(0, -1).join(", ") +
    (quoted.length > 1 ? " or " : "") +
    quoted.slice(-1);
  return new TypeError(
    `${position} parameter "${paramName}" passed to "${functionName}" is not of type ${typeList}!`
  );
}
