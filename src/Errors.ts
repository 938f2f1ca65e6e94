/** Base class for recoverable analysis failures */
export class NetbenchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Statistics requested over an empty (or non-finite) sample set */
export class InsufficientDataError extends NetbenchError {}

/** Dual-path inputs of different lengths */
export class LengthMismatchError extends NetbenchError {
  readonly path1Length: number;
  readonly path2Length: number;

  constructor(path1Length: number, path2Length: number) {
    super(
      `Path sample counts differ: path1 has ${path1Length}, path2 has ${path2Length}`,
    );
    this.path1Length = path1Length;
    this.path2Length = path2Length;
  }
}

/** A frame-sequence entry that can't be decoded */
export class MalformedRecordError extends NetbenchError {
  /** Position of the entry in its input stream */
  readonly index: number;

  constructor(index: number, reason: string) {
    super(`Malformed record at ${index}: ${reason}`);
    this.index = index;
  }
}

/** Search or sweep options outside their valid range */
export class InvalidParameterError extends NetbenchError {}

/** Measurement tool output that doesn't match the expected format */
export class ToolOutputError extends NetbenchError {}
