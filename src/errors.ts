// Error taxonomy for the temporal graph engine

export type ErrorKind =
  | 'NotFound'
  | 'DuplicateDocument'
  | 'UnknownDocument'
  | 'IncomparableTimestamp'
  | 'InvalidTimestamp'
  | 'InvalidArgument'
  | 'NoPath';

export abstract class TemporalGraphError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends TemporalGraphError {
  readonly kind = 'NotFound' as const;

  constructor(readonly documentId: string) {
    super(`Document not found: ${documentId}`);
  }
}

export class DuplicateDocumentError extends TemporalGraphError {
  readonly kind = 'DuplicateDocument' as const;

  constructor(readonly documentId: string) {
    super(`Document already exists: ${documentId}`);
  }
}

export class UnknownDocumentError extends TemporalGraphError {
  readonly kind = 'UnknownDocument' as const;

  constructor(
    readonly documentId: string,
    readonly endpoint: 'from' | 'to'
  ) {
    super(`Cannot create relationship: ${endpoint === 'from' ? 'source' : 'target'} document "${documentId}" does not exist`);
  }
}

export class IncomparableTimestampError extends TemporalGraphError {
  readonly kind = 'IncomparableTimestamp' as const;

  constructor(readonly left: string, readonly right: string) {
    super(`Refusing to compare zone-aware and zone-naive timestamps: ${left} vs ${right}`);
  }
}

export class InvalidTimestampError extends TemporalGraphError {
  readonly kind = 'InvalidTimestamp' as const;

  constructor(readonly input: string) {
    super(`Invalid timestamp: ${input}`);
  }
}

export class InvalidArgumentError extends TemporalGraphError {
  readonly kind = 'InvalidArgument' as const;
}

export class NoPathError extends TemporalGraphError {
  readonly kind = 'NoPath' as const;

  constructor(
    readonly from: string,
    readonly to: string,
    readonly maxHops: number
  ) {
    super(`No path found from "${from}" to "${to}" within ${maxHops} hops`);
  }
}

export function isTemporalGraphError(error: unknown): error is TemporalGraphError {
  return error instanceof TemporalGraphError;
}
