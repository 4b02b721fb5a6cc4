export type ExperimentErrorCode =
  | 'MALFORMED_LINK'
  | 'OUT_OF_RANGE_LINK'
  | 'UNKNOWN_SLOT'
  | 'EMPTY_TARGET'
  | 'UNSUPPORTED_JOIN_FORMAT'
  | 'UNSUPPORTED_TARGET'
  | 'INVALID_SELECTION'
  | 'INVALID_VALUE'
  | 'AMBIGUOUS_MAPPING'
  | 'NOT_FOUND';

const STATUS_BY_CODE: Record<ExperimentErrorCode, number> = {
  MALFORMED_LINK: 400,
  OUT_OF_RANGE_LINK: 400,
  UNKNOWN_SLOT: 400,
  EMPTY_TARGET: 422,
  UNSUPPORTED_JOIN_FORMAT: 400,
  UNSUPPORTED_TARGET: 422,
  INVALID_SELECTION: 400,
  INVALID_VALUE: 400,
  AMBIGUOUS_MAPPING: 409,
  NOT_FOUND: 404,
};

export class ExperimentError extends Error {
  readonly code: ExperimentErrorCode;
  readonly statusCode: number;

  constructor(code: ExperimentErrorCode, message: string, statusCode: number = STATUS_BY_CODE[code]) {
    super(message);
    this.name = 'ExperimentError';
    this.code = code;
    this.statusCode = statusCode;
  }
}
