export type EafErrorCode =
  | 'NoData'
  | 'ParseError'
  | 'TierIdInvalid'
  | 'TierIdExists'
  | 'TierCycle'
  | 'TierTypeMismatch'
  | 'TierAlignment'
  | 'AnnotationIdInvalid'
  | 'AnnotationIdExists'
  | 'AnnotationMainMissing'
  | 'AnnotationCycle'
  | 'AnnotationTypeMismatch'
  | 'AnnotationOverlap'
  | 'TimeslotIdInvalid'
  | 'TimeslotIdExists'
  | 'TimeslotRefMissing'
  | 'TimeValueMissing'
  | 'ValueTooSmall'
  | 'TimeSpanInvalid'
  | 'MediaPathInvalid';

export type EafErrorDetails = Record<string, string | number | null>;

export class EafError extends Error {
  readonly code: EafErrorCode;
  readonly details: EafErrorDetails;

  constructor(code: EafErrorCode, message: string, details: EafErrorDetails = {}) {
    super(message);
    this.name = 'EafError';
    this.code = code;
    this.details = details;
  }
}

export function isEafError(err: unknown, code?: EafErrorCode): err is EafError {
  return err instanceof EafError && (code === undefined || err.code === code);
}
