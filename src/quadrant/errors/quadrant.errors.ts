export type ExtractionErrorReason =
  | 'EmptyContent'
  | 'TooShort'
  | 'UnsupportedLanguage';
export type ClassificationErrorReason = 'OutOfRange';
export type RenderErrorReason = 'InvalidOption';

export interface PipelineErrorBody {
  error: string;
  reason: string;
  field: string;
  value: string | number | null;
  message: string;
}

export abstract class QuadrantPipelineError extends Error {
  abstract readonly reason: string;

  protected constructor(
    message: string,
    readonly field: string,
    readonly value: string | number | null,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): PipelineErrorBody {
    return {
      error: this.name,
      reason: this.reason,
      field: this.field,
      value: this.value,
      message: this.message,
    };
  }
}

export class ExtractionError extends QuadrantPipelineError {
  constructor(
    readonly reason: ExtractionErrorReason,
    field: string,
    value: string | number | null,
    message: string,
  ) {
    super(message, field, value);
  }
}

export class ClassificationError extends QuadrantPipelineError {
  readonly reason: ClassificationErrorReason = 'OutOfRange';

  constructor(field: 'x' | 'y', value: number) {
    super(`${field} must be a finite number in [-1, 1]`, field, value);
  }
}

export class RenderError extends QuadrantPipelineError {
  readonly reason: RenderErrorReason = 'InvalidOption';

  constructor(field: string, value: string | number | null, message: string) {
    super(message, field, value);
  }
}
