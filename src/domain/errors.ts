import type { ZodIssue } from 'zod';

export class InvalidParameterError extends Error {
  constructor(
    readonly parameter: string,
    readonly value: unknown,
    message = `Invalid parameter ${parameter}: ${String(value)}`
  ) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

export class InvalidInputError extends InvalidParameterError {
  constructor(
    parameter: string,
    readonly issues: ZodIssue[]
  ) {
    super(parameter, undefined, `Invalid ${parameter}: ${issues.map((i) => `${i.path.join('.') || '<root>'} ${i.message}`).join('; ')}`);
    this.name = 'InvalidInputError';
  }
}

export type CalibrationErrorCode = 'noValuesFound' | 'lowConfidence';

const CALIBRATION_MESSAGES: Record<CalibrationErrorCode, string> = {
  noValuesFound: 'No PMC values could be extracted',
  lowConfidence: 'Source confidence is too low to apply calibration'
};

export class CalibrationError extends Error {
  constructor(readonly code: CalibrationErrorCode) {
    super(CALIBRATION_MESSAGES[code]);
    this.name = 'CalibrationError';
  }
}
