import { ZodError } from 'zod';

export type FeeEngineErrorCode = 'INVALID_PRICE' | 'INVALID_PARAMETERS';

export class FeeEngineError extends Error {
  public readonly code: FeeEngineErrorCode;
  public readonly issues: string[];
  public override readonly cause?: unknown;

  constructor(input: { code: FeeEngineErrorCode; message: string; issues?: string[]; cause?: unknown }) {
    super(input.message);
    this.name = 'FeeEngineError';
    this.code = input.code;
    this.issues = input.issues ?? [];
    this.cause = input.cause;
  }
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Classify a validation failure. Anything that is neither a FeeEngineError nor a
 * ZodError says nothing about prices or parameters and yields undefined.
 */
export function toFeeEngineError(err: unknown): FeeEngineError | undefined {
  if (err instanceof FeeEngineError) return err;

  if (err instanceof ZodError) {
    return new FeeEngineError({
      code: 'INVALID_PARAMETERS',
      message: 'invalid_fee_parameters',
      issues: formatZodIssues(err),
      cause: err,
    });
  }

  return undefined;
}
