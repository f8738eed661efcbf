/**
 * Error taxonomy for the decisioning service.
 * Every API error leaves the server in the same shape: { success: false, message, code, ... }.
 */

export const GENERIC_MESSAGE = 'Something went wrong. Please try again.';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'MODEL_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'DRIFT_INPUT_ERROR';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly suggestion?: string;

  constructor(message: string, statusCode: number, code: ErrorCode, suggestion?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.suggestion = suggestion;
  }
}

export interface FieldIssue {
  field: string;
  constraint: string;
}

/** Client-caused: the application violates a field domain. Rejects the request, no retry. */
export class ValidationError extends AppError {
  readonly field: string;
  readonly constraint: string;
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    const [primary] = issues;
    const field = primary?.field ?? 'body';
    const constraint = primary?.constraint ?? 'invalid request body';
    super(`Invalid value for "${field}": ${constraint}`, 400, 'VALIDATION_ERROR', 'Please check your input and try again.');
    this.field = field;
    this.constraint = constraint;
    this.issues = issues.length > 0 ? issues : [{ field, constraint }];
  }
}

/** No scoring model is loaded. Fatal until the artifact is fixed; surfaced as 503. */
export class ModelUnavailableError extends AppError {
  constructor(message = 'Model not loaded') {
    super(message, 503, 'MODEL_UNAVAILABLE', 'The scoring model is not available. Please try again later.');
  }
}

/** Decision store could not be reached. The recorder contains it; it never reaches a predict caller. */
export class StoreUnavailableError extends AppError {
  constructor(message = 'Decision store unavailable', options?: { cause?: unknown }) {
    super(message, 503, 'STORE_UNAVAILABLE');
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Malformed batch given to the offline drift job. Aborts that run only. */
export class DriftInputError extends AppError {
  constructor(message: string) {
    super(message, 422, 'DRIFT_INPUT_ERROR');
  }
}

/** Remove emojis and other symbols from text sent to clients. */
function stripEmoji(text: string): string {
  return text
    .replace(/[\u{1F300}-\u{1F9FF}]/gu, '')
    .replace(/[\u{2600}-\u{26FF}]/gu, '')
    .replace(/[\u{2700}-\u{27BF}]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Messages we never send to the client (internal/config) */
const NEVER_EXPOSE = [
  /secret|password|process\.env/i,
  /\[object/i,
  /at \s+\w+ \(.*\.(ts|js):/i, // stack traces
  /ECONNREFUSED|ETIMEDOUT|ENOTFOUND/i,
  /mongo(db|server)?(\+srv)?:\/\//i,
];

/**
 * Turn any thrown value into a single client-facing message.
 * AppError messages are written for clients and pass through as they are.
 */
export function toUserMessage(err: unknown): string {
  if (err instanceof AppError) return stripEmoji(err.message);
  if (!(err instanceof Error)) return GENERIC_MESSAGE;
  const msg = err.message.trim();
  if (!msg || msg.length > 300 || NEVER_EXPOSE.some((re) => re.test(msg))) {
    return GENERIC_MESSAGE;
  }
  return stripEmoji(msg);
}
