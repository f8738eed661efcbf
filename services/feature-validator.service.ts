import { z } from 'zod';
import { FEATURE_NAMES } from '../types';
import type { Application, FeatureVector, ValidatedApplication } from '../types';
import { ValidationError } from '../utils/app-error';
import type { FieldIssue } from '../utils/app-error';

const bounded = (min: number, max?: number, integer = false) => {
  let schema = z.number({ invalid_type_error: 'must be a number', required_error: 'is required' }).finite('must be finite');
  if (integer) schema = schema.int('must be an integer');
  schema = schema.min(min, `must be >= ${min}`);
  if (max !== undefined) schema = schema.max(max, `must be <= ${max}`);
  return schema;
};

/** Field domains, inclusive on both ends. */
export const applicationSchema = z.object({
  applicant_id: z
    .string({ invalid_type_error: 'must be a string', required_error: 'is required' })
    .trim()
    .min(1, 'must not be empty'),
  age: bounded(18, 100, true),
  annual_income: bounded(0),
  debt_to_income_ratio: bounded(0, 5),
  num_credit_lines: bounded(0, undefined, true),
  num_late_payments: bounded(0, undefined, true),
  credit_utilization: bounded(0, 2),
  months_since_last_delinquency: bounded(0, undefined, true),
  num_credit_inquiries: bounded(0, undefined, true),
  purchase_amount: bounded(0),
});

const toIssues = (error: z.ZodError): FieldIssue[] =>
  error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    constraint: issue.message,
  }));

export const toFeatureVector = (application: Application): FeatureVector =>
  Object.freeze(FEATURE_NAMES.map((name) => application[name]));

/**
 * Checks every field against its domain and returns the application with its ordered feature vector.
 * Throws ValidationError listing every violation; nothing is clamped.
 */
export function validateApplication(raw: unknown): ValidatedApplication {
  const parsed = applicationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(toIssues(parsed.error));
  }
  const application: Application = Object.freeze({ ...parsed.data });
  return { application, features: toFeatureVector(application) };
}
