import { describe, expect, it } from 'vitest';
import { validateApplication } from '../../services/feature-validator.service';
import { ValidationError } from '../../utils/app-error';
import { baseApplication, withFields } from '../helpers/fixtures';

const captureValidationError = (raw: unknown): ValidationError => {
  try {
    validateApplication(raw);
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
};

describe('validateApplication', () => {
  it('returns the features in the fixed positional order', () => {
    const { application, features } = validateApplication(baseApplication);
    expect(application.applicant_id).toBe('APP_TEST_001');
    expect(features).toEqual([35, 65000, 0.35, 5, 1, 0.45, 24, 2, 3500]);
  });

  it('accepts both ends of the age range', () => {
    expect(validateApplication(withFields({ age: 18 })).features[0]).toBe(18);
    expect(validateApplication(withFields({ age: 100 })).features[0]).toBe(100);
  });

  it('rejects age 17 on the age field', () => {
    const error = captureValidationError(withFields({ age: 17 }));
    expect(error.field).toBe('age');
    expect(error.constraint).toBe('must be >= 18');
    expect(error.message).toBe('Invalid value for "age": must be >= 18');
  });

  it('rejects age 101 on the age field', () => {
    const error = captureValidationError(withFields({ age: 101 }));
    expect(error.field).toBe('age');
    expect(error.constraint).toBe('must be <= 100');
  });

  it('enforces the ratio upper bounds instead of clamping', () => {
    expect(captureValidationError(withFields({ debt_to_income_ratio: 5.01 })).field).toBe('debt_to_income_ratio');
    expect(captureValidationError(withFields({ credit_utilization: 2.5 })).constraint).toBe('must be <= 2');
    expect(validateApplication(withFields({ debt_to_income_ratio: 5, credit_utilization: 2 })).features[2]).toBe(5);
  });

  it('rejects negative amounts and counts', () => {
    expect(captureValidationError(withFields({ purchase_amount: -1 })).field).toBe('purchase_amount');
    expect(captureValidationError(withFields({ num_late_payments: -1 })).constraint).toBe('must be >= 0');
  });

  it('rejects fractional counts', () => {
    const error = captureValidationError(withFields({ num_credit_inquiries: 1.5 }));
    expect(error.field).toBe('num_credit_inquiries');
    expect(error.constraint).toBe('must be an integer');
  });

  it('rejects non-numeric and missing values', () => {
    expect(captureValidationError({ ...baseApplication, annual_income: '65000' }).constraint).toBe('must be a number');
    const { applicant_id: _omitted, ...withoutId } = baseApplication;
    const error = captureValidationError(withoutId);
    expect(error.field).toBe('applicant_id');
    expect(error.constraint).toBe('is required');
  });

  it('lists every violation', () => {
    const error = captureValidationError(withFields({ age: 10, credit_utilization: 3 }));
    expect(error.issues.map((issue) => issue.field)).toEqual(['age', 'credit_utilization']);
  });
});
