/**
 * Input completeness and eligibility of a theory.
 *
 * @packageDocumentation
 */

import type { FieldName, TheoryDescriptor, UserInput } from './types.js';

export function isFieldPresent(input: UserInput, field: FieldName): boolean {
  return input[field] !== undefined;
}

/**
 * All fields a theory declares, required first.
 */
export function declaredFields(descriptor: TheoryDescriptor): readonly FieldName[] {
  return [...descriptor.requiredFields, ...descriptor.optionalFields];
}

/**
 * Weighted share of a theory's declared fields that are present, in [0,1].
 *
 * A theory whose declared weights sum to 0 needs nothing and is complete.
 */
export function computeCompleteness(input: UserInput, descriptor: TheoryDescriptor): number {
  let total = 0;
  let present = 0;
  for (const field of declaredFields(descriptor)) {
    const weight = descriptor.fieldWeights[field] ?? 0;
    total += weight;
    if (isFieldPresent(input, field)) {
      present += weight;
    }
  }
  if (total <= 0) {
    return 1;
  }
  return Math.min(1, Math.max(0, present / total));
}

export function missingRequiredFields(
  input: UserInput,
  descriptor: TheoryDescriptor
): FieldName[] {
  return descriptor.requiredFields.filter((field) => !isFieldPresent(input, field));
}

/**
 * Missing declared fields, heaviest first. Ties keep declaration order.
 */
export function missingFieldsByWeight(
  input: UserInput,
  descriptor: TheoryDescriptor
): FieldName[] {
  return declaredFields(descriptor)
    .filter((field) => !isFieldPresent(input, field))
    .map((field, index) => ({ field, index, weight: descriptor.fieldWeights[field] ?? 0 }))
    .sort((a, b) => b.weight - a.weight || a.index - b.index)
    .map((entry) => entry.field);
}

/**
 * Eligibility verdict for one theory.
 */
export interface EligibilityResult {
  readonly eligible: boolean;
  readonly completeness: number;
  readonly missingRequired: readonly FieldName[];
}

/**
 * A theory is eligible when all its required fields are present and its
 * completeness reaches its minimum.
 */
export function checkEligibility(
  input: UserInput,
  descriptor: TheoryDescriptor
): EligibilityResult {
  const completeness = computeCompleteness(input, descriptor);
  const missingRequired = missingRequiredFields(input, descriptor);
  return {
    eligible: missingRequired.length === 0 && completeness >= descriptor.minCompleteness,
    completeness,
    missingRequired,
  };
}
