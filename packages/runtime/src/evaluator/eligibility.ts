// Multi-factor eligibility:
//   age >= minAge AND country in allowedCountries AND (invite == 1 if required)

import { DEFAULT_ALLOW_LIST_CAP } from '@cloak/protocol';
import type { BoolCiphertext, Ciphertext, EligibilityParams } from '@cloak/protocol';
import type { CiphertextAlgebra } from '../algebra/index.js';
import { AllowListTooLargeError } from '../errors.js';

export type EligibilityAttributes = {
  age: Ciphertext<'uint8'>;
  country: Ciphertext<'uint16'>;
  invite: Ciphertext<'uint8'>;
};

/**
 * Bundle layout for eligibility submissions.
 */
export const ELIGIBILITY_ATTRIBUTE_KINDS = ['uint8', 'uint16', 'uint8'] as const;

/**
 * Evaluate the eligibility predicate.
 *
 * The requireInvite branch is on plaintext configuration. Every country
 * in the allow-list is compared, so the work done does not depend on
 * the submitted country; an empty list yields false.
 *
 * @throws AllowListTooLargeError when the list exceeds the cap
 */
export async function evaluateEligibility(
  algebra: CiphertextAlgebra,
  params: EligibilityParams,
  attributes: EligibilityAttributes,
  allowListCap: number = DEFAULT_ALLOW_LIST_CAP
): Promise<BoolCiphertext> {
  if (params.allowedCountries.length > allowListCap) {
    throw new AllowListTooLargeError(params.allowedCountries.length, allowListCap);
  }

  const minAge = await algebra.lift(params.minAge, 'uint8');
  const ageOk = await algebra.ge(attributes.age, minAge);

  let countryOk = await algebra.falseLiteral();
  for (const code of params.allowedCountries) {
    const allowed = await algebra.lift(code, 'uint16');
    countryOk = await algebra.or(countryOk, await algebra.eq(attributes.country, allowed));
  }

  let inviteOk: BoolCiphertext;
  if (params.requireInvite) {
    const one = await algebra.lift(1, 'uint8');
    inviteOk = await algebra.eq(attributes.invite, one);
  } else {
    inviteOk = await algebra.trueLiteral();
  }

  return algebra.and(ageOk, await algebra.and(countryOk, inviteOk));
}
