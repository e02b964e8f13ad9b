import type { GeneratorConfig } from '../dx/config.js';

export type EligibilityPolicy = Pick<
  GeneratorConfig,
  'denyList' | 'identifierPattern' | 'basicClass' | 'controlSection'
>;

/**
 * Can this catalog function be translated at all?
 *
 * Pure; never throws.
 */
export function accepts(
  name: string,
  classTag: string,
  sectionTag: string,
  policy: EligibilityPolicy,
): boolean {
  if (policy.denyList.includes(name)) return false;
  // Not a legal identifier, like "!_"
  if (!policy.identifierPattern.test(name)) return false;
  // Technical, gp-only or gp2c-only functions
  if (classTag !== policy.basicClass) return false;
  // if, return, break, ...
  if (sectionTag === policy.controlSection) return false;
  return true;
}
