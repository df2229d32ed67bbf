/**
 * Token features in the order of the host's numeric codes.
 */
export const FEATURE_NAMES = ['minting', 'freezing', 'whitelisting', 'ibc', 'block_smart_contracts', 'clawback'] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export function featureCode(feature: FeatureName): number {
  return FEATURE_NAMES.indexOf(feature);
}
