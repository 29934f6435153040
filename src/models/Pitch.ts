/**
 * Numeric pitch measurements carried on every Statcast pitch row.
 * Units follow Statcast: mph, rpm, and feet for positions and break.
 */
export type FeatureName =
  | 'releaseSpeed'
  | 'releaseSpinRate'
  | 'releasePosX'
  | 'releasePosZ'
  | 'releaseExtension'
  | 'pfxX'
  | 'pfxZ'
  | 'plateX'
  | 'plateZ';

export const FEATURE_NAMES: readonly FeatureName[] = [
  'releaseSpeed',
  'releaseSpinRate',
  'releasePosX',
  'releasePosZ',
  'releaseExtension',
  'pfxX',
  'pfxZ',
  'plateX',
  'plateZ',
];

/** Statcast CSV column for each feature */
export const FEATURE_COLUMNS: Record<FeatureName, string> = {
  releaseSpeed: 'release_speed',
  releaseSpinRate: 'release_spin_rate',
  releasePosX: 'release_pos_x',
  releasePosZ: 'release_pos_z',
  releaseExtension: 'release_extension',
  pfxX: 'pfx_x',
  pfxZ: 'pfx_z',
  plateX: 'plate_x',
  plateZ: 'plate_z',
};

export const FEATURE_LABELS: Record<FeatureName, string> = {
  releaseSpeed: 'Velo',
  releaseSpinRate: 'Spin',
  releasePosX: 'Rel X',
  releasePosZ: 'Rel Z',
  releaseExtension: 'Ext',
  pfxX: 'HB',
  pfxZ: 'VB',
  plateX: 'Plate X',
  plateZ: 'Plate Z',
};

/**
 * Default similarity axes. Order defines the coordinate axes of the distance
 * computation.
 */
export const SIMILARITY_FEATURES: readonly FeatureName[] = [
  'releaseSpeed',
  'releaseSpinRate',
  'releasePosX',
  'releasePosZ',
  'pfxX',
  'pfxZ',
];

/** Features averaged for a single pitcher's arsenal breakdown */
export const PROFILE_FEATURES: readonly FeatureName[] = FEATURE_NAMES;

export function isFeatureName(value: string): value is FeatureName {
  return (FEATURE_NAMES as readonly string[]).includes(value);
}

export const PITCH_TYPE_LABELS: Record<string, string> = {
  FF: '4-Seam Fastball',
  SI: 'Sinker',
  FC: 'Cutter',
  SL: 'Slider',
  ST: 'Sweeper',
  SV: 'Slurve',
  CH: 'Changeup',
  FS: 'Splitter',
  FO: 'Forkball',
  SC: 'Screwball',
  CU: 'Curveball',
  KC: 'Knuckle Curve',
  CS: 'Slow Curve',
  KN: 'Knuckleball',
  EP: 'Eephus',
};

export function getPitchTypeLabel(pitchType: string): string {
  return PITCH_TYPE_LABELS[pitchType] ?? pitchType;
}

/**
 * One observed pitch. A null measurement means Statcast did not record it.
 */
export type PitchEvent = {
  readonly pitcherId: number;
  readonly pitchType: string;
  readonly gameDate?: string;
} & {
  readonly [F in FeatureName]: number | null;
};

export type FeatureValue =
  | { readonly present: true; readonly mean: number; readonly sampleSize: number }
  | { readonly present: false };

export type GroupBy = 'pitcher' | 'pitcherAndPitchType';

export interface FeatureVector {
  pitcherId: number;
  /** null when grouped by pitcher only */
  pitchType: string | null;
  /** Events in the group, whether or not they carried every feature */
  pitchCount: number;
  features: Partial<Record<FeatureName, FeatureValue>>;
}

export interface RankedMatch {
  readonly rank: number;
  readonly pitcherId: number;
  readonly name: string | null;
  readonly distance: number;
  readonly pitchCount: number;
}

/**
 * Returns the mean for a feature, or null when it is absent or was not
 * requested for this vector.
 */
export function getFeatureMean(vector: FeatureVector, feature: FeatureName): number | null {
  const value = vector.features[feature];
  return value && value.present ? value.mean : null;
}
