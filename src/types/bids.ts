/**
 * Types for BIDS field inference from Philips PAR headers
 */

export type SiteLabel = 'Groningen' | 'Amsterdam' | 'Leiden' | 'Unspecified' | 'Unknown';

export type Confidence = 'High' | 'Medium' | 'Low';

/** Which signal decided the site label */
export type SiteHeuristic =
  | 'tool-version'
  | 'patient-name'
  | 'file-path'
  | 'subject-id-range'
  | 'default'
  | 'none';

export interface SiteDetection {
  /** Export tool version from the header banner (e.g. "4.2"), null when absent */
  toolVersion: string | null;
  siteLabel: SiteLabel;
  confidence: Confidence;
  /** Informational capability tags (e.g. "asl-capable"); never drives inference */
  characteristics: Set<string>;
  heuristic: SiteHeuristic;
}

export type SiteProfileId = 'groningen-v4.1' | 'amslei-v4.2' | 'generic';

/** 0-based column positions within a row of the image information table */
export interface ImageColumnMap {
  /** Rows with fewer columns are skipped */
  minColumns: number;
  sliceNumber: number;
  reconResolutionX: number;
  reconResolutionY: number;
  rescaleIntercept: number;
  rescaleSlope: number;
  scaleSlope: number;
  sliceThickness: number;
  sliceGap: number;
  sliceOrientation: number;
  echoTime: number;
  flipAngle: number;
}

export interface SiteProfile {
  id: SiteProfileId;
  columns: ImageColumnMap;
}

export type SliceEncodingDirection = 'i' | 'j' | 'k';

export type PhaseEncodingDirection = 'i' | 'i-' | 'j' | 'j-';

export type TaskName = 'rest' | 'nback' | 'faces';

export type BidsValue = number | string | boolean | number[];

/**
 * Inferred BIDS fields. Times are in seconds, lengths in mm, angles in degrees.
 * A field is present only when it was extracted or a documented default applies.
 */
export type BidsFieldSet = {
  RepetitionTime?: number;
  EchoTime?: number;
  NumberOfSlices?: number;
  SliceTiming?: number[];
  SliceEncodingDirection?: SliceEncodingDirection;
  PhaseEncodingDirection?: PhaseEncodingDirection;
  EffectiveEchoSpacing?: number;
  SliceThickness?: number;
  SpacingBetweenSlices?: number;
  FlipAngle?: number;
  TaskName?: TaskName;
  Manufacturer?: string;
  MagneticFieldStrength?: number;
  PatientPosition?: string;
  ProtocolName?: string;
  SeriesDescription?: string;
  SeriesNumber?: number;
  AcquisitionNumber?: number;
  // Philips-specific
  WaterFatShift?: number;
  ReconMatrixPE?: number;
  ReconMatrixFE?: number;
  PhilipsRescaleSlope?: number;
  PhilipsRescaleIntercept?: number;
  PhilipsScaleSlope?: number;
  /** Rescale values above are the float (not display) scaling */
  UsePhilipsFloatNotDisplayScaling?: boolean;
};

export type BidsFieldName = keyof BidsFieldSet;

export type SliceEncodingStrategy =
  | 'orientation-code'
  | 'image-table'
  | 'patient-position'
  | 'functional-default';

export interface InferenceProvenance {
  profile: SiteProfileId;
  sliceTimingMethod: 'interleaved-ascending-from-bottom' | null;
  sliceEncodingStrategy: SliceEncodingStrategy | null;
  phaseEncodingSource: 'header' | 'fallback' | null;
  echoSpacingSource: 'computed' | 'fallback' | null;
  taskNameSource: 'protocol-name' | 'examination-name' | 'default';
  /** Fields whose value is a configured default rather than read from the header */
  defaultsApplied: BidsFieldName[];
}

export interface InferenceResult {
  fields: BidsFieldSet;
  site: SiteDetection;
  provenance: InferenceProvenance;
}
