export const LIKELIHOODS = [
  "LIKELIHOOD_UNSPECIFIED",
  "VERY_UNLIKELY",
  "UNLIKELY",
  "POSSIBLE",
  "LIKELY",
  "VERY_LIKELY",
] as const;

export type Likelihood = (typeof LIKELIHOODS)[number];

export interface InspectionRequest {
  readonly resourceId: string;
  readonly infoTypes: readonly string[];
  readonly includeQuote: boolean;
  readonly imageBytes: Uint8Array;
}

export interface Finding {
  infoTypeName: string;
  quote?: string;
  likelihood: Likelihood;
}

export interface InspectionResult {
  findings: Finding[];
}

export interface InspectionClient {
  inspect(request: InspectionRequest): Promise<InspectionResult>;
}
