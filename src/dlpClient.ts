import { DlpServiceClient } from "@google-cloud/dlp";
import type { protos } from "@google-cloud/dlp";
import { z } from "zod";

import type { Settings } from "./config.js";
import { toDlpRequest } from "./request.js";
import type { InspectContentRequest } from "./request.js";
import { LIKELIHOODS } from "./types.js";
import type { Finding, InspectionClient, InspectionRequest, InspectionResult, Likelihood } from "./types.js";

type InspectContentResponse = protos.google.privacy.dlp.v2.IInspectContentResponse;

/** The part of `DlpServiceClient` this program calls. */
export interface DlpContentInspector {
  inspectContent(
    request: InspectContentRequest,
    options?: { timeout?: number },
  ): Promise<[InspectContentResponse, ...unknown[]]>;
  close(): Promise<void>;
}

const findingSchema = z.object({
  infoType: z.object({ name: z.string().nullish() }).nullish(),
  quote: z.string().nullish(),
  likelihood: z.union([z.string(), z.number()]).nullish(),
});

const inspectResponseSchema = z.object({
  result: z
    .object({
      findings: z.array(findingSchema).nullish(),
    })
    .nullish(),
});

export function createDlpServiceClient(settings: Settings): DlpContentInspector {
  return new DlpServiceClient({
    ...(settings.keyFile ? { keyFilename: settings.keyFile } : {}),
    ...(settings.apiEndpoint ? { apiEndpoint: settings.apiEndpoint } : {}),
  });
}

export function toLikelihood(value: string | number | null | undefined): Likelihood {
  if (typeof value === "number") {
    return LIKELIHOODS[value] ?? "LIKELIHOOD_UNSPECIFIED";
  }
  return LIKELIHOODS.find((likelihood) => likelihood === value) ?? "LIKELIHOOD_UNSPECIFIED";
}

export function normalizeInspectResponse(response: unknown): InspectionResult {
  const parsed = inspectResponseSchema.parse(response);
  const findings = parsed.result?.findings ?? [];
  return {
    findings: findings.map((finding): Finding => {
      const normalized: Finding = {
        infoTypeName: finding.infoType?.name || "UNKNOWN",
        likelihood: toLikelihood(finding.likelihood),
      };
      if (finding.quote) {
        normalized.quote = finding.quote;
      }
      return normalized;
    }),
  };
}

export class DlpInspectionClient implements InspectionClient {
  constructor(
    private readonly inspector: DlpContentInspector,
    private readonly settings: Pick<Settings, "timeoutMs"> = {},
  ) {}

  async inspect(request: InspectionRequest): Promise<InspectionResult> {
    const options = this.settings.timeoutMs ? { timeout: this.settings.timeoutMs } : undefined;
    const [response] = await this.inspector.inspectContent(toDlpRequest(request), options);
    return normalizeInspectResponse(response);
  }
}
