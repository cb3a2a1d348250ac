import { readFile } from "node:fs/promises";

import type { protos } from "@google-cloud/dlp";

import { FileReadError } from "./errors.js";
import type { InspectionRequest } from "./types.js";

export type InspectContentRequest = protos.google.privacy.dlp.v2.IInspectContentRequest;

export function toResourceId(project: string): string {
  return `projects/${project}`;
}

export async function buildRequest(
  project: string,
  filename: string,
  infoTypes: readonly string[],
  includeQuote: boolean,
): Promise<InspectionRequest> {
  let imageBytes: Uint8Array;
  try {
    imageBytes = await readFile(filename);
  } catch (error) {
    throw new FileReadError(filename, error);
  }

  return {
    resourceId: toResourceId(project),
    infoTypes: [...infoTypes],
    includeQuote,
    imageBytes,
  };
}

/** Wire shape of an inspectContent call for an image byte item. */
export function toDlpRequest(request: InspectionRequest): InspectContentRequest {
  return {
    parent: request.resourceId,
    inspectConfig: {
      infoTypes: request.infoTypes.map((name) => ({ name })),
      includeQuote: request.includeQuote,
    },
    item: {
      byteItem: {
        type: "IMAGE",
        data: request.imageBytes,
      },
    },
  };
}
