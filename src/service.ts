import { Logger } from "@nestjs/common";
import { Status } from "google-gax";

import { describeCause, RemoteCallError } from "./errors.js";
import type { InspectionClient, InspectionRequest, InspectionResult } from "./types.js";

function statusCode(error: unknown): number | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "number") {
    return error.code;
  }
  return undefined;
}

export function toRemoteCallError(error: unknown): RemoteCallError {
  if (error instanceof RemoteCallError) {
    return error;
  }
  const code = statusCode(error);
  const reason = code !== undefined ? Status[code] ?? "UNKNOWN" : "UNKNOWN";
  return new RemoteCallError(`DLP inspectContent failed (${reason}): ${describeCause(error)}`, {
    reason,
    code,
    cause: error,
  });
}

export class ImageInspectionService {
  private readonly logger = new Logger(ImageInspectionService.name);

  constructor(private readonly client: InspectionClient) {}

  async inspect(request: InspectionRequest): Promise<InspectionResult> {
    this.logger.debug(
      `Inspecting ${request.imageBytes.byteLength} bytes for ${request.resourceId} ` +
        `(infoTypes: ${request.infoTypes.join(", ")}, includeQuote: ${request.includeQuote})`,
    );
    let result: InspectionResult;
    try {
      result = await this.client.inspect(request);
    } catch (error) {
      const failure = toRemoteCallError(error);
      this.logger.warn(`inspectContent rejected with ${failure.reason}`);
      throw failure;
    }
    this.logger.debug(`Received ${result.findings.length} finding(s)`);
    return result;
  }
}
