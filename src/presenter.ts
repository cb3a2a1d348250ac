import type { InspectionResult } from "./types.js";

export type LineWriter = (line: string) => void;

export const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

export function formatFindings(result: InspectionResult, includeQuote: boolean): string[] {
  if (result.findings.length === 0) {
    return ["No findings."];
  }
  return result.findings.flatMap((finding) => {
    const lines = [`Info type: ${finding.infoTypeName}`];
    if (includeQuote && finding.quote !== undefined) {
      lines.push(`Quote: ${finding.quote}`);
    }
    lines.push(`Likelihood: ${finding.likelihood}`, "");
    return lines;
  });
}

export function present(result: InspectionResult, includeQuote: boolean, write: LineWriter = stdoutWriter): void {
  for (const line of formatFindings(result, includeQuote)) {
    write(line);
  }
}
