import { describe, expect, it } from "vitest";

import { formatFindings, present } from "../src/presenter.js";
import type { InspectionResult } from "../src/types.js";

const emailResult: InspectionResult = {
  findings: [{ infoTypeName: "EMAIL_ADDRESS", quote: "a@b.com", likelihood: "LIKELY" }],
};

describe("formatFindings", () => {
  it("prints a single line when there are no findings", () => {
    expect(formatFindings({ findings: [] }, true)).toEqual(["No findings."]);
    expect(formatFindings({ findings: [] }, false)).toEqual(["No findings."]);
  });

  it("prints info type, quote and likelihood followed by a blank line", () => {
    const output: string[] = [];
    present(emailResult, true, (line) => output.push(`${line}\n`));

    expect(output.join("")).toBe("Info type: EMAIL_ADDRESS\nQuote: a@b.com\nLikelihood: LIKELY\n\n");
  });

  it("never prints quotes when they were not requested", () => {
    expect(formatFindings(emailResult, false)).toEqual([
      "Info type: EMAIL_ADDRESS",
      "Likelihood: LIKELY",
      "",
    ]);
  });

  it("skips the quote line when a finding has no quote", () => {
    const lines = formatFindings(
      { findings: [{ infoTypeName: "FIRST_NAME", likelihood: "POSSIBLE" }] },
      true,
    );

    expect(lines).toEqual(["Info type: FIRST_NAME", "Likelihood: POSSIBLE", ""]);
  });

  it("keeps findings in the order received", () => {
    const lines = formatFindings(
      {
        findings: [
          { infoTypeName: "LAST_NAME", quote: "Doe", likelihood: "VERY_LIKELY" },
          { infoTypeName: "FIRST_NAME", quote: "Jane", likelihood: "LIKELY" },
          { infoTypeName: "LAST_NAME", quote: "Roe", likelihood: "UNLIKELY" },
        ],
      },
      true,
    );

    expect(lines.filter((line) => line.startsWith("Info type: "))).toEqual([
      "Info type: LAST_NAME",
      "Info type: FIRST_NAME",
      "Info type: LAST_NAME",
    ]);
    expect(lines.filter((line) => line.startsWith("Likelihood: "))).toEqual([
      "Likelihood: VERY_LIKELY",
      "Likelihood: LIKELY",
      "Likelihood: UNLIKELY",
    ]);
    expect(lines).toHaveLength(12);
  });
});
