import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { FileReadError } from "../src/errors.js";
import { buildRequest, toDlpRequest } from "../src/request.js";

const imageBytes = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

let workDir: string;
let imagePath: string;

beforeAll(async () => {
  workDir = await mkdtemp(path.join(tmpdir(), "dlp-request-"));
  imagePath = path.join(workDir, "receipt.png");
  await writeFile(imagePath, Buffer.from(imageBytes));
});

afterAll(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe("buildRequest", () => {
  it("reads the image and scopes the request to the project", async () => {
    const request = await buildRequest("test-project", imagePath, ["EMAIL_ADDRESS", "FIRST_NAME"], true);

    expect(request.resourceId).toBe("projects/test-project");
    expect(request.infoTypes).toEqual(["EMAIL_ADDRESS", "FIRST_NAME"]);
    expect(request.includeQuote).toBe(true);
    expect(Array.from(request.imageBytes)).toEqual(imageBytes);
  });

  it("keeps duplicates and does not share the caller's list", async () => {
    const infoTypes = ["LAST_NAME", "LAST_NAME"];
    const request = await buildRequest("test-project", imagePath, infoTypes, false);
    infoTypes.push("PHONE_NUMBER");

    expect(request.infoTypes).toEqual(["LAST_NAME", "LAST_NAME"]);
  });

  it("fails with FileReadError for a missing file", async () => {
    const missing = path.join(workDir, "missing.png");
    const error = await buildRequest("test-project", missing, ["EMAIL_ADDRESS"], true).catch(
      (failure: unknown) => failure,
    );

    expect(error).toBeInstanceOf(FileReadError);
    expect(error).toMatchObject({ name: "FileReadError", path: missing, cause: { code: "ENOENT" } });
  });

  it("fails with FileReadError when the path is a directory", async () => {
    await expect(buildRequest("test-project", workDir, ["EMAIL_ADDRESS"], true)).rejects.toThrow(FileReadError);
  });
});

describe("toDlpRequest", () => {
  it("builds the inspectContent wire request", () => {
    const data = Uint8Array.from(imageBytes);
    const wire = toDlpRequest({
      resourceId: "projects/test-project",
      infoTypes: ["EMAIL_ADDRESS", "EMAIL_ADDRESS", "PHONE_NUMBER"],
      includeQuote: false,
      imageBytes: data,
    });

    expect(wire).toEqual({
      parent: "projects/test-project",
      inspectConfig: {
        infoTypes: [{ name: "EMAIL_ADDRESS" }, { name: "EMAIL_ADDRESS" }, { name: "PHONE_NUMBER" }],
        includeQuote: false,
      },
      item: { byteItem: { type: "IMAGE", data } },
    });
  });
});
