import { parseArgs } from "node:util";
import { z } from "zod";

import { UsageError } from "./errors.js";

export const USAGE = [
  "Usage: dlp-inspect-image --project <id> [--info_types TYPE...] [--include_quote BOOL] <filename>",
  "",
  "Inspect an image with the Cloud DLP API and print the findings.",
  "",
  "Arguments:",
  "  filename               Path of the image file to inspect.",
  "",
  "Options:",
  "  --project <id>         Google Cloud project id used as the parent resource.",
  "  --info_types TYPE...   infoTypes to look for, e.g. FIRST_NAME LAST_NAME EMAIL_ADDRESS.",
  "                         May be repeated or given as a comma-separated list.",
  "  --include_quote BOOL   Print the matched text of each finding (default: true).",
  "  -h, --help             Show this message.",
].join("\n");

const TRUE_TOKENS = new Set(["true", "yes", "1", "on"]);
const FALSE_TOKENS = new Set(["false", "no", "0", "off"]);

export const booleanTokenSchema = z.string().transform((raw, ctx) => {
  const token = raw.trim().toLowerCase();
  if (TRUE_TOKENS.has(token)) {
    return true;
  }
  if (FALSE_TOKENS.has(token)) {
    return false;
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `--include_quote expects true/false, yes/no, 1/0 or on/off, got "${raw}"`,
  });
  return z.NEVER;
});

const cliSchema = z.object({
  project: z
    .string({ required_error: "--project is required" })
    .trim()
    .min(1, "--project must not be empty"),
  filename: z.string({ required_error: "filename is required" }).min(1, "filename must not be empty"),
  infoTypes: z.array(z.string()).min(1, "at least one --info_types value is required"),
  includeQuote: booleanTokenSchema.default("true"),
});

export type CliOptions = z.infer<typeof cliSchema>;

export type CliCommand = { help: true } | { help: false; options: CliOptions };

function splitInfoTypes(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function tokenize(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        project: { type: "string" },
        info_types: { type: "string", multiple: true },
        include_quote: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      allowPositionals: true,
      strict: true,
      tokens: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error), { cause: error });
  }
}

/**
 * Parses `argv` (without the node and script entries).
 *
 * `--info_types` consumes the values after it up to the next option. When
 * that leaves no positional for the filename, the last value it consumed
 * is taken as the filename instead.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const parsed = tokenize(argv);

  if (parsed.values.help) {
    return { help: true };
  }

  const rawInfoTypes: string[] = [];
  const positionals: string[] = [];
  let collecting = false;
  let lastAbsorbed = -1;

  for (const token of parsed.tokens) {
    if (token.kind === "option") {
      collecting = token.name === "info_types";
      if (collecting && token.value !== undefined) {
        rawInfoTypes.push(token.value);
      }
      continue;
    }
    if (token.kind === "option-terminator") {
      collecting = false;
      continue;
    }
    if (collecting) {
      lastAbsorbed = rawInfoTypes.push(token.value) - 1;
    } else {
      positionals.push(token.value);
    }
  }

  // Taken whole: a filename may contain commas.
  if (positionals.length === 0 && lastAbsorbed >= 0) {
    positionals.push(...rawInfoTypes.splice(lastAbsorbed, 1));
  }

  const infoTypes = rawInfoTypes.flatMap(splitInfoTypes);

  if (positionals.length > 1) {
    throw new UsageError(`unexpected argument: ${positionals[1]}`);
  }

  const result = cliSchema.safeParse({
    project: parsed.values.project,
    filename: positionals[0],
    infoTypes,
    includeQuote: parsed.values.include_quote,
  });
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join("; "));
  }
  return { help: false, options: result.data };
}
