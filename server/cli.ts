import path from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { normalizeDateInput } from "@shared/dates";
import { InvalidOptionsError } from "./types/errors";

const dateOption = z
  .string()
  .transform((value, ctx) => {
    const iso = normalizeDateInput(value);
    if (!iso) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected YYYYMMDD or YYYY-MM-DD, got "${value}"` });
      return z.NEVER;
    }
    return iso;
  })
  .optional();

const CliOptionsSchema = z
  .object({
    since: dateOption,
    until: dateOption,
    out: z.string().min(1).optional(),
    force: z.boolean().default(false),
  });

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export const USAGE = "usage: ingest [--since YYYYMMDD] [--until YYYYMMDD] [--out path.csv] [--force]";

/**
 * Parse command-line arguments (without the node and script entries)
 * @throws InvalidOptionsError on unknown flags or bad values
 */
export function parseCliOptions(argv: string[]): CliOptions {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        since: { type: "string" },
        until: { type: "string" },
        out: { type: "string" },
        force: { type: "boolean" },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new InvalidOptionsError(err instanceof Error ? err.message : String(err), { argv });
  }

  const parsed = CliOptionsSchema.safeParse(values);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `--${i.path.join(".")}: ${i.message}`).join("; ");
    throw new InvalidOptionsError(message, { argv });
  }
  const options = parsed.data;
  return options.out ? { ...options, out: path.resolve(options.out) } : options;
}
