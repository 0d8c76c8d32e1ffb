/**
 * @tally/cli — Command-line arguments.
 *
 * Parsed with yargs, then validated with Zod so the rest of the
 * program works with a narrowed, typed value.
 */

import yargs from "yargs";
import { z } from "zod";

export const CliArgsSchema = z.object({
  file: z.string().min(1),
  format: z.enum(["csv", "json"]),
  summary: z.boolean(),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

/**
 * Parse arguments (without the node binary and script path).
 *
 * @throws on unknown options, a missing file or an unsupported format
 */
export async function parseArgs(argv: readonly string[]): Promise<CliArgs> {
  const parsed = await yargs([...argv])
    .scriptName("tally")
    .command("$0 <file>", "Replay a transaction CSV and print the resulting accounts", (y) =>
      y.positional("file", { type: "string", describe: "path of the input CSV" }),
    )
    .option("format", {
      type: "string",
      choices: ["csv", "json"],
      default: "csv",
      describe: "report format",
    })
    .option("summary", {
      type: "boolean",
      default: false,
      describe: "print a replay summary to stderr",
    })
    .strict()
    .exitProcess(false)
    .fail((message, err) => {
      throw err ?? new Error(message);
    })
    .parseAsync();

  return CliArgsSchema.parse({
    file: parsed.file,
    format: parsed.format,
    summary: parsed.summary,
  });
}
