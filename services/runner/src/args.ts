import { parseArgs } from "node:util";

import { z } from "zod";

import { assertValid } from "@strategy-lab/sdk";

export const RUNNER_COMMANDS = ["backtest", "paper", "optimize", "compare", "risk"] as const;

export type RunnerCommand = (typeof RUNNER_COMMANDS)[number];

export const USAGE = `Usage: strategy-lab <command> [options]

Commands:
  backtest   Run one strategy over a dataset and print its report
  paper      Replay a dataset as a paper trading session
  optimize   Grid-search strategy parameters
  compare    Backtest several strategies over the same dataset
  risk       Summarize the risk of a set of positions

Options:
  --symbol <symbol>         Dataset symbol (default ASSET)
  --interval <interval>     Dataset interval (default 1d)
  --start <date>            First bar to include
  --end <date>              Last bar to include
  --strategy <key>          Strategy key (default ma_crossover)
  --params <json>           Strategy parameters as a JSON object
  --grid <json>             Parameter grid for optimize, e.g. {"period":[7,14]}
  --strategies <keys>       Comma-separated keys for compare
  --positions <json>        Positions for risk, [{"positionValue":..,"riskAmount":..}]
  --top <n>                 Optimization rows to print (default 10)
  --datasets <dir>          Directory holding <symbol>_<interval>.csv files
  --custom <dir>            Directory of custom strategy modules
  --out <dir>               Save backtest artifacts under this directory
  --name <label>            Run name used for saved artifacts
  -h, --help                Show this message
`;

const jsonOption = <T extends z.ZodTypeAny>(flag: string, schema: T) =>
  z
    .string()
    .transform((raw, ctx): unknown => {
      try {
        return JSON.parse(raw);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${flag} must be valid JSON` });
        return z.NEVER;
      }
    })
    .pipe(schema);

const ParameterGridSchema = z.record(z.array(z.union([z.number(), z.string()])).min(1));

const RiskPositionSchema = z.object({
  positionValue: z.number().finite().nonnegative(),
  riskAmount: z.number().finite().nonnegative(),
});

const RunnerArgsSchema = z.object({
  command: z.enum(RUNNER_COMMANDS),
  symbol: z.string().min(1).default("ASSET"),
  interval: z.string().min(1).default("1d"),
  start: z.string().min(1).optional(),
  end: z.string().min(1).optional(),
  strategy: z.string().min(1).default("ma_crossover"),
  params: jsonOption("--params", z.record(z.unknown())).default("{}"),
  grid: jsonOption("--grid", ParameterGridSchema).optional(),
  strategies: z
    .string()
    .transform((raw) =>
      raw
        .split(",")
        .map((key) => key.trim())
        .filter((key) => key.length > 0),
    )
    .optional(),
  positions: jsonOption("--positions", z.array(RiskPositionSchema)).default("[]"),
  top: z.coerce.number().int().positive().default(10),
  datasets: z.string().min(1).optional(),
  custom: z.string().min(1).optional(),
  out: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
});

export type RunnerArgs = z.output<typeof RunnerArgsSchema>;

export type ParsedCommandLine = { readonly help: true } | { readonly help: false; readonly args: RunnerArgs };

/**
 * Parses `argv` (without the node and script entries).
 *
 * @throws Error naming every invalid option.
 */
export const parseRunnerArgs = (argv: ReadonlyArray<string>): ParsedCommandLine => {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      symbol: { type: "string" },
      interval: { type: "string" },
      start: { type: "string" },
      end: { type: "string" },
      strategy: { type: "string" },
      params: { type: "string" },
      grid: { type: "string" },
      strategies: { type: "string" },
      positions: { type: "string" },
      top: { type: "string" },
      datasets: { type: "string" },
      custom: { type: "string" },
      out: { type: "string" },
      name: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help || positionals.length === 0) {
    return { help: true };
  }

  return {
    help: false,
    args: assertValid(RunnerArgsSchema, { ...values, command: positionals[0] }, "arguments"),
  };
};
