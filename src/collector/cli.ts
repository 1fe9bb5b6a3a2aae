import { ConfigurationError } from "../shared/errors.js";

export type CliOptions = {
  outdir: string;
  where?: string;
  dryRun: boolean;
  help: boolean;
};

export const USAGE = `Usage: covid-project-logs [options]

Queries the database for COVID-19 related projects and splits them into five logs:
  sars-cov-2, other-virus, metagenome, human, other-host

Writes covid_logs.xlsx (one sheet per log) and, per log, the project accessions
not yet in an umbrella project and the public accessions not yet in a data hub.

Options:
  --outdir=<dir>   output directory, must not exist (default: covid_logs_<timestamp>)
  --where=<sql>    extra filter ANDed onto the default query
  --dry-run        print the classified logs instead of writing files
  --help           show this message

Example:
  covid-project-logs --outdir=test_dir --where="l.to_id IS NULL"
`;

const pad2 = (value: number) => String(value).padStart(2, "0");

// covid_logs_ddmmyy_HHMMSS, local time
export const defaultOutdir = (now: Date = new Date()) => {
  const date = `${pad2(now.getDate())}${pad2(now.getMonth() + 1)}${pad2(now.getFullYear() % 100)}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `covid_logs_${date}_${time}`;
};

export const parseArgs = (argv: string[], now: Date = new Date()): CliOptions => {
  const args = new Map<string, string | boolean>();
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--dry-run" || arg === "--help" || arg === "-h") {
      args.set(arg === "-h" ? "help" : arg.slice(2), true);
      continue;
    }
    const match = arg.match(/^--(outdir|where)(?:=(.*))?$/s);
    if (!match) {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
    const value = match[2] ?? argv[index + 1];
    if (value === undefined) {
      throw new ConfigurationError(`Missing value for --${match[1]}`);
    }
    if (match[2] === undefined) {
      index += 1;
    }
    args.set(match[1], value);
  }

  const outdir = args.get("outdir");
  const where = args.get("where");

  return {
    outdir: typeof outdir === "string" && outdir ? outdir : defaultOutdir(now),
    where: typeof where === "string" && where ? where : undefined,
    dryRun: Boolean(args.get("dry-run")),
    help: Boolean(args.get("help"))
  };
};
