import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../shared/errors.js";
import { defaultOutdir, parseArgs, USAGE } from "../cli.js";

const now = new Date(2020, 4, 7, 9, 5, 3);

describe("defaultOutdir", () => {
  it("embeds the creation time as ddmmyy_HHMMSS", () => {
    expect(defaultOutdir(now)).toBe("covid_logs_070520_090503");
  });
});

describe("parseArgs", () => {
  it("defaults to a timestamped directory and no extra filter", () => {
    expect(parseArgs([], now)).toEqual({
      outdir: "covid_logs_070520_090503",
      where: undefined,
      dryRun: false,
      help: false
    });
  });

  it("reads --flag=value options", () => {
    const options = parseArgs(["--outdir=test_dir", "--where=umbrella_project_id IS NULL"], now);

    expect(options.outdir).toBe("test_dir");
    expect(options.where).toBe("umbrella_project_id IS NULL");
  });

  it("reads --flag value options and keeps = inside the value", () => {
    const options = parseArgs(["--where", "p.center_name = 'Test Center'", "--outdir", "out"], now);

    expect(options.where).toBe("p.center_name = 'Test Center'");
    expect(options.outdir).toBe("out");
  });

  it("reads boolean flags", () => {
    expect(parseArgs(["--dry-run"], now).dryRun).toBe(true);
    expect(parseArgs(["-h"], now).help).toBe(true);
  });

  it("rejects unknown arguments and missing values", () => {
    expect(() => parseArgs(["--limit=5"], now)).toThrow("Unknown argument: --limit=5");
    expect(() => parseArgs(["--outdir"], now)).toThrow("Missing value for --outdir");
  });

  it("reports argument problems as configuration errors", () => {
    expect(() => parseArgs(["--limit=5"], now)).toThrow(ConfigurationError);
    expect(() => parseArgs(["--where"], now)).toThrow(ConfigurationError);
  });
});

describe("USAGE", () => {
  it("filters on source columns rather than select aliases in its example", () => {
    expect(USAGE).toContain('--where="l.to_id IS NULL"');
    expect(USAGE).not.toContain("--where=\"umbrella_project_id");
  });
});
