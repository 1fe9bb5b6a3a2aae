import { ConfigurationError } from "../shared/errors.js";
import { RAW_COLUMNS, type NormalizedRow, type RawRow } from "../shared/record.js";

type Column = (typeof RAW_COLUMNS)[number];

const isAbsent = (value: unknown): value is null | undefined | "" =>
  value === null || value === undefined || value === "";

const toStringOrNull = (value: unknown, column: Column): string | null => {
  if (isAbsent(value)) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") return String(value);
  throw new ConfigurationError(`Column ${column} expected text, got ${typeof value}`);
};

const toNumberOrNull = (value: unknown, column: Column): number | null => {
  if (isAbsent(value)) return null;
  if (typeof value === "number") return value;
  if (typeof value === "string" || typeof value === "bigint") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new ConfigurationError(`Column ${column} expected a number, got ${JSON.stringify(String(value))}`);
};

const toDateOrNull = (value: unknown, column: Column): Date | null => {
  if (isAbsent(value)) return null;
  const date = value instanceof Date ? value : typeof value === "string" ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Column ${column} expected a date, got ${JSON.stringify(String(value))}`);
  }
  return date;
};

const toCountOrNull = (value: unknown, column: Column): number | null => {
  const count = toNumberOrNull(value, column);
  if (count !== null && (!Number.isInteger(count) || count < 0)) {
    throw new ConfigurationError(`Column ${column} expected a non-negative integer, got ${count}`);
  }
  return count;
};

/**
 * Maps a positional source row onto named fields. Empty strings, `undefined`
 * and `null` all become `null`; nothing else about the values changes.
 */
export const normalizeRow = (row: RawRow): NormalizedRow => {
  if (row.length !== RAW_COLUMNS.length) {
    throw new ConfigurationError(
      `Expected ${RAW_COLUMNS.length} columns per source row, got ${row.length}`
    );
  }

  const projectId = toStringOrNull(row[2], "project_id");
  if (projectId === null) {
    throw new ConfigurationError("Source row is missing project_id");
  }

  return {
    datahub: toStringOrNull(row[0], "datahub"),
    umbrella_project_id: toStringOrNull(row[1], "umbrella_project_id"),
    project_id: projectId,
    first_created: toDateOrNull(row[3], "first_created"),
    study_id: toStringOrNull(row[4], "study_id"),
    study_title: toStringOrNull(row[5], "study_title"),
    sample_count: toCountOrNull(row[6], "sample_count"),
    run_count: toCountOrNull(row[7], "run_count"),
    center_name: toStringOrNull(row[8], "center_name"),
    project_taxon_id: toStringOrNull(row[9], "project_taxon_id"),
    project_scientific_name: toStringOrNull(row[10], "project_scientific_name"),
    sample_taxon_id: toStringOrNull(row[11], "sample_taxon_id"),
    sample_scientific_name: toStringOrNull(row[12], "sample_scientific_name"),
    statusCodes: {
      project: toNumberOrNull(row[13], "project_status"),
      experiment: toNumberOrNull(row[14], "experiment_status"),
      sample: toNumberOrNull(row[15], "sample_status"),
      run: toNumberOrNull(row[16], "run_status")
    }
  };
};
