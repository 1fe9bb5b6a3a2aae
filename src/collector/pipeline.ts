import type { RowSource } from "../shared/db.js";
import { buildProjectQuery } from "../shared/query.js";
import { CATEGORIES, type ClassificationResult, type RawRow } from "../shared/record.js";
import { addRecord, countByCategory, createClassificationResult } from "./classify.js";
import { normalizeRow } from "./normalize.js";
import { createOutputDir, formatRecordLines, writeReports, type ReportArtifacts } from "./report.js";
import { toProjectRecord } from "./status.js";

export type JobOptions = {
  outdir: string;
  where?: string;
  umbrellaProjectIds: string[];
  dryRun: boolean;
};

export const ingestRows = (rows: Iterable<RawRow>): ClassificationResult => {
  const result = createClassificationResult();
  for (const row of rows) {
    addRecord(result, toProjectRecord(normalizeRow(row)));
  }
  return result;
};

/**
 * Fetches and classifies every row before touching the filesystem, so a failed
 * query or a malformed row leaves no output behind.
 */
export const runReportJob = async (source: RowSource, options: JobOptions): Promise<ReportArtifacts | null> => {
  console.error("Querying database for COVID-19 projects...");
  const query = buildProjectQuery({ where: options.where, umbrellaProjectIds: options.umbrellaProjectIds });
  const rows = await source.fetchRows(query);
  const result = ingestRows(rows);

  console.error(`Classified ${rows.length} rows`);
  for (const [category, count] of countByCategory(result)) {
    console.error(`  ${category}: ${count}`);
  }

  if (options.dryRun) {
    for (const category of CATEGORIES) {
      console.log(`-------- ${category} --------`);
      console.log(formatRecordLines(result[category], "- "));
    }
    return null;
  }

  console.error("Writing files...");
  createOutputDir(options.outdir);
  const artifacts = await writeReports(result, options.outdir);
  console.error(`Files written to '${options.outdir}'`);
  return artifacts;
};
