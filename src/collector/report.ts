import fs from "fs";
import path from "path";
import ExcelJS from "exceljs";
import { OutputConflictError } from "../shared/errors.js";
import { CATEGORIES, type Category, type ClassificationResult, type ProjectRecord } from "../shared/record.js";

export const REPORT_COLUMNS = [
  "datahub",
  "umbrella_project_id",
  "project_id",
  "first_created",
  "study_id",
  "study_title",
  "sample_count",
  "run_count",
  "center_name",
  "project_taxon_id",
  "project_scientific_name",
  "sample_taxon_id",
  "sample_scientific_name",
  "project_status"
] as const;

export const NULL_CELL = "NULL";
export const WORKBOOK_FILE = "covid_logs.xlsx";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

export type Cell = string | number;

const pad2 = (value: number) => String(value).padStart(2, "0");

// 01-Jan-20
export const formatCreatedDate = (date: Date): string =>
  `${pad2(date.getDate())}-${MONTHS[date.getMonth()]}-${pad2(date.getFullYear() % 100)}`;

const cell = (value: string | number | null): Cell => (value === null ? NULL_CELL : value);

export const toSheetRow = (record: ProjectRecord): Cell[] => [
  cell(record.datahub),
  cell(record.umbrella_project_id),
  cell(record.project_id),
  record.first_created ? formatCreatedDate(record.first_created) : NULL_CELL,
  cell(record.study_id),
  cell(record.study_title),
  cell(record.sample_count),
  cell(record.run_count),
  cell(record.center_name),
  cell(record.project_taxon_id),
  cell(record.project_scientific_name),
  cell(record.sample_taxon_id),
  cell(record.sample_scientific_name),
  record.status
];

/**
 * Distinct accessions of the matching records, in the order they were first seen.
 */
export const accessionList = (
  records: readonly ProjectRecord[],
  predicate: (record: ProjectRecord) => boolean
): string[] => {
  const seen = new Map<string, ProjectRecord>();
  for (const record of records) {
    if (predicate(record) && !seen.has(record.project_id)) {
      seen.set(record.project_id, record);
    }
  }
  return Array.from(seen.keys());
};

export const noUmbrellaAccessions = (records: readonly ProjectRecord[]) =>
  accessionList(records, (record) => record.umbrella_project_id === null);

export const publicNoDatahubAccessions = (records: readonly ProjectRecord[]) =>
  accessionList(records, (record) => record.datahub === null && record.status === "public");

export const formatRecordLines = (records: readonly ProjectRecord[], prefix = ""): string =>
  records.map((record) => `${prefix}${toSheetRow(record).join("\t")}\n`).join("");

export const listFileNames = (category: Category) => ({
  noUmbrella: `${category}.projects.no_umbrella.list`,
  publicNoDatahub: `${category}.projects.public.no_datahub.list`
});

export const createOutputDir = (outdir: string) => {
  try {
    fs.mkdirSync(outdir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      throw new OutputConflictError(outdir, { cause: error });
    }
    throw error;
  }
};

export type ReportArtifacts = {
  workbook: string;
  lists: string[];
};

/**
 * Writes one sheet per category into a shared workbook, plus the two accession
 * lists per category. `outdir` must already exist.
 */
export const writeReports = async (result: ClassificationResult, outdir: string): Promise<ReportArtifacts> => {
  const workbook = new ExcelJS.Workbook();
  const lists: string[] = [];

  for (const category of CATEGORIES) {
    const records = result[category];

    const sheet = workbook.addWorksheet(category);
    sheet.addRow([...REPORT_COLUMNS]);
    sheet.addRows(records.map(toSheetRow));

    const files = listFileNames(category);
    const noUmbrellaPath = path.join(outdir, files.noUmbrella);
    fs.writeFileSync(noUmbrellaPath, noUmbrellaAccessions(records).join("\n"));
    const noDatahubPath = path.join(outdir, files.publicNoDatahub);
    fs.writeFileSync(noDatahubPath, publicNoDatahubAccessions(records).join("\n"));
    lists.push(noUmbrellaPath, noDatahubPath);
  }

  const workbookPath = path.join(outdir, WORKBOOK_FILE);
  await workbook.xlsx.writeFile(workbookPath);

  return { workbook: workbookPath, lists };
};
