import { RAW_COLUMNS, type ProjectRecord } from "../../shared/record.js";

type RawColumn = (typeof RAW_COLUMNS)[number];

const baseRow: Record<RawColumn, unknown> = {
  datahub: "dcc_test",
  umbrella_project_id: "PRJEB39908",
  project_id: "PRJEB00001",
  first_created: new Date(2020, 2, 15),
  study_id: "ERP000001",
  study_title: "Test study",
  sample_count: 2,
  run_count: 3,
  center_name: "Test Center",
  project_taxon_id: null,
  project_scientific_name: null,
  sample_taxon_id: null,
  sample_scientific_name: null,
  project_status: 4,
  experiment_status: 4,
  sample_status: 4,
  run_status: 4
};

export const makeRow = (overrides: Partial<Record<RawColumn, unknown>> = {}): unknown[] => {
  const merged: Record<RawColumn, unknown> = { ...baseRow, ...overrides };
  return RAW_COLUMNS.map((column) => merged[column]);
};

export const makeRecord = (overrides: Partial<ProjectRecord> = {}): ProjectRecord => ({
  datahub: "dcc_test",
  umbrella_project_id: "PRJEB39908",
  project_id: "PRJEB00001",
  first_created: new Date(2020, 2, 15),
  study_id: "ERP000001",
  study_title: "Test study",
  sample_count: 2,
  run_count: 3,
  center_name: "Test Center",
  project_taxon_id: null,
  project_scientific_name: null,
  sample_taxon_id: null,
  sample_scientific_name: null,
  status: "public",
  ...overrides
});
