export const RAW_COLUMNS = [
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
  "project_status",
  "experiment_status",
  "sample_status",
  "run_status"
] as const;

export const CATEGORIES = ["sars-cov-2", "other-virus", "metagenome", "human", "other-host"] as const;

export type Category = (typeof CATEGORIES)[number];

export type ProjectStatus = "private" | "part private" | "public";

// Positional row as returned by the data source, in RAW_COLUMNS order.
export type RawRow = readonly unknown[];

export type StatusCodes = {
  project: number | null;
  experiment: number | null; // averaged over experiments
  sample: number | null; // averaged over samples
  run: number | null; // averaged over runs
};

type RecordFields = {
  datahub: string | null;
  umbrella_project_id: string | null;
  project_id: string;
  first_created: Date | null;
  study_id: string | null;
  study_title: string | null;
  sample_count: number | null;
  run_count: number | null;
  center_name: string | null;
  project_taxon_id: string | null;
  project_scientific_name: string | null;
  sample_taxon_id: string | null;
  sample_scientific_name: string | null;
};

export type NormalizedRow = RecordFields & {
  statusCodes: StatusCodes;
};

export type ProjectRecord = Readonly<
  RecordFields & {
    status: ProjectStatus;
  }
>;

export type ClassificationResult = Record<Category, ProjectRecord[]>;
