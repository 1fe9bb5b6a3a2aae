import { CATEGORIES, type Category, type ClassificationResult, type ProjectRecord } from "../shared/record.js";

export const SARS_COV_2_TAXON_ID = "2697049";
export const HUMAN_TAXON_ID = "9606";

type ClassifiableRecord = Pick<
  ProjectRecord,
  "project_taxon_id" | "sample_taxon_id" | "project_scientific_name" | "sample_scientific_name"
>;

export type CategoryRule = {
  category: Category;
  matches: (record: ClassifiableRecord) => boolean;
};

const hasTaxon = (record: ClassifiableRecord, taxonId: string) =>
  record.project_taxon_id === taxonId || record.sample_taxon_id === taxonId;

// Case-sensitive, as the names arrive from the source.
const nameContains = (record: ClassifiableRecord, needle: string) =>
  (record.project_scientific_name ?? "").includes(needle) || (record.sample_scientific_name ?? "").includes(needle);

/**
 * Evaluated in order, first match wins. Taxon checks come before name checks,
 * so a record tagged with both the SARS-CoV-2 and the human taxon is `sars-cov-2`.
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  { category: "sars-cov-2", matches: (record) => hasTaxon(record, SARS_COV_2_TAXON_ID) },
  { category: "human", matches: (record) => hasTaxon(record, HUMAN_TAXON_ID) },
  { category: "other-virus", matches: (record) => nameContains(record, "virus") },
  { category: "metagenome", matches: (record) => nameContains(record, "metagenom") }
];

export const FALLBACK_CATEGORY: Category = "other-host";

export const classifyRecord = (
  record: ClassifiableRecord,
  rules: readonly CategoryRule[] = CATEGORY_RULES
): Category => rules.find((rule) => rule.matches(record))?.category ?? FALLBACK_CATEGORY;

export const createClassificationResult = (): ClassificationResult => ({
  "sars-cov-2": [],
  "other-virus": [],
  metagenome: [],
  human: [],
  "other-host": []
});

export const addRecord = (result: ClassificationResult, record: ProjectRecord): Category => {
  const category = classifyRecord(record);
  result[category].push(record);
  return category;
};

export const classifyRecords = (records: Iterable<ProjectRecord>): ClassificationResult => {
  const result = createClassificationResult();
  for (const record of records) {
    addRecord(result, record);
  }
  return result;
};

export const countByCategory = (result: ClassificationResult): Array<[Category, number]> =>
  CATEGORIES.map((category) => [category, result[category].length]);
